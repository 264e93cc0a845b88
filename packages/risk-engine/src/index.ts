export * from "./entryGuard";
