export * from "./tradeLedger";
export * from "./inMemoryTradeStore";
export * from "./fileTradeStore";
