export * from "./tradeState";
export * from "./pnl";
export * from "./healthCheck";
export * from "./tradeRecords";
export * from "./trailingStopManager";
export * from "./positionManager";
export * from "./paperBroker";
