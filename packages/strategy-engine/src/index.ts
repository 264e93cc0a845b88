export * from "./candles";
export * from "./strategySelector";
export * from "./evaluators/breakout";
export * from "./evaluators/reversion";
export * from "./filters/signalFilterChain";
export * from "./strategyEngine";
