export * from "./ema";
export * from "./sma";
export * from "./rsi";
export * from "./atr";
export * from "./macd";
export * from "./typicalPrice";
export * from "./indicatorEngine";
