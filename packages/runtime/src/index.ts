export * from "./sleep";
export * from "./retry";
export * from "./session/exchangeCalendar";
export * from "./session/tradingSession";
export * from "./loop/startTrader";
