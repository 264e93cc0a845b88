export * from "./ccxtVenue";
export * from "./ccxtMarketDataSource";
export * from "./ccxtBrokerClient";
