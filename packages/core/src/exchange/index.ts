export type { MarketDataSource } from "./MarketDataSource";
export type { BrokerClient, BrokerOrderReceipt } from "./BrokerClient";
export type { TradeStore, TradeRecord, DailyLogEntry } from "./TradeStore";
export type { MarketCalendar } from "./MarketCalendar";
