import type { TradeRecord } from "@openrange/core";

export const openRecord = (overrides: Partial<TradeRecord> = {}): TradeRecord => ({
	tradeId: "trade-1",
	symbol: "BANKNIFTY-FUT",
	direction: "BUY",
	strategy: "BREAKOUT",
	entryTime: "2024-05-10T10:00:00+05:30",
	entryPrice: 22_000,
	stopLoss: 21_970,
	targetPrice: 22_050,
	quantity: 15,
	exited: false,
	exitPrice: null,
	exitTime: null,
	pnl: 0,
	reason: "",
	sessionDate: "2024-05-10",
	...overrides,
});

export const closedRecord = (
	pnl: number,
	overrides: Partial<TradeRecord> = {}
): TradeRecord =>
	openRecord({
		exited: true,
		exitPrice: 22_040,
		exitTime: "2024-05-10T10:30:00+05:30",
		pnl,
		reason: "Stop-loss hit",
		...overrides,
	});
