import {
	isStrategyName,
	type DailyLogEntry,
	type TradeRecord,
} from "@openrange/core";

export interface TradeSummary {
	totalTrades: number;
	totalPnl: number;
	winsPnl: number;
	lossesPnl: number;
	avgWin: number | null;
	avgLoss: number | null;
	/** Percent of closed trades with positive P&L; null with no closed trades. */
	winPct: number | null;
}

/**
 * Collapses an append-only event list to the latest record per trade, in
 * order of first appearance.
 */
export const latestByTrade = (events: readonly TradeRecord[]): TradeRecord[] => {
	const latest = new Map<string, TradeRecord>();
	for (const event of events) {
		latest.set(event.tradeId, event);
	}
	return [...latest.values()];
};

export const closedTrades = (
	events: readonly TradeRecord[],
	sessionDate?: string
): TradeRecord[] =>
	latestByTrade(events).filter(
		(record) =>
			record.exited && (sessionDate === undefined || record.sessionDate === sessionDate)
	);

/** The most recently opened trade that has not exited, if any. */
export const latestOpenTrade = (events: readonly TradeRecord[]): TradeRecord | null =>
	latestByTrade(events)
		.filter((record) => !record.exited)
		.at(-1) ?? null;

export const pnlForSession = (
	events: readonly TradeRecord[],
	sessionDate: string
): number =>
	closedTrades(events, sessionDate).reduce((acc, record) => acc + record.pnl, 0);

export const dailyLogEntries = (
	events: readonly TradeRecord[],
	sessionDate: string
): DailyLogEntry[] =>
	closedTrades(events, sessionDate).map((record) => ({
		sessionDate: record.sessionDate,
		direction: record.direction,
		entryPrice: record.entryPrice,
		exitPrice: record.exitPrice ?? record.entryPrice,
		pnl: record.pnl,
		quantity: record.quantity,
	}));

const mean = (values: number[]): number | null =>
	values.length ? values.reduce((acc, value) => acc + value, 0) / values.length : null;

export const summarizeTrades = (events: readonly TradeRecord[]): TradeSummary => {
	const closed = closedTrades(events);
	const wins = closed.filter((record) => record.pnl > 0).map((record) => record.pnl);
	const losses = closed.filter((record) => record.pnl < 0).map((record) => record.pnl);
	const sum = (values: number[]): number => values.reduce((acc, value) => acc + value, 0);
	return {
		totalTrades: closed.length,
		totalPnl: sum(closed.map((record) => record.pnl)),
		winsPnl: sum(wins),
		lossesPnl: sum(losses),
		avgWin: mean(wins),
		avgLoss: mean(losses),
		winPct: closed.length ? (wins.length / closed.length) * 100 : null,
	};
};

const isRecordObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isNullableNumber = (value: unknown): value is number | null =>
	value === null || typeof value === "number";

const isNullableString = (value: unknown): value is string | null =>
	value === null || typeof value === "string";

export const isTradeRecord = (value: unknown): value is TradeRecord => {
	if (!isRecordObject(value)) {
		return false;
	}
	return (
		typeof value.tradeId === "string" &&
		typeof value.symbol === "string" &&
		(value.direction === "BUY" || value.direction === "SELL") &&
		(value.strategy === null || isStrategyName(value.strategy)) &&
		typeof value.entryTime === "string" &&
		typeof value.entryPrice === "number" &&
		typeof value.stopLoss === "number" &&
		typeof value.targetPrice === "number" &&
		typeof value.quantity === "number" &&
		typeof value.exited === "boolean" &&
		isNullableNumber(value.exitPrice) &&
		isNullableString(value.exitTime) &&
		typeof value.pnl === "number" &&
		typeof value.reason === "string" &&
		typeof value.sessionDate === "string"
	);
};
