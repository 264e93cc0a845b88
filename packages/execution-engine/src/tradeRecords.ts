import {
	DataError,
	InvariantViolationError,
	exchangeDate,
	formatExchangeTimestamp,
	parseExchangeTimestamp,
	type TradeRecord,
} from "@openrange/core";
import type { OpenTrade, TradeState } from "./tradeState";

export interface RecordContext {
	symbol: string;
	timeZone: string;
}

export interface ExitDetails {
	price: number;
	time: number;
	pnl: number;
	reason: string;
}

export const buildTradeRecord = (
	trade: OpenTrade,
	context: RecordContext,
	exit?: ExitDetails
): TradeRecord => ({
	tradeId: trade.tradeId,
	symbol: context.symbol,
	direction: trade.direction,
	strategy: trade.strategy,
	entryTime: formatExchangeTimestamp(trade.entryTime, context.timeZone),
	entryPrice: trade.entryPrice,
	stopLoss: trade.stopLoss,
	targetPrice: trade.targetPrice,
	quantity: trade.quantity,
	exited: exit !== undefined,
	exitPrice: exit?.price ?? null,
	exitTime: exit ? formatExchangeTimestamp(exit.time, context.timeZone) : null,
	pnl: exit?.pnl ?? 0,
	reason: exit?.reason ?? "",
	sessionDate: exchangeDate(trade.entryTime, context.timeZone),
});

/**
 * Loads a persisted open record into an empty TradeState after a restart. The
 * entry bar is not persisted, so the post-entry health check counts as done.
 */
export const restoreOpenTrade = (
	state: TradeState,
	record: TradeRecord,
	timeZone: string
): void => {
	if (state.open) {
		throw new InvariantViolationError(`Trade ${state.tradeId} is already open`);
	}
	if (record.exited) {
		throw new InvariantViolationError(`Trade ${record.tradeId} has already exited`);
	}
	const entryTime = parseExchangeTimestamp(record.entryTime, timeZone);
	if (entryTime === null) {
		throw new DataError(
			`Trade ${record.tradeId} has an unreadable entry time "${record.entryTime}"`
		);
	}
	state.open = true;
	state.tradeId = record.tradeId;
	state.direction = record.direction;
	state.strategy = record.strategy;
	state.entryPrice = record.entryPrice;
	state.entryTime = entryTime;
	state.entryBarTimestamp = null;
	state.stopLoss = record.stopLoss;
	state.targetPrice = record.targetPrice;
	state.quantity = record.quantity;
	state.checkedPostEntry = true;
};
