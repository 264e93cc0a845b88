import type { StrategyName, TradeSignal } from "../types";

export interface TradeRecord {
	tradeId: string;
	symbol: string;
	direction: TradeSignal;
	strategy: StrategyName | null;
	/** ISO-8601 with the exchange offset */
	entryTime: string;
	entryPrice: number;
	stopLoss: number;
	targetPrice: number;
	quantity: number;
	exited: boolean;
	exitPrice: number | null;
	exitTime: string | null;
	pnl: number;
	reason: string;
	/** Exchange-local session date the record belongs to, `YYYY-MM-DD`. */
	sessionDate: string;
}

export interface DailyLogEntry {
	sessionDate: string;
	direction: TradeSignal;
	entryPrice: number;
	exitPrice: number;
	pnl: number;
	quantity: number;
}

/**
 * Persistent trade store. The in-memory TradeState stays authoritative for the
 * process lifetime; callers log store failures and carry on.
 */
export interface TradeStore {
	recordTrade(record: TradeRecord): Promise<void>;
	/** Replaces the open record for `record.tradeId` (stop-loss updates). */
	updateOpenTrade(record: TradeRecord): Promise<void>;
	fetchPnlToday(sessionDate: string): Promise<number>;
	populateDailyLog(sessionDate: string): Promise<DailyLogEntry[]>;
}
