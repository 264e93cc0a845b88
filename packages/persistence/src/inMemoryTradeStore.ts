import {
	InvariantViolationError,
	type DailyLogEntry,
	type TradeRecord,
	type TradeStore,
} from "@openrange/core";
import {
	dailyLogEntries,
	latestByTrade,
	latestOpenTrade,
	pnlForSession,
	summarizeTrades,
	type TradeSummary,
} from "./tradeLedger";

/** Process-local store for paper runs and tests. */
export class InMemoryTradeStore implements TradeStore {
	private readonly events: TradeRecord[] = [];
	private readonly dailyLog: DailyLogEntry[] = [];

	async recordTrade(record: TradeRecord): Promise<void> {
		this.events.push({ ...record });
	}

	async updateOpenTrade(record: TradeRecord): Promise<void> {
		const current = latestByTrade(this.events).find(
			(existing) => existing.tradeId === record.tradeId
		);
		if (!current || current.exited) {
			throw new InvariantViolationError(`No open trade ${record.tradeId} to update`);
		}
		this.events.push({ ...record });
	}

	async fetchPnlToday(sessionDate: string): Promise<number> {
		return pnlForSession(this.events, sessionDate);
	}

	async populateDailyLog(sessionDate: string): Promise<DailyLogEntry[]> {
		const entries = dailyLogEntries(this.events, sessionDate);
		this.dailyLog.push(...entries);
		return entries;
	}

	async fetchOpenTrade(): Promise<TradeRecord | null> {
		return latestOpenTrade(this.events);
	}

	async fetchSummary(): Promise<TradeSummary> {
		return summarizeTrades(this.events);
	}

	listTrades(): TradeRecord[] {
		return latestByTrade(this.events);
	}

	listDailyLog(): DailyLogEntry[] {
		return [...this.dailyLog];
	}
}
