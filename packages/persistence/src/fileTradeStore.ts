import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import {
	InvariantViolationError,
	createLogger,
	type DailyLogEntry,
	type TradeRecord,
	type TradeStore,
} from "@openrange/core";
import {
	dailyLogEntries,
	isTradeRecord,
	latestByTrade,
	latestOpenTrade,
	pnlForSession,
	summarizeTrades,
	type TradeSummary,
} from "./tradeLedger";

const logger = createLogger("trade-store");

export interface FileTradeStoreOptions {
	/** JSON-lines file holding every trade event. */
	tradesPath: string;
	/** Defaults to `trade-log.jsonl` beside the trades file. */
	dailyLogPath?: string;
}

/**
 * Append-only JSON-lines store. Every entry, stop update and exit is a line;
 * the latest line per trade id is the current record.
 */
export class FileTradeStore implements TradeStore {
	readonly tradesPath: string;
	readonly dailyLogPath: string;

	constructor(options: FileTradeStoreOptions) {
		this.tradesPath = path.resolve(options.tradesPath);
		this.dailyLogPath = path.resolve(
			options.dailyLogPath ?? path.join(path.dirname(this.tradesPath), "trade-log.jsonl")
		);
	}

	async recordTrade(record: TradeRecord): Promise<void> {
		await this.append(this.tradesPath, [record]);
	}

	async updateOpenTrade(record: TradeRecord): Promise<void> {
		const events = await this.readEvents();
		const current = latestByTrade(events).find(
			(existing) => existing.tradeId === record.tradeId
		);
		if (!current || current.exited) {
			throw new InvariantViolationError(`No open trade ${record.tradeId} to update`);
		}
		await this.append(this.tradesPath, [record]);
	}

	async fetchPnlToday(sessionDate: string): Promise<number> {
		return pnlForSession(await this.readEvents(), sessionDate);
	}

	async populateDailyLog(sessionDate: string): Promise<DailyLogEntry[]> {
		const entries = dailyLogEntries(await this.readEvents(), sessionDate);
		if (entries.length) {
			await this.append(this.dailyLogPath, entries);
		}
		logger.info("daily_log_populated", {
			sessionDate,
			trades: entries.length,
			path: this.dailyLogPath,
		});
		return entries;
	}

	async fetchOpenTrade(): Promise<TradeRecord | null> {
		return latestOpenTrade(await this.readEvents());
	}

	async fetchSummary(): Promise<TradeSummary> {
		return summarizeTrades(await this.readEvents());
	}

	async readEvents(): Promise<TradeRecord[]> {
		let contents: string;
		try {
			contents = await readFile(this.tradesPath, "utf8");
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw error;
		}

		const events: TradeRecord[] = [];
		contents.split("\n").forEach((line, index) => {
			if (!line.trim()) {
				return;
			}
			const parsed = parseLine(line);
			if (parsed === null) {
				logger.warn("trade_store_line_skipped", {
					path: this.tradesPath,
					line: index + 1,
				});
				return;
			}
			events.push(parsed);
		});
		return events;
	}

	private async append(target: string, rows: readonly object[]): Promise<void> {
		await mkdir(path.dirname(target), { recursive: true });
		await appendFile(
			target,
			rows.map((row) => `${JSON.stringify(row)}\n`).join(""),
			"utf8"
		);
	}
}

const parseLine = (line: string): TradeRecord | null => {
	let value: unknown;
	try {
		value = JSON.parse(line);
	} catch {
		return null;
	}
	return isTradeRecord(value) ? value : null;
};

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";
