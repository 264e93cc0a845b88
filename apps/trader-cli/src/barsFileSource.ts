import { readFile } from "node:fs/promises";
import path from "node:path";
import { DataError, createLogger, type MarketDataSource, type RawBar } from "@openrange/core";

const logger = createLogger("bars-file");

const isRawBar = (value: unknown): value is RawBar => {
	if (!value || typeof value !== "object") {
		return false;
	}
	const row: Record<string, unknown> = { ...value };
	return ["open", "high", "low", "close", "volume"].every(
		(field) => typeof row[field] === "number"
	);
};

/**
 * Serves the bars of a JSON file (an array of rows) on every fetch. Used for
 * paper sessions without a venue feed. The file is re-read each time so it can
 * be appended to while the trader runs.
 */
export class BarsFileSource implements MarketDataSource {
	readonly filePath: string;

	constructor(filePath: string) {
		this.filePath = path.resolve(filePath);
	}

	async fetchBars(symbol: string): Promise<RawBar[]> {
		const parsed: unknown = JSON.parse(await readFile(this.filePath, "utf-8"));
		if (!Array.isArray(parsed)) {
			throw new DataError(`${this.filePath} must hold a JSON array of bars`);
		}
		const bars = parsed.filter(isRawBar);
		if (bars.length !== parsed.length) {
			logger.warn("bars_file_rows_skipped", {
				path: this.filePath,
				skipped: parsed.length - bars.length,
			});
		}
		logger.debug("bars_fetched", { symbol, count: bars.length });
		return bars;
	}
}
