import {
	DAY_MS,
	createLogger,
	timeframeToMs,
	type MarketDataSource,
	type RawBar,
} from "@openrange/core";
import type { OHLCV } from "ccxt";
import type { CcxtVenue } from "./ccxtVenue";

const logger = createLogger("exchange:ccxt");

/** Upper bound on bars requested in one call. */
export const MAX_BARS_PER_REQUEST = 1_000;
/** Upper bound on requests per fetch. */
export const MAX_PAGES = 50;

export const mapOhlcvRow = (row: OHLCV): RawBar => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		timestamp: timestamp ?? null,
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};

export interface CcxtMarketDataSourceOptions {
	clock?: () => number;
}

export class CcxtMarketDataSource implements MarketDataSource {
	private readonly clock: () => number;

	constructor(
		private readonly venue: CcxtVenue,
		options: CcxtMarketDataSourceOptions = {}
	) {
		this.clock = options.clock ?? Date.now;
	}

	/**
	 * Pages forward from the start of the lookback window until the newest bar
	 * at or before now, so windows wider than one request still end at the
	 * latest bar.
	 */
	async fetchBars(
		symbol: string,
		interval: string,
		lookbackDays: number
	): Promise<RawBar[]> {
		const intervalMs = timeframeToMs(interval);
		const end = this.clock();
		const start = end - lookbackDays * DAY_MS;

		const result: RawBar[] = [];
		const seen = new Set<number>();
		let since = start;
		let pages = 0;

		while (since <= end && pages < MAX_PAGES) {
			const limit = Math.min(
				MAX_BARS_PER_REQUEST,
				Math.floor((end - since) / intervalMs) + 1
			);
			const rows = await this.venue.fetchOHLCV(symbol, interval, since, limit);
			pages += 1;
			logger.debug("bars_fetched", {
				venue: this.venue.id,
				symbol,
				interval,
				since,
				limit,
				received: rows.length,
			});

			let lastTimestamp: number | null = null;
			for (const row of rows) {
				const bar = mapOhlcvRow(row);
				if (typeof bar.timestamp === "number") {
					if (bar.timestamp > end) {
						return result;
					}
					if (seen.has(bar.timestamp)) {
						continue;
					}
					seen.add(bar.timestamp);
					lastTimestamp = bar.timestamp;
				}
				result.push(bar);
			}

			if (rows.length < limit || lastTimestamp === null) {
				return result;
			}
			since = Math.max(lastTimestamp + intervalMs, since + intervalMs);
		}

		if (pages >= MAX_PAGES) {
			logger.warn("bars_page_limit_reached", {
				venue: this.venue.id,
				symbol,
				interval,
				pages,
				received: result.length,
			});
		}
		return result;
	}
}
