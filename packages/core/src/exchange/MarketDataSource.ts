import type { RawBar } from "../types";

/**
 * Market data collaborator for fetching recent fixed-interval bars.
 *
 * Implementations return bars in chronological order without duplicate
 * timestamps; the engine still normalises what it receives.
 */
export interface MarketDataSource {
	/**
	 * @param symbol - Instrument identifier understood by the venue
	 * @param interval - Bar interval (e.g. "5m")
	 * @param lookbackDays - Calendar days of history to fetch
	 */
	fetchBars(
		symbol: string,
		interval: string,
		lookbackDays: number
	): Promise<RawBar[]>;
}
