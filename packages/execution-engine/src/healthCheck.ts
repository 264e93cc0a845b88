import type { Bar, TradeSignal } from "@openrange/core";

export interface HealthCheckOptions {
	/** Bars after the entry bar to inspect. */
	lookahead?: number;
	/** Minimum favourable move, in percent of the entry close. */
	thresholdPct?: number;
}

export type HealthCheckResult =
	| { verdict: "invalid"; reason: "entry_bar_missing" | "insufficient_bars" }
	| {
			verdict: "valid";
			passed: boolean;
			movePct: number;
			direction: TradeSignal;
	  };

/**
 * Follow-through check on the bars after the entry bar. Direction comes from
 * the entry bar's body; the best close in that direction over the lookahead
 * window must move at least `thresholdPct` percent from the entry close.
 */
export function postEntryHealthCheck(
	bars: readonly Bar[],
	entryBarTimestamp: number,
	options: HealthCheckOptions = {}
): HealthCheckResult {
	const lookahead = options.lookahead ?? 3;
	const thresholdPct = options.thresholdPct ?? 0.15;

	const entryIndex = bars.findIndex((bar) => bar.timestamp === entryBarTimestamp);
	if (entryIndex === -1) {
		return { verdict: "invalid", reason: "entry_bar_missing" };
	}
	if (entryIndex + lookahead >= bars.length) {
		return { verdict: "invalid", reason: "insufficient_bars" };
	}

	const entryBar = bars[entryIndex];
	const direction: TradeSignal = entryBar.close > entryBar.open ? "BUY" : "SELL";
	const closes = bars
		.slice(entryIndex + 1, entryIndex + 1 + lookahead)
		.map((bar) => bar.close);
	const best = direction === "BUY" ? Math.max(...closes) : Math.min(...closes);
	const favourable = direction === "BUY" ? best - entryBar.close : entryBar.close - best;
	const movePct = (favourable / entryBar.close) * 100;

	return { verdict: "valid", passed: movePct >= thresholdPct, movePct, direction };
}
