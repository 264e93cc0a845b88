import type { IndicatorBar, StrategyBar } from "@openrange/core";

export const IST = "Asia/Kolkata";
const IST_OFFSET_MS = 5.5 * 60 * 60_000;

/** Epoch ms for an IST wall-clock time in May 2024. */
export const ist = (day: number, hour: number, minute: number, second = 0): number =>
	Date.UTC(2024, 4, day, hour, minute, second) - IST_OFFSET_MS;

export const indicatorBar = (
	timestamp: number,
	overrides: Partial<IndicatorBar> = {}
): IndicatorBar => ({
	timestamp,
	open: 22_000,
	high: 22_020,
	low: 21_990,
	close: 22_015,
	volume: 1_000,
	emaShort: 22_000,
	emaLong: 21_980,
	rsi14: 50,
	atr14: 20,
	macd: 0,
	typicalPrice: 22_008,
	openPrev1: null,
	closePrev1: null,
	openPrev2: null,
	closePrev2: null,
	prevClose: null,
	...overrides,
});

export const strategyBar = (
	timestamp: number,
	overrides: Partial<StrategyBar> = {}
): StrategyBar => ({
	...indicatorBar(timestamp),
	breakoutLongEntry: null,
	breakoutShortEntry: null,
	breakoutStopDistance: null,
	breakoutTargetDistance: null,
	sessionDate: "2024-05-10",
	...overrides,
});

/** Small deterministic generator for property-style tests. */
export const seededRandom = (seed: number): (() => number) => {
	let state = seed >>> 0;
	return () => {
		state = (state * 1_664_525 + 1_013_904_223) >>> 0;
		return state / 0x1_0000_0000;
	};
};
