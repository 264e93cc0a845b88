import type { Bar } from "@openrange/core";

export const MIN_CANDLE_RANGE = 5;
export const MIN_BODY_FRACTION = 0.25;

export interface CandleShape {
	open: number;
	high: number;
	low: number;
	close: number;
}

export const candleRange = (bar: CandleShape): number => bar.high - bar.low;

export const candleBody = (bar: CandleShape): number =>
	Math.abs(bar.close - bar.open);

/** Range under 5 points, or a body under a quarter of the range. */
export const isWeakCandle = (bar: CandleShape): boolean => {
	const range = candleRange(bar);
	return range < MIN_CANDLE_RANGE || candleBody(bar) < MIN_BODY_FRACTION * range;
};

export const isBullish = (bar: Pick<Bar, "open" | "close">): boolean =>
	bar.close > bar.open;

export const isBearish = (bar: Pick<Bar, "open" | "close">): boolean =>
	bar.close < bar.open;

export const formatPrice = (value: number): string =>
	Number.isInteger(value) ? String(value) : value.toFixed(2);
