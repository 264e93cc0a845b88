import { emaSeries } from "./ema";

export function macdSeries(
	closes: readonly number[],
	fast = 12,
	slow = 26
): number[] {
	if (fast >= slow) {
		throw new Error(`MACD fast span (${fast}) must be shorter than slow (${slow})`);
	}
	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);
	return fastSeries.map((value, index) => value - slowSeries[index]);
}
