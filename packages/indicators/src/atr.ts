import { rollingMean } from "./sma";

export interface RangeInput {
	high: number;
	low: number;
}

/**
 * Average bar range (high − low) over `period` bars, defined from index
 * `period − 1`. Gaps between bars are not counted.
 */
export function calculateATRSeries(
	bars: readonly RangeInput[],
	period = 14
): Array<number | null> {
	return rollingMean(
		bars.map((bar) => bar.high - bar.low),
		period
	);
}

export function calculateATR(
	bars: readonly RangeInput[],
	period = 14
): number | null {
	const series = calculateATRSeries(bars, period);
	return series.length ? series[series.length - 1] : null;
}
