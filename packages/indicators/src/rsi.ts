import { rollingMean } from "./sma";

/**
 * Momentum proxy on the 0-100 scale: `100 − 100 / (1 + m)` where `m` is the
 * trailing mean of `close[i] / close[i − 1]` over `period` bars. Defined from
 * index `period`; values hover around 50 and read above it when price has been
 * rising.
 */
export function rsiSeries(
	closes: readonly number[],
	period = 14
): Array<number | null> {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	const ratios = closes.map((close, index) => {
		if (index === 0) {
			return null;
		}
		const previous = closes[index - 1];
		return previous === 0 ? null : close / previous;
	});

	return rollingMean(ratios, period).map((meanRatio) =>
		meanRatio === null ? null : 100 - 100 / (1 + meanRatio)
	);
}
