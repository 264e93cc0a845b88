/**
 * Recursive exponential moving average seeded with the first value:
 * `ema[0] = x[0]`, `ema[i] = α·x[i] + (1 − α)·ema[i − 1]`, `α = 2 / (span + 1)`.
 * Every position is defined, including the first.
 */
export function emaSeries(values: readonly number[], span: number): number[] {
	if (span <= 0) {
		throw new Error(`EMA span must be positive, got ${span}`);
	}
	if (values.length === 0) {
		return [];
	}

	const alpha = 2 / (span + 1);
	const series: number[] = [values[0]];
	for (let i = 1; i < values.length; i += 1) {
		series.push(alpha * values[i] + (1 - alpha) * series[i - 1]);
	}
	return series;
}

export function ema(values: readonly number[], span: number): number | null {
	const series = emaSeries(values, span);
	return series.length ? series[series.length - 1] : null;
}
