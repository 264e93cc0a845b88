/**
 * Trailing simple mean over `period` values. A position is null until a full
 * window of defined values is available; a null inside the window makes the
 * mean null as well.
 */
export function rollingMean(
	values: ReadonlyArray<number | null>,
	period: number
): Array<number | null> {
	if (period <= 0) {
		throw new Error(`Rolling window must be positive, got ${period}`);
	}

	return values.map((_, index) => {
		if (index + 1 < period) {
			return null;
		}
		let sum = 0;
		for (let j = index - period + 1; j <= index; j += 1) {
			const value = values[j];
			if (value === null) {
				return null;
			}
			sum += value;
		}
		return sum / period;
	});
}

export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}
	return rollingMean(values.slice(values.length - period), period)[period - 1];
}
