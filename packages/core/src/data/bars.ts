import { parseExchangeTimestamp } from "../time/exchangeClock";
import type { Bar, RawBar } from "../types";

export interface NormalizedBars {
	bars: Bar[];
	droppedUnresolved: number;
	droppedDuplicates: number;
}

/**
 * Resolves timestamps, drops rows whose timestamp cannot be resolved, orders
 * by time and keeps the first occurrence of each timestamp.
 */
export const normalizeBars = (
	rows: readonly RawBar[],
	timeZone: string
): NormalizedBars => {
	const resolved: Array<{ bar: Bar; position: number }> = [];
	let droppedUnresolved = 0;

	rows.forEach((row, position) => {
		const timestamp = parseExchangeTimestamp(row.timestamp, timeZone);
		if (timestamp === null) {
			droppedUnresolved += 1;
			return;
		}
		resolved.push({
			position,
			bar: {
				timestamp,
				open: Number(row.open),
				high: Number(row.high),
				low: Number(row.low),
				close: Number(row.close),
				volume: Number(row.volume),
			},
		});
	});

	// equal timestamps keep arrival order so the first one wins below
	resolved.sort(
		(a, b) => a.bar.timestamp - b.bar.timestamp || a.position - b.position
	);

	const bars: Bar[] = [];
	let droppedDuplicates = 0;
	for (const { bar } of resolved) {
		const previous = bars[bars.length - 1];
		if (previous && previous.timestamp === bar.timestamp) {
			droppedDuplicates += 1;
			continue;
		}
		bars.push(bar);
	}

	return { bars, droppedUnresolved, droppedDuplicates };
};
