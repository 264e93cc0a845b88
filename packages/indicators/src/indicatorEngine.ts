import {
	DataError,
	createLogger,
	normalizeBars,
	type IndicatorBar,
	type RawBar,
} from "@openrange/core";
import { calculateATRSeries } from "./atr";
import { emaSeries } from "./ema";
import { macdSeries } from "./macd";
import { rsiSeries } from "./rsi";
import { typicalPrice } from "./typicalPrice";

const logger = createLogger("indicators");

export const EMA_SHORT_SPAN = 5;
export const EMA_LONG_SPAN = 20;
export const RSI_PERIOD = 14;
export const ATR_PERIOD = 14;
export const MACD_FAST_SPAN = 12;
export const MACD_SLOW_SPAN = 26;

export interface IndicatorOptions {
	/** Zone used to read timestamps that carry no offset. */
	timeZone: string;
}

/**
 * Enriches raw bars with the indicator columns used by the evaluators.
 *
 * Rows whose timestamp cannot be resolved are dropped, the rest are ordered by
 * time with duplicate timestamps removed. The input is never mutated.
 *
 * @throws DataError when nothing usable remains.
 */
export function addTechnicalIndicators(
	rows: readonly RawBar[],
	options: IndicatorOptions
): IndicatorBar[] {
	if (!rows.length) {
		throw new DataError("No bars supplied to the indicator engine");
	}

	const { bars, droppedUnresolved, droppedDuplicates } = normalizeBars(
		rows,
		options.timeZone
	);
	if (droppedUnresolved || droppedDuplicates) {
		logger.warn("bars_dropped", {
			unresolved: droppedUnresolved,
			duplicates: droppedDuplicates,
			kept: bars.length,
		});
	}
	if (!bars.length) {
		throw new DataError(
			`None of the ${rows.length} bar(s) has a resolvable timestamp`
		);
	}

	const closes = bars.map((bar) => bar.close);
	const emaShort = emaSeries(closes, EMA_SHORT_SPAN);
	const emaLong = emaSeries(closes, EMA_LONG_SPAN);
	const macd = macdSeries(closes, MACD_FAST_SPAN, MACD_SLOW_SPAN);
	const rsi = rsiSeries(closes, RSI_PERIOD);
	const atr = calculateATRSeries(bars, ATR_PERIOD);

	return bars.map((bar, index) => {
		const prev1 = index >= 1 ? bars[index - 1] : null;
		const prev2 = index >= 2 ? bars[index - 2] : null;
		return {
			...bar,
			emaShort: emaShort[index],
			emaLong: emaLong[index],
			rsi14: rsi[index],
			atr14: atr[index],
			macd: macd[index],
			typicalPrice: typicalPrice(bar),
			openPrev1: prev1?.open ?? null,
			closePrev1: prev1?.close ?? null,
			openPrev2: prev2?.open ?? null,
			closePrev2: prev2?.close ?? null,
			prevClose: prev1?.close ?? null,
		};
	});
}
