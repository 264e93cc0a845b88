import {
	BREAKOUT_WINDOW_END,
	BREAKOUT_WINDOW_START,
	dataErrorOutcome,
	describeError,
	isWithinClockWindow,
	rejectOutcome,
	type EvaluationOutcome,
	type StrategyBar,
} from "@openrange/core";
import { formatPrice, isWeakCandle } from "../candles";

export const MIN_BREAKOUT_ATR = 10;

export interface BreakoutEvaluationOptions {
	timeZone: string;
}

const hasLevel = (value: number | null): value is number =>
	value !== null && value !== 0;

/**
 * Opening-range breakout on the bar at `index`. Long when the high reaches the
 * long entry after a bullish bar, short when the low reaches the short entry
 * after a bearish bar. Entry is the close; stop and target sit the day's
 * distances away.
 */
export function evaluateBreakout(
	bars: readonly StrategyBar[],
	index: number,
	options: BreakoutEvaluationOptions
): EvaluationOutcome {
	try {
		const bar = bars.at(index);
		if (!bar) {
			return dataErrorOutcome("BREAKOUT", `No bar at index ${index}`);
		}

		if (
			!isWithinClockWindow(
				bar.timestamp,
				BREAKOUT_WINDOW_START,
				BREAKOUT_WINDOW_END,
				options.timeZone
			)
		) {
			return rejectOutcome("BREAKOUT", "Outside trading window");
		}

		if (isWeakCandle(bar)) {
			return rejectOutcome("BREAKOUT", `Weak candle ${formatPrice(bar.close)}`);
		}

		const atr = bar.atr14;
		if (atr === null || atr < MIN_BREAKOUT_ATR) {
			return rejectOutcome(
				"BREAKOUT",
				`ATR ${atr === null ? "n/a" : atr.toFixed(2)} < ${MIN_BREAKOUT_ATR} or missing`
			);
		}

		const {
			breakoutLongEntry: longEntry,
			breakoutShortEntry: shortEntry,
			breakoutStopDistance: stopDistance,
			breakoutTargetDistance: targetDistance,
		} = bar;
		if (
			!hasLevel(longEntry) ||
			!hasLevel(shortEntry) ||
			!hasLevel(stopDistance) ||
			!hasLevel(targetDistance)
		) {
			return rejectOutcome("BREAKOUT", "Missing breakout levels");
		}

		const previousBullish =
			bar.openPrev1 !== null && bar.closePrev1 !== null && bar.closePrev1 > bar.openPrev1;
		const previousBearish =
			bar.openPrev1 !== null && bar.closePrev1 !== null && bar.closePrev1 < bar.openPrev1;
		const entry = bar.close;

		if (bar.high >= longEntry && previousBullish) {
			return {
				status: "valid",
				trade: {
					timestamp: bar.timestamp,
					signal: "BUY",
					entry,
					stopLoss: entry - stopDistance,
					target: entry + targetDistance,
					strategy: "BREAKOUT",
				},
			};
		}

		if (bar.low <= shortEntry && previousBearish) {
			return {
				status: "valid",
				trade: {
					timestamp: bar.timestamp,
					signal: "SELL",
					entry,
					stopLoss: entry + stopDistance,
					target: entry - targetDistance,
					strategy: "BREAKOUT",
				},
			};
		}

		return rejectOutcome("BREAKOUT", "No breakout conditions met");
	} catch (error) {
		return dataErrorOutcome("BREAKOUT", `Exception: ${describeError(error)}`);
	}
}
