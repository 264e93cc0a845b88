import {
	dataErrorOutcome,
	describeError,
	rejectOutcome,
	type EvaluationOutcome,
	type ReversionConfig,
	type StrategyBar,
	type TradeSignal,
} from "@openrange/core";
import { formatPrice, isWeakCandle } from "../candles";

export const MIN_REVERSION_ATR = 5;
export const MIN_ATR_TO_PRICE = 0.0001;

/**
 * Band re-cross on the bar at `index`. The band is the typical price plus or
 * minus `deviation × close`; a long needs the close above the upper band with
 * the previous close at or below it and the close above the long EMA. Shorts
 * mirror this against the lower band.
 */
export function evaluateReversion(
	bars: readonly StrategyBar[],
	index: number,
	config: ReversionConfig
): EvaluationOutcome {
	try {
		const bar = bars.at(index);
		if (!bar) {
			return dataErrorOutcome("REVERSION", `No bar at index ${index}`);
		}

		const entry = bar.close;
		if (isWeakCandle(bar)) {
			return rejectOutcome("REVERSION", `Weak candle ${formatPrice(entry)}`);
		}

		const { typicalPrice, atr14: atr, rsi14: rsi, emaLong, prevClose } = bar;
		if (
			!Number.isFinite(typicalPrice) ||
			atr === null ||
			rsi === null ||
			!Number.isFinite(emaLong) ||
			prevClose === null
		) {
			return dataErrorOutcome("REVERSION", "Missing indicator value(s)");
		}

		if (atr / entry < MIN_ATR_TO_PRICE || atr < MIN_REVERSION_ATR) {
			return rejectOutcome(
				"REVERSION",
				`ATR too low ${atr.toFixed(2)} < ${MIN_REVERSION_ATR}`
			);
		}

		const upperBand = typicalPrice + config.deviation * entry;
		const lowerBand = typicalPrice - config.deviation * entry;

		let signal: TradeSignal | null = null;
		if (entry > upperBand && upperBand >= prevClose && entry > emaLong) {
			signal = "BUY";
		} else if (entry < lowerBand && lowerBand <= prevClose && entry < emaLong) {
			signal = "SELL";
		}
		if (!signal) {
			return rejectOutcome("REVERSION", "No reversion signal conditions met");
		}

		const riskDistance = config.slMultiplier * atr;
		const rewardDistance = config.targetMultiplier * atr;
		const direction = signal === "BUY" ? 1 : -1;
		const stopLoss = entry - direction * riskDistance;
		const target = entry + direction * rewardDistance;

		const reward = direction * (target - entry);
		const required = config.rrThreshold * direction * (entry - stopLoss);
		if (reward < required) {
			return rejectOutcome(
				"REVERSION",
				`Risk/reward too low ${reward.toFixed(2)} < ${required.toFixed(2)}`
			);
		}

		return {
			status: "valid",
			trade: {
				timestamp: bar.timestamp,
				signal,
				entry,
				stopLoss,
				target,
				strategy: "REVERSION",
			},
		};
	} catch (error) {
		return dataErrorOutcome("REVERSION", `Exception: ${describeError(error)}`);
	}
}
