import {
	vetoProposal,
	type Bar,
	type EvaluationOutcome,
	type IndicatorBar,
	type ProposedTrade,
} from "@openrange/core";
import { isBearish, isBullish, isWeakCandle } from "../candles";

export const VOLUME_WINDOW = 14;
export const VOLUME_MULTIPLIER = 1.2;
export const MOMENTUM_BARS = 3;
export const REENTRY_ATR_FRACTION = 0.5;

export interface SignalFilterContext {
	bars: readonly IndicatorBar[];
	/** Position of the signal bar in `bars`. */
	index: number;
	lastExitTime: number | null;
	lastExitPrice: number | null;
	cooldownMs: number;
}

/** Returns the rejection reason, or null when the guard passes. */
export type SignalGuard = (
	trade: ProposedTrade,
	context: SignalFilterContext
) => string | null;

/**
 * Mean volume of the `window` bars strictly before `index`; null when fewer
 * than `window` bars precede it.
 */
export const trailingAverageVolume = (
	bars: readonly Bar[],
	index: number,
	window = VOLUME_WINDOW
): number | null => {
	if (index < window) {
		return null;
	}
	let sum = 0;
	for (let i = index - window; i < index; i += 1) {
		sum += bars[i].volume;
	}
	return sum / window;
};

const signalBar = (context: SignalFilterContext): IndicatorBar => {
	const bar = context.bars.at(context.index);
	if (!bar) {
		throw new RangeError(`No bar at index ${context.index}`);
	}
	return bar;
};

const withinCooldown = (
	trade: ProposedTrade,
	context: SignalFilterContext
): boolean =>
	context.lastExitTime !== null &&
	trade.timestamp - context.lastExitTime < context.cooldownMs;

export const checkVolumeConfirmation: SignalGuard = (_trade, context) => {
	const volume = signalBar(context).volume;
	const average = trailingAverageVolume(context.bars, context.index);
	if (average !== null && volume > VOLUME_MULTIPLIER * average) {
		return null;
	}
	return `Volume too low: ${volume.toFixed(0)} < ${VOLUME_MULTIPLIER}x avg (${
		average === null ? "n/a" : average.toFixed(0)
	})`;
};

export const checkMomentumConfirmation: SignalGuard = (trade, context) => {
	if (context.index < MOMENTUM_BARS) {
		return "Weak momentum across last 3 candles";
	}
	const preceding = context.bars.slice(context.index - MOMENTUM_BARS, context.index);
	const aligned =
		trade.signal === "BUY" ? preceding.every(isBullish) : preceding.every(isBearish);
	return aligned ? null : "Weak momentum across last 3 candles";
};

export const checkPostCooldownCandle: SignalGuard = (trade, context) =>
	withinCooldown(trade, context) && isWeakCandle(signalBar(context))
		? "Weak post-cooldown candle"
		: null;

export const checkSameZoneReentry: SignalGuard = (trade, context) => {
	if (context.lastExitPrice === null || !withinCooldown(trade, context)) {
		return null;
	}
	const atr = signalBar(context).atr14 ?? 0;
	return Math.abs(trade.entry - context.lastExitPrice) < REENTRY_ATR_FRACTION * atr
		? "Same-zone reentry"
		: null;
};

export const checkPullback: SignalGuard = (trade, context) => {
	if (context.lastExitPrice === null) {
		return null;
	}
	const minMove = REENTRY_ATR_FRACTION * (signalBar(context).atr14 ?? 0);
	const moved =
		trade.signal === "BUY"
			? trade.entry >= context.lastExitPrice + minMove
			: trade.entry <= context.lastExitPrice - minMove;
	return moved ? null : "No pullback for re-entry";
};

export const SIGNAL_GUARDS: readonly SignalGuard[] = [
	checkVolumeConfirmation,
	checkMomentumConfirmation,
	checkPostCooldownCandle,
	checkSameZoneReentry,
	checkPullback,
];

/**
 * Runs the guards in order on a valid outcome; the first failure vetoes the
 * proposal. Rejections and data errors pass through untouched.
 */
export const applySignalFilters = (
	outcome: EvaluationOutcome,
	context: SignalFilterContext,
	guards: readonly SignalGuard[] = SIGNAL_GUARDS
): EvaluationOutcome => {
	if (outcome.status !== "valid") {
		return outcome;
	}
	for (const guard of guards) {
		const reason = guard(outcome.trade, context);
		if (reason !== null) {
			return vetoProposal(outcome.trade, reason);
		}
	}
	return outcome;
};
