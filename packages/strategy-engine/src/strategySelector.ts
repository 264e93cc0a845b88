import {
	OPENING_RANGE_END,
	OPENING_RANGE_START,
	createLogger,
	exchangeDate,
	isWithinClockWindow,
	type Bar,
	type BreakoutConfig,
	type IndicatorBar,
	type StrategyBar,
	type StrategyMode,
	type StrategyName,
} from "@openrange/core";
import { candleRange } from "./candles";

const logger = createLogger("strategy-selector");

/** Mean opening-range bar size above which a day trades breakouts. */
export const BREAKOUT_MEAN_RANGE_THRESHOLD = 15;
/** Opening-range span below which a day gets no assignment at all. */
export const MIN_OPENING_RANGE_SPAN = 25;
/** Stop distance floor, also the ATR stand-in while ATR is warming up. */
export const MIN_BREAKOUT_STOP_DISTANCE = 20;

export interface DailyAssignment {
	readonly sessionDate: string;
	readonly strategy: StrategyName;
	readonly openingRangeHigh: number;
	readonly openingRangeLow: number;
	readonly openingRangeSpan: number;
	readonly meanBarRange: number;
}

export type DailyStrategyPlan = ReadonlyMap<string, DailyAssignment>;

export interface PlanOptions {
	mode: StrategyMode;
	timeZone: string;
}

export interface LevelOptions extends BreakoutConfig {
	mode: StrategyMode;
	timeZone: string;
}

export const openingRangeBars = <T extends Bar>(
	bars: readonly T[],
	timeZone: string
): T[] =>
	bars.filter((bar) =>
		isWithinClockWindow(bar.timestamp, OPENING_RANGE_START, OPENING_RANGE_END, timeZone)
	);

const meanRange = (bars: readonly Bar[]): number =>
	bars.reduce((acc, bar) => acc + candleRange(bar), 0) / bars.length;

/**
 * BREAKOUT when the mean bar range over the opening range exceeds 15 points,
 * REVERSION otherwise (including days with no opening-range bars).
 */
export const classifyDay = (
	dayBars: readonly Bar[],
	timeZone: string
): StrategyName => {
	const morning = openingRangeBars(dayBars, timeZone);
	if (!morning.length) {
		return "REVERSION";
	}
	return meanRange(morning) > BREAKOUT_MEAN_RANGE_THRESHOLD ? "BREAKOUT" : "REVERSION";
};

export const groupBySessionDate = <T extends Bar>(
	bars: readonly T[],
	timeZone: string
): Map<string, T[]> => {
	const groups = new Map<string, T[]>();
	for (const bar of bars) {
		const date = exchangeDate(bar.timestamp, timeZone);
		const group = groups.get(date);
		if (group) {
			group.push(bar);
		} else {
			groups.set(date, [bar]);
		}
	}
	return groups;
};

/**
 * First phase: one assignment per session date, computed from that day's
 * opening range. Days whose opening range is missing or narrower than 25
 * points are left out of the plan.
 */
export const planDailyStrategies = (
	bars: readonly Bar[],
	options: PlanOptions
): DailyStrategyPlan => {
	const plan = new Map<string, DailyAssignment>();

	for (const [sessionDate, dayBars] of groupBySessionDate(bars, options.timeZone)) {
		const morning = openingRangeBars(dayBars, options.timeZone);
		if (!morning.length) {
			logger.debug("opening_range_missing", { sessionDate });
			continue;
		}
		const high = Math.max(...morning.map((bar) => bar.high));
		const low = Math.min(...morning.map((bar) => bar.low));
		const span = high - low;
		if (span < MIN_OPENING_RANGE_SPAN) {
			logger.warn("opening_range_too_narrow", { sessionDate, span });
			continue;
		}
		plan.set(
			sessionDate,
			Object.freeze({
				sessionDate,
				strategy:
					options.mode === "ADAPTIVE"
						? classifyDay(dayBars, options.timeZone)
						: options.mode,
				openingRangeHigh: high,
				openingRangeLow: low,
				openingRangeSpan: span,
				meanBarRange: meanRange(morning),
			})
		);
	}

	return plan;
};

const UNASSIGNED_LEVELS = {
	breakoutLongEntry: null,
	breakoutShortEntry: null,
	breakoutStopDistance: null,
	breakoutTargetDistance: null,
} as const;

const ZEROED_LEVELS = {
	breakoutLongEntry: 0,
	breakoutShortEntry: 0,
	breakoutStopDistance: 0,
	breakoutTargetDistance: 0,
} as const;

/**
 * Second phase: broadcasts each day's breakout levels onto its bars. Reversion
 * days get zeroed levels, unplanned days keep null levels. A fixed REVERSION
 * mode zeroes the whole series.
 */
export const applyStrategyLevels = (
	bars: readonly IndicatorBar[],
	plan: DailyStrategyPlan,
	options: LevelOptions
): StrategyBar[] =>
	bars.map((bar) => {
		const sessionDate = exchangeDate(bar.timestamp, options.timeZone);
		if (options.mode === "REVERSION") {
			return { ...bar, ...ZEROED_LEVELS, sessionDate };
		}
		const assignment = plan.get(sessionDate);
		if (!assignment) {
			return { ...bar, ...UNASSIGNED_LEVELS, sessionDate };
		}
		if (assignment.strategy === "REVERSION") {
			return { ...bar, ...ZEROED_LEVELS, sessionDate };
		}
		const atr = bar.atr14 ?? MIN_BREAKOUT_STOP_DISTANCE;
		const stopDistance = Math.max(MIN_BREAKOUT_STOP_DISTANCE, atr * options.slFactor);
		return {
			...bar,
			sessionDate,
			breakoutLongEntry: assignment.openingRangeHigh + options.entryBuffer,
			breakoutShortEntry: assignment.openingRangeLow - options.entryBuffer,
			breakoutStopDistance: stopDistance,
			breakoutTargetDistance: stopDistance * options.targetFactor,
		};
	});

export interface AssignedLevels {
	plan: DailyStrategyPlan;
	bars: StrategyBar[];
}

export const assignLevels = (
	bars: readonly IndicatorBar[],
	options: LevelOptions
): AssignedLevels => {
	const plan = planDailyStrategies(bars, options);
	return { plan, bars: applyStrategyLevels(bars, plan, options) };
};

export const resolveStrategyForBar = (
	bar: Pick<StrategyBar, "sessionDate">,
	plan: DailyStrategyPlan,
	mode: StrategyMode
): StrategyName =>
	mode === "ADAPTIVE" ? plan.get(bar.sessionDate)?.strategy ?? "REVERSION" : mode;
