import { DEFAULT_ENGINE_CONFIG, DataError, type StrategyBar } from "@openrange/core";
import { describe, expect, it } from "vitest";
import { ist, strategyBar } from "./__tests__/fixtures";
import { decideTrade, type DecideTradeContext } from "./strategyEngine";
import type { DailyAssignment, DailyStrategyPlan } from "./strategySelector";

const FIVE_MINUTES = 5 * 60_000;
const START = ist(10, 9, 15);

const LEVELS = {
	breakoutLongEntry: 22_035,
	breakoutShortEntry: 21_995,
	breakoutStopDistance: 30,
	breakoutTargetDistance: 120,
};

const buildSession = (): StrategyBar[] => [
	...Array.from({ length: 15 }, (_, index) =>
		strategyBar(START + index * FIVE_MINUTES, {
			...LEVELS,
			open: 22_000,
			close: 22_010,
			high: 22_012,
			low: 21_995,
			volume: 100,
		})
	),
	strategyBar(START + 15 * FIVE_MINUTES, {
		...LEVELS,
		open: 22_040,
		high: 22_060,
		low: 22_030,
		close: 22_055,
		volume: 500,
		openPrev1: 22_000,
		closePrev1: 22_010,
	}),
];

const breakoutDay: DailyAssignment = {
	sessionDate: "2024-05-10",
	strategy: "BREAKOUT",
	openingRangeHigh: 22_030,
	openingRangeLow: 22_000,
	openingRangeSpan: 30,
	meanBarRange: 20,
};

const plan: DailyStrategyPlan = new Map([["2024-05-10", breakoutDay]]);

const baseContext: DecideTradeContext = {
	plan,
	mode: "ADAPTIVE",
	timeZone: "Asia/Kolkata",
	reversion: DEFAULT_ENGINE_CONFIG.reversion,
	lastExitTime: null,
	lastExitPrice: null,
	cooldownMs: 5 * 60_000,
};

describe("decideTrade", () => {
	it("evaluates the latest bar with the day's strategy and filters it", () => {
		const { strategy, decision } = decideTrade(buildSession(), baseContext);
		expect(strategy).toBe("BREAKOUT");
		expect(decision).toEqual({
			timestamp: START + 15 * FIVE_MINUTES,
			signal: "BUY",
			entry: 22_055,
			stopLoss: 22_025,
			target: 22_175,
			valid: true,
			strategy: "BREAKOUT",
			reason: "",
		});
	});

	it("downgrades the decision when a filter vetoes it", () => {
		const { outcome, decision } = decideTrade(buildSession(), {
			...baseContext,
			lastExitTime: START + 14 * FIVE_MINUTES + 2 * 60_000,
			lastExitPrice: 22_050,
		});
		expect(outcome.status).toBe("rejected");
		expect(decision.valid).toBe(false);
		expect(decision.entry).toBe(22_055);
		expect(decision.reason).toBe("Same-zone reentry");
	});

	it("falls back to reversion for an unplanned session", () => {
		const { strategy, decision } = decideTrade(buildSession(), {
			...baseContext,
			plan: new Map(),
		});
		expect(strategy).toBe("REVERSION");
		expect(decision.strategy).toBe("REVERSION");
		expect(decision.valid).toBe(false);
	});

	it("raises a data error with nothing to evaluate", () => {
		expect(() => decideTrade([], baseContext)).toThrow(DataError);
	});
});
