import type { IndicatorBar } from "@openrange/core";
import { describe, expect, it } from "vitest";
import { IST, indicatorBar, ist, seededRandom } from "./__tests__/fixtures";
import {
	applyStrategyLevels,
	assignLevels,
	classifyDay,
	planDailyStrategies,
	resolveStrategyForBar,
} from "./strategySelector";

const BREAKOUT_LEVELS = { entryBuffer: 5, slFactor: 1.5, targetFactor: 4 };

/** Opening-range bars at 09:15, 09:20, 09:25 and 09:30 with the given ranges. */
const openingRange = (
	day: number,
	base: number,
	ranges: readonly number[]
): IndicatorBar[] =>
	ranges.map((range, position) =>
		indicatorBar(ist(day, 9, 15 + position * 5), {
			open: base,
			close: base + 1,
			high: base + range,
			low: base,
		})
	);

describe("classifyDay", () => {
	it("picks BREAKOUT when the opening-range bars average more than 15 points", () => {
		expect(classifyDay(openingRange(10, 22_000, [20, 20, 20, 20]), IST)).toBe(
			"BREAKOUT"
		);
	});

	it("picks REVERSION at or below the threshold", () => {
		expect(classifyDay(openingRange(10, 22_000, [15, 15, 15, 15]), IST)).toBe(
			"REVERSION"
		);
	});

	it("ignores bars outside the opening range", () => {
		const bars = [
			...openingRange(10, 22_000, [10, 10]),
			indicatorBar(ist(10, 9, 35), { high: 22_100, low: 22_000 }),
		];
		expect(classifyDay(bars, IST)).toBe("REVERSION");
	});

	it("falls back to REVERSION without opening-range bars", () => {
		expect(classifyDay([indicatorBar(ist(10, 11, 0))], IST)).toBe("REVERSION");
	});
});

describe("planDailyStrategies", () => {
	it("records one assignment per qualifying session", () => {
		const bars = [
			...openingRange(9, 22_000, [10, 10, 10, 10]),
			...openingRange(10, 22_000, [30, 20, 20, 20]),
		];
		const plan = planDailyStrategies(bars, { mode: "ADAPTIVE", timeZone: IST });

		expect(plan.has("2024-05-09")).toBe(false);
		expect(plan.get("2024-05-10")).toEqual({
			sessionDate: "2024-05-10",
			strategy: "BREAKOUT",
			openingRangeHigh: 22_030,
			openingRangeLow: 22_000,
			openingRangeSpan: 30,
			meanBarRange: 22.5,
		});
	});

	it("uses the configured strategy outside adaptive mode", () => {
		const plan = planDailyStrategies(openingRange(10, 22_000, [30, 5, 5, 5]), {
			mode: "BREAKOUT",
			timeZone: IST,
		});
		expect(plan.get("2024-05-10")?.strategy).toBe("BREAKOUT");
	});

	it("returns an immutable assignment", () => {
		const plan = planDailyStrategies(openingRange(10, 22_000, [30, 30]), {
			mode: "ADAPTIVE",
			timeZone: IST,
		});
		const assignment = plan.get("2024-05-10");
		expect(assignment && Object.isFrozen(assignment)).toBe(true);
	});
});

describe("applyStrategyLevels", () => {
	const day = [
		...openingRange(10, 22_000, [30, 20, 20, 20]),
		indicatorBar(ist(10, 10, 0), { atr14: 10 }),
		indicatorBar(ist(10, 10, 5), { atr14: null }),
		indicatorBar(ist(10, 10, 10), { atr14: 40 }),
	];

	it("broadcasts breakout levels with a 20-point stop floor", () => {
		const { bars } = assignLevels(day, {
			...BREAKOUT_LEVELS,
			mode: "ADAPTIVE",
			timeZone: IST,
		});
		const [floored, warmingUp, wide] = bars.slice(4);

		expect(floored).toMatchObject({
			sessionDate: "2024-05-10",
			breakoutLongEntry: 22_035,
			breakoutShortEntry: 21_995,
			breakoutStopDistance: 20,
			breakoutTargetDistance: 80,
		});
		expect(warmingUp.breakoutStopDistance).toBe(30);
		expect(warmingUp.breakoutTargetDistance).toBe(120);
		expect(wide.breakoutStopDistance).toBe(60);
		expect(wide.breakoutTargetDistance).toBe(240);
	});

	it("zeroes levels on reversion days and leaves unplanned days null", () => {
		const bars = [
			...openingRange(9, 22_000, [10, 10, 10, 10]),
			...openingRange(10, 22_000, [26, 2, 2, 2]),
		];
		const plan = planDailyStrategies(bars, { mode: "ADAPTIVE", timeZone: IST });
		const levelled = applyStrategyLevels(bars, plan, {
			...BREAKOUT_LEVELS,
			mode: "ADAPTIVE",
			timeZone: IST,
		});

		expect(levelled[0].breakoutLongEntry).toBeNull();
		expect(levelled[0].breakoutTargetDistance).toBeNull();
		expect(levelled[4]).toMatchObject({
			breakoutLongEntry: 0,
			breakoutShortEntry: 0,
			breakoutStopDistance: 0,
			breakoutTargetDistance: 0,
		});
	});

	it("zeroes the whole series in fixed REVERSION mode", () => {
		const { bars } = assignLevels(day, {
			...BREAKOUT_LEVELS,
			mode: "REVERSION",
			timeZone: IST,
		});
		expect(bars.every((bar) => bar.breakoutLongEntry === 0)).toBe(true);
		expect(bars.every((bar) => bar.breakoutStopDistance === 0)).toBe(true);
	});

	it("never assigns breakout levels to a day whose opening range spans under 25", () => {
		const next = seededRandom(42);
		for (let trial = 0; trial < 50; trial += 1) {
			const low = 20_000 + Math.floor(next() * 5_000);
			const span = next() * 24.99;
			const morning = [0, 5, 10, 15].map((offset) => {
				const barLow = low + next() * (span / 2);
				return indicatorBar(ist(10, 9, 15 + offset), {
					low: barLow,
					high: barLow + next() * (low + span - barLow),
				});
			});
			const rest = Array.from({ length: 10 }, (_, position) =>
				indicatorBar(ist(10, 10, position * 5), {
					low: low - 200,
					high: low + 200,
				})
			);
			const { plan, bars } = assignLevels([...morning, ...rest], {
				...BREAKOUT_LEVELS,
				mode: "ADAPTIVE",
				timeZone: IST,
			});
			expect(plan.size).toBe(0);
			expect(bars.every((bar) => bar.breakoutLongEntry === null)).toBe(true);
		}
	});
});

describe("resolveStrategyForBar", () => {
	const plan = planDailyStrategies(openingRange(10, 22_000, [30, 30]), {
		mode: "ADAPTIVE",
		timeZone: IST,
	});

	it("reads the plan in adaptive mode", () => {
		expect(resolveStrategyForBar({ sessionDate: "2024-05-10" }, plan, "ADAPTIVE")).toBe(
			"BREAKOUT"
		);
		expect(resolveStrategyForBar({ sessionDate: "2024-05-13" }, plan, "ADAPTIVE")).toBe(
			"REVERSION"
		);
	});

	it("uses the configured strategy otherwise", () => {
		expect(resolveStrategyForBar({ sessionDate: "2024-05-10" }, plan, "REVERSION")).toBe(
			"REVERSION"
		);
	});
});
