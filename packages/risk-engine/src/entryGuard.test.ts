import type { IndicatorBar } from "@openrange/core";
import { describe, expect, it } from "vitest";
import { EntryGuard, type EntryGuardConfig } from "./entryGuard";

const IST_OFFSET_MS = 5.5 * 60 * 60_000;
const ist = (hour: number, minute: number): number =>
	Date.UTC(2024, 4, 10, hour, minute) - IST_OFFSET_MS;

const config: EntryGuardConfig = {
	timeZone: "Asia/Kolkata",
	cooldownMinutes: 5,
	maxDailyLoss: 5_000,
	weekendTesting: false,
	lotSize: 15,
	marginPerLot: 250_000,
	maxLots: 4,
};

const withAtrs = (atrs: (number | null)[], start: number): IndicatorBar[] =>
	atrs.map((atr14, index) => ({
		timestamp: start + index * 5 * 60_000,
		open: 22_000,
		high: 22_020,
		low: 21_990,
		close: 22_010,
		volume: 1_000,
		emaShort: 22_005,
		emaLong: 22_000,
		rsi14: 50,
		atr14,
		macd: 0,
		typicalPrice: 22_006.67,
		openPrev1: null,
		closePrev1: null,
		openPrev2: null,
		closePrev2: null,
		prevClose: null,
	}));

describe("EntryGuard", () => {
	const guard = new EntryGuard(config);

	it("tracks the cooldown after an exit", () => {
		const exit = ist(11, 0);
		expect(guard.inCooldown({ lastExitTime: null }, exit)).toBe(false);
		expect(guard.inCooldown({ lastExitTime: exit }, exit + 4 * 60_000)).toBe(true);
		expect(guard.cooldownRemainingMs({ lastExitTime: exit }, exit + 4 * 60_000)).toBe(60_000);
		expect(guard.inCooldown({ lastExitTime: exit }, exit + 5 * 60_000)).toBe(false);
	});

	it("flags the daily loss limit at the threshold", () => {
		expect(guard.dailyLossBreached(-5_000)).toBe(true);
		expect(guard.dailyLossBreached(-4_999.99)).toBe(false);
		expect(guard.dailyLossBreached(1_200)).toBe(false);
	});

	describe("lateSessionGate", () => {
		it("does not apply before 14:30", () => {
			expect(guard.lateSessionGate(withAtrs([10, 10, 10, 12], ist(14, 10)), ist(14, 29))).toEqual({
				status: "not_late",
			});
		});

		it("allows entries when ATR is well above its mean", () => {
			const verdict = guard.lateSessionGate(withAtrs([10, 10, 10, 16], ist(14, 20)), ist(14, 35));
			expect(verdict.status).toBe("allowed");
			if (verdict.status === "allowed") {
				expect(verdict.atr).toBe(16);
				expect(verdict.threshold).toBeCloseTo(13.8, 10);
			}
		});

		it("blocks entries on ordinary volatility", () => {
			const verdict = guard.lateSessionGate(withAtrs([null, 10, 10, 10, 12], ist(14, 15)), ist(14, 35));
			expect(verdict).toMatchObject({
				status: "blocked",
				atr: 12,
				reason: "ATR 12.00 below late-session threshold 12.60",
			});
		});

		it("blocks entries when the last ATR is missing", () => {
			expect(guard.lateSessionGate(withAtrs([10, null], ist(14, 40)), ist(14, 45))).toEqual({
				status: "blocked",
				atr: null,
				threshold: null,
				reason: "ATR unavailable after 14:30",
			});
		});
	});

	it("reaches the cut-off at 15:25 unless weekend testing", () => {
		expect(guard.reachedCutoff(ist(15, 24))).toBe(false);
		expect(guard.reachedCutoff(ist(15, 25))).toBe(true);
		expect(new EntryGuard({ ...config, weekendTesting: true }).reachedCutoff(ist(15, 25))).toBe(false);
	});

	it("sizes positions in whole lots between one and the cap", () => {
		expect(guard.sizePosition(600_000)).toEqual({ lots: 2, quantity: 30 });
		expect(guard.sizePosition(100_000)).toEqual({ lots: 1, quantity: 15 });
		expect(guard.sizePosition(2_000_000)).toEqual({ lots: 4, quantity: 60 });
		expect(guard.sizePosition(Number.NaN)).toEqual({ lots: 1, quantity: 15 });
	});
});
