import { describe, expect, it } from "vitest";
import { calculateNetPnl } from "./pnl";

describe("calculateNetPnl", () => {
	it("nets a long trade with capped brokerage and stamp duty", () => {
		const pnl = calculateNetPnl({
			entry: 22_000,
			exit: 22_050,
			quantity: 25,
			direction: "BUY",
		});
		expect(pnl.gross).toBe(1_250);
		expect(pnl.turnover).toBe(1_101_250);
		expect(pnl.brokerage).toBe(40);
		expect(pnl.stt).toBe(0);
		expect(pnl.gst).toBeCloseTo(7.2, 10);
		expect(pnl.sebi).toBeCloseTo(1.10125, 10);
		expect(pnl.stampDuty).toBeCloseTo(16.5, 10);
		expect(pnl.net).toBe(1_185.2);
	});

	it("charges securities transaction tax on a short trade", () => {
		const pnl = calculateNetPnl({
			entry: 22_050,
			exit: 22_000,
			quantity: 25,
			direction: "SELL",
		});
		expect(pnl.gross).toBe(1_250);
		expect(pnl.stt).toBeCloseTo(137.5, 10);
		expect(pnl.stampDuty).toBe(0);
		expect(pnl.net).toBe(1_064.2);
	});

	it("uses the uncapped brokerage rate on small turnover", () => {
		const pnl = calculateNetPnl({ entry: 100, exit: 110, quantity: 10, direction: "BUY" });
		expect(pnl.brokerage).toBeCloseTo(1.26, 10);
		expect(pnl.net).toBe(98.48);
	});

	it("reports a loss net of charges", () => {
		const pnl = calculateNetPnl({
			entry: 22_000,
			exit: 21_970,
			quantity: 15,
			direction: "BUY",
		});
		expect(pnl.gross).toBe(-450);
		expect(pnl.net).toBeLessThan(-450);
	});

	it("is deterministic", () => {
		const input = { entry: 21_987.35, exit: 22_011.8, quantity: 45, direction: "SELL" } as const;
		expect(calculateNetPnl(input)).toEqual(calculateNetPnl(input));
	});
});
