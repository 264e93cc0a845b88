import type { Bar } from "@openrange/core";
import { describe, expect, it } from "vitest";
import { postEntryHealthCheck } from "./healthCheck";

const FIVE_MINUTES = 5 * 60_000;
const ENTRY_TS = Date.UTC(2024, 4, 10, 4, 30, 0);

const series = (entry: { open: number; close: number }, closes: number[]): Bar[] => [
	{ timestamp: ENTRY_TS, open: entry.open, high: 0, low: 0, close: entry.close, volume: 1 },
	...closes.map((close, index) => ({
		timestamp: ENTRY_TS + (index + 1) * FIVE_MINUTES,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	})),
];

describe("postEntryHealthCheck", () => {
	it("passes a bullish entry that follows through", () => {
		const result = postEntryHealthCheck(
			series({ open: 990, close: 1_000 }, [1_001, 1_002, 1_000.5]),
			ENTRY_TS
		);
		expect(result).toMatchObject({ verdict: "valid", passed: true, direction: "BUY" });
		if (result.verdict === "valid") {
			expect(result.movePct).toBeCloseTo(0.2, 10);
		}
	});

	it("fails a move below the threshold", () => {
		const result = postEntryHealthCheck(
			series({ open: 990, close: 1_000 }, [1_001, 1_001.2, 999]),
			ENTRY_TS
		);
		expect(result).toMatchObject({ verdict: "valid", passed: false });
		if (result.verdict === "valid") {
			expect(result.movePct).toBeCloseTo(0.12, 10);
		}
	});

	it("measures bearish entries against the lowest close", () => {
		const result = postEntryHealthCheck(
			series({ open: 1_010, close: 1_000 }, [999, 998, 1_003]),
			ENTRY_TS
		);
		expect(result).toMatchObject({ verdict: "valid", passed: true, direction: "SELL" });
	});

	it("only looks at the lookahead window", () => {
		const result = postEntryHealthCheck(
			series({ open: 990, close: 1_000 }, [1_000, 1_000, 1_000, 1_100]),
			ENTRY_TS
		);
		expect(result).toMatchObject({ verdict: "valid", passed: false, movePct: 0 });
	});

	it("is invalid without the entry bar or enough bars after it", () => {
		const bars = series({ open: 990, close: 1_000 }, [1_001, 1_002]);
		expect(postEntryHealthCheck(bars, ENTRY_TS)).toEqual({
			verdict: "invalid",
			reason: "insufficient_bars",
		});
		expect(postEntryHealthCheck(bars, ENTRY_TS + 1)).toEqual({
			verdict: "invalid",
			reason: "entry_bar_missing",
		});
		expect(postEntryHealthCheck(bars, ENTRY_TS, { lookahead: 2 }).verdict).toBe("valid");
	});
});
