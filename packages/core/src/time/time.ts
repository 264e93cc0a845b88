/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */

export interface ParsedTimeframe {
	unit: "m" | "h" | "d";
	n: number;
	ms: number;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(TIMEFRAME_PATTERN);

	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (unit) {
		case "m":
			return { unit, n, ms: n * MINUTE_MS };
		case "h":
			return { unit, n, ms: n * HOUR_MS };
		case "d":
			return { unit, n, ms: n * DAY_MS };
		default:
			throw new Error(`Invalid timeframe unit: "${unit}" in "${timeframe}"`);
	}
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;
