/**
 * Time constants for consistent time calculations across the codebase.
 * All values are in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_EXCHANGE_TIME_ZONE = "Asia/Kolkata";

/**
 * Exchange session clock, as "HH:mm" in exchange-local time.
 */
export const SESSION_OPEN = "09:15";
export const SESSION_CLOSE = "15:30";
export const OPENING_RANGE_START = "09:15";
export const OPENING_RANGE_END = "09:30";
export const BREAKOUT_WINDOW_START = "09:30";
export const BREAKOUT_WINDOW_END = "15:25";
export const LATE_SESSION_START = "14:30";
export const ENTRY_CUTOFF = "15:25";
