/**
 * Exchange-local wall clock helpers. Bars and trade times are stored as UTC
 * epoch milliseconds; session windows are defined in exchange-local time.
 */

export interface ExchangeClockReading {
	/** Exchange-local calendar date, `YYYY-MM-DD`. */
	date: string;
	/** Minutes since exchange-local midnight. */
	minuteOfDay: number;
	second: number;
	/** 0 = Sunday ... 6 = Saturday */
	weekday: number;
}

const WEEKDAYS: Record<string, number> = {
	Sun: 0,
	Mon: 1,
	Tue: 2,
	Wed: 3,
	Thu: 4,
	Fri: 5,
	Sat: 6,
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
	let formatter = formatterCache.get(timeZone);
	if (!formatter) {
		formatter = new Intl.DateTimeFormat("en-US", {
			timeZone,
			hourCycle: "h23",
			year: "numeric",
			month: "2-digit",
			day: "2-digit",
			hour: "2-digit",
			minute: "2-digit",
			second: "2-digit",
			weekday: "short",
		});
		formatterCache.set(timeZone, formatter);
	}
	return formatter;
};

interface WallClockParts {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	weekday: number;
}

const readWallClock = (ts: number, timeZone: string): WallClockParts => {
	const parts = getFormatter(timeZone).formatToParts(new Date(ts));
	const lookup: Record<string, string> = {};
	for (const part of parts) {
		lookup[part.type] = part.value;
	}
	return {
		year: Number(lookup.year),
		month: Number(lookup.month),
		day: Number(lookup.day),
		hour: Number(lookup.hour),
		minute: Number(lookup.minute),
		second: Number(lookup.second),
		weekday: WEEKDAYS[lookup.weekday] ?? 0,
	};
};

const pad = (value: number, width = 2): string =>
	String(value).padStart(width, "0");

export const getExchangeClock = (
	ts: number,
	timeZone: string
): ExchangeClockReading => {
	const wall = readWallClock(ts, timeZone);
	return {
		date: `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`,
		minuteOfDay: wall.hour * 60 + wall.minute,
		second: wall.second,
		weekday: wall.weekday,
	};
};

export const exchangeDate = (ts: number, timeZone: string): string =>
	getExchangeClock(ts, timeZone).date;

/**
 * Offset of the zone from UTC at `ts`, in milliseconds (positive east of UTC).
 */
export const zoneOffsetMs = (ts: number, timeZone: string): number => {
	const wholeSecond = ts - (((ts % 1000) + 1000) % 1000);
	const wall = readWallClock(wholeSecond, timeZone);
	const asUtc = Date.UTC(
		wall.year,
		wall.month - 1,
		wall.day,
		wall.hour,
		wall.minute,
		wall.second
	);
	return asUtc - wholeSecond;
};

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

/** "09:15" → 555 */
export const parseClockTime = (value: string): number => {
	const match = value.trim().match(CLOCK_PATTERN);
	if (!match) {
		throw new Error(`Invalid clock time "${value}". Expected "HH:mm"`);
	}
	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	if (hours > 23 || minutes > 59) {
		throw new Error(`Invalid clock time "${value}". Expected "HH:mm"`);
	}
	return hours * 60 + minutes;
};

/**
 * Inclusive on both ends, compared at minute resolution with seconds taken
 * into account for the upper bound ("15:25" admits 15:25:00 only).
 */
export const isWithinClockWindow = (
	ts: number,
	start: string,
	end: string,
	timeZone: string
): boolean => {
	const clock = getExchangeClock(ts, timeZone);
	const startMinute = parseClockTime(start);
	const endMinute = parseClockTime(end);
	if (clock.minuteOfDay < startMinute) {
		return false;
	}
	if (clock.minuteOfDay > endMinute) {
		return false;
	}
	return clock.minuteOfDay < endMinute || clock.second === 0;
};

export const isAtOrAfterClock = (
	ts: number,
	clockTime: string,
	timeZone: string
): boolean =>
	getExchangeClock(ts, timeZone).minuteOfDay >= parseClockTime(clockTime);

const NAIVE_TIMESTAMP =
	/^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;
const EXPLICIT_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Resolves a raw timestamp to epoch milliseconds. Naive date-time strings (no
 * offset) are interpreted in the exchange time zone. Returns null when the
 * value cannot be resolved.
 */
export const parseExchangeTimestamp = (
	value: number | string | Date | null | undefined,
	timeZone: string
): number | null => {
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (value instanceof Date) {
		const ms = value.getTime();
		return Number.isFinite(ms) ? ms : null;
	}

	const trimmed = value.trim();
	if (!trimmed.length) {
		return null;
	}
	if (EXPLICIT_ZONE.test(trimmed)) {
		const parsed = Date.parse(trimmed);
		return Number.isFinite(parsed) ? parsed : null;
	}

	const match = trimmed.match(NAIVE_TIMESTAMP);
	if (!match) {
		return null;
	}
	const [, year, month, day, hour, minute, second, millis] = match;
	const wallAsUtc = Date.UTC(
		Number(year),
		Number(month) - 1,
		Number(day),
		Number(hour ?? 0),
		Number(minute ?? 0),
		Number(second ?? 0),
		Number((millis ?? "0").padEnd(3, "0"))
	);
	if (!Number.isFinite(wallAsUtc)) {
		return null;
	}
	const firstGuess = wallAsUtc - zoneOffsetMs(wallAsUtc, timeZone);
	return wallAsUtc - zoneOffsetMs(firstGuess, timeZone);
};

/** ISO-8601 rendering with the exchange offset, e.g. `2024-05-10T09:20:00+05:30`. */
export const formatExchangeTimestamp = (ts: number, timeZone: string): string => {
	const offset = zoneOffsetMs(ts, timeZone);
	const local = new Date(ts + offset).toISOString().slice(0, 19);
	const sign = offset >= 0 ? "+" : "-";
	const absMinutes = Math.abs(Math.round(offset / 60_000));
	return `${local}${sign}${pad(Math.floor(absMinutes / 60))}:${pad(absMinutes % 60)}`;
};
