export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	if (normalized in LEVELS) {
		return normalized as LogLevel;
	}
	return "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export type LogSink = (record: BaseLogPayload) => void;

const consoleSink: LogSink = (record) => {
	if (prettyEnabled) {
		try {
			printPretty(record);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(record));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts: record.ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
};

let activeSink: LogSink = consoleSink;

/**
 * Routes log records somewhere other than the console (tests, alerting).
 * Passing null restores console output. Returns the previous sink.
 */
export const setLogSink = (sink: LogSink | null): LogSink => {
	const previous = activeSink;
	activeSink = sink ?? consoleSink;
	return previous;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	activeSink(sanitize({ ts, ...payload }));
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): BaseLogPayload => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen) as BaseLogPayload;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(
			value as Record<string, unknown>
		)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "trade_opened": {
				printTradeOpened(rest);
				break;
			}
			case "trade_closed": {
				printTradeClosed(rest);
				break;
			}
			case "decision_rejected": {
				printDecisionRejected(rest);
				break;
			}
			case "stop_loss_trailed": {
				printStopTrailed(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const fmtNumber = (value: unknown): string =>
	typeof value === "number" ? value.toFixed(2) : "n/a";

const fmtValue = (value: unknown): string =>
	value === undefined || value === null ? "-" : String(value);

const printTradeOpened = (rest: Record<string, unknown>): void => {
	const { tradeId, direction, strategy, entryPrice, stopLoss, targetPrice, quantity } =
		rest as TradeOpenedPrettyPayload;
	console.table([
		{
			tradeId,
			direction,
			strategy,
			entry: entryPrice,
			stopLoss,
			target: targetPrice,
			quantity,
		},
	]);
};

const printTradeClosed = (rest: Record<string, unknown>): void => {
	const { tradeId, direction, entryPrice, exitPrice, pnl, reason } =
		rest as TradeClosedPrettyPayload;
	console.log(
		[
			`${fmtValue(direction)} ${fmtValue(tradeId)}`,
			`entry=${fmtNumber(entryPrice)}`,
			`exit=${fmtNumber(exitPrice)}`,
			`pnl=${fmtNumber(pnl)}`,
			`reason=${fmtValue(reason)}`,
		].join(" | ")
	);
};

const printDecisionRejected = (rest: Record<string, unknown>): void => {
	const { strategy, close, reason } = rest as DecisionRejectedPrettyPayload;
	console.log(
		`${fmtValue(strategy)} close=${fmtNumber(close)} rejected: ${fmtValue(reason)}`
	);
};

const printStopTrailed = (rest: Record<string, unknown>): void => {
	const { price, previousStop, stopLoss } = rest as StopTrailedPrettyPayload;
	console.log(
		`price=${fmtNumber(price)} stop ${fmtNumber(previousStop)} -> ${fmtNumber(stopLoss)}`
	);
};

interface TradeOpenedPrettyPayload {
	tradeId?: string;
	direction?: string;
	strategy?: Nullable<string>;
	entryPrice?: number;
	stopLoss?: number;
	targetPrice?: number;
	quantity?: number;
}

interface TradeClosedPrettyPayload {
	tradeId?: string;
	direction?: string;
	entryPrice?: number;
	exitPrice?: number;
	pnl?: number;
	reason?: string;
}

interface DecisionRejectedPrettyPayload {
	strategy?: Nullable<string>;
	close?: number;
	reason?: string;
}

interface StopTrailedPrettyPayload {
	price?: number;
	previousStop?: number;
	stopLoss?: number;
}
