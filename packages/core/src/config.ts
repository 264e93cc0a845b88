import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { ConfigError } from "./errors";
import { DEFAULT_EXCHANGE_TIME_ZONE } from "./time/constants";
import { parseTimeframe } from "./time/time";
import type { ExecutionMode, StrategyName } from "./types";

export type StrategyMode = "ADAPTIVE" | StrategyName;

export interface BreakoutConfig {
	/** Added above the opening-range high / below the low. */
	entryBuffer: number;
	slFactor: number;
	targetFactor: number;
}

export interface ReversionConfig {
	/** Band half-width as a fraction of price. */
	deviation: number;
	slMultiplier: number;
	targetMultiplier: number;
	rrThreshold: number;
}

export interface HealthCheckConfig {
	lookahead: number;
	thresholdPct: number;
	graceMinutes: number;
}

export interface RetryConfig {
	attempts: number;
	baseDelayMs: number;
	factor: number;
}

export interface EngineConfig {
	symbol: string;
	interval: string;
	lookbackDays: number;
	timeZone: string;
	executionMode: ExecutionMode;
	strategyMode: StrategyMode;
	lotSize: number;
	marginPerLot: number;
	maxLots: number;
	fallbackMargin: number;
	sleepIntervalSeconds: number;
	cooldownMinutes: number;
	maxDailyLoss: number;
	minBars: number;
	weekendTesting: boolean;
	holidays: string[];
	breakout: BreakoutConfig;
	reversion: ReversionConfig;
	healthCheck: HealthCheckConfig;
	retry: RetryConfig;
}

export interface EnvConfig {
	executionMode?: ExecutionMode;
	exchangeId: string;
	apiKey: string;
	apiSecret: string;
	symbol?: string;
	engineProfile: string;
	tradeStorePath?: string;
}

export type ConfigSourceType = "file" | "defaults";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	symbol: "BANKNIFTY-FUT",
	interval: "5m",
	lookbackDays: 4,
	timeZone: DEFAULT_EXCHANGE_TIME_ZONE,
	executionMode: "paper",
	strategyMode: "ADAPTIVE",
	lotSize: 15,
	marginPerLot: 250_000,
	maxLots: 4,
	fallbackMargin: 250_000,
	sleepIntervalSeconds: 60,
	cooldownMinutes: 5,
	maxDailyLoss: 5_000,
	minBars: 15,
	weekendTesting: false,
	holidays: [],
	breakout: {
		entryBuffer: 5,
		slFactor: 1.5,
		targetFactor: 4,
	},
	reversion: {
		deviation: 0.0015,
		slMultiplier: 0.8,
		targetMultiplier: 4,
		rrThreshold: 1.2,
	},
	healthCheck: {
		lookahead: 3,
		thresholdPct: 0.15,
		graceMinutes: 15,
	},
	retry: {
		attempts: 5,
		baseDelayMs: 1_000,
		factor: 3,
	},
};

const CONFIG_META_SYMBOL = Symbol.for("openrange.config.meta");

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: metadata,
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null => {
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	if (!meta || typeof meta !== "object" || !("source" in meta)) {
		return null;
	}
	const source: unknown = meta.source;
	if (source === "file" || source === "defaults") {
		const pathValue = Reflect.get(meta, "path");
		const profileValue = Reflect.get(meta, "profile");
		return {
			source,
			path: typeof pathValue === "string" ? pathValue : undefined,
			profile: typeof profileValue === "string" ? profileValue : undefined,
		};
	}
	return null;
};

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const assertKnownKeys = (
	source: JsonObject,
	allowed: readonly string[],
	scope: string
): void => {
	const unknownKeys = Object.keys(source).filter((key) => !allowed.includes(key));
	if (unknownKeys.length) {
		throw new ConfigError(
			`Unknown ${scope} option(s): ${unknownKeys.join(", ")}`
		);
	}
};

interface NumberRule {
	min?: number;
	exclusiveMin?: number;
	integer?: boolean;
}

const readNumber = (
	source: JsonObject,
	key: string,
	fallback: number,
	scope: string,
	rule: NumberRule = {}
): number => {
	const value = source[key];
	if (value === undefined) {
		return fallback;
	}
	const field = `${scope}.${key}`;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(`${field} must be a finite number`);
	}
	if (rule.integer && !Number.isInteger(value)) {
		throw new ConfigError(`${field} must be an integer`);
	}
	if (rule.min !== undefined && value < rule.min) {
		throw new ConfigError(`${field} must be >= ${rule.min}, got ${value}`);
	}
	if (rule.exclusiveMin !== undefined && value <= rule.exclusiveMin) {
		throw new ConfigError(`${field} must be > ${rule.exclusiveMin}, got ${value}`);
	}
	return value;
};

const readString = (
	source: JsonObject,
	key: string,
	fallback: string,
	scope: string
): string => {
	const value = source[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim().length) {
		throw new ConfigError(`${scope}.${key} must be a non-empty string`);
	}
	return value.trim();
};

const readBoolean = (
	source: JsonObject,
	key: string,
	fallback: boolean,
	scope: string
): boolean => {
	const value = source[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new ConfigError(`${scope}.${key} must be a boolean`);
	}
	return value;
};

const readSection = (source: JsonObject, key: string, scope: string): JsonObject => {
	const value = source[key];
	if (value === undefined) {
		return {};
	}
	if (!isJsonObject(value)) {
		throw new ConfigError(`${scope}.${key} must be an object`);
	}
	return value;
};

export const normalizeExecutionMode = (value: string | undefined): ExecutionMode =>
	value?.trim().toLowerCase() === "live" ? "live" : "paper";

export const parseStrategyMode = (value: unknown): StrategyMode => {
	if (typeof value !== "string") {
		throw new ConfigError("strategyMode must be a string");
	}
	const normalized = value.trim().toUpperCase();
	if (
		normalized === "ADAPTIVE" ||
		normalized === "BREAKOUT" ||
		normalized === "REVERSION"
	) {
		return normalized;
	}
	throw new ConfigError(
		`strategyMode must be one of ADAPTIVE, BREAKOUT, REVERSION; got "${value}"`
	);
};

const readExecutionMode = (
	source: JsonObject,
	fallback: ExecutionMode
): ExecutionMode => {
	const value = source.executionMode;
	if (value === undefined) {
		return fallback;
	}
	if (value === "paper" || value === "live") {
		return value;
	}
	throw new ConfigError('engine.executionMode must be "paper" or "live"');
};

const HOLIDAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const parseHolidays = (value: unknown): string[] => {
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value)) {
		throw new ConfigError("holidays must be an array of YYYY-MM-DD strings");
	}
	return value.map((entry, index) => {
		if (
			typeof entry !== "string" ||
			!HOLIDAY_PATTERN.test(entry) ||
			Number.isNaN(Date.parse(`${entry}T00:00:00Z`))
		) {
			throw new ConfigError(
				`holidays[${index}] must be a YYYY-MM-DD date, got ${JSON.stringify(entry)}`
			);
		}
		return entry;
	});
};

const isValidTimeZone = (timeZone: string): boolean => {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone });
		return true;
	} catch {
		return false;
	}
};

const TOP_LEVEL_KEYS: readonly (keyof EngineConfig)[] = [
	"symbol",
	"interval",
	"lookbackDays",
	"timeZone",
	"executionMode",
	"strategyMode",
	"lotSize",
	"marginPerLot",
	"maxLots",
	"fallbackMargin",
	"sleepIntervalSeconds",
	"cooldownMinutes",
	"maxDailyLoss",
	"minBars",
	"weekendTesting",
	"holidays",
	"breakout",
	"reversion",
	"healthCheck",
	"retry",
];

/**
 * Validates a parsed engine profile against the enumerated option set and
 * fills in defaults. Unknown keys are rejected at every level.
 */
export const parseEngineConfig = (raw: unknown): EngineConfig => {
	if (!isJsonObject(raw)) {
		throw new ConfigError("Engine config must be a JSON object");
	}
	assertKnownKeys(raw, TOP_LEVEL_KEYS, "engine");
	const defaults = DEFAULT_ENGINE_CONFIG;

	const breakoutRaw = readSection(raw, "breakout", "engine");
	assertKnownKeys(breakoutRaw, ["entryBuffer", "slFactor", "targetFactor"], "breakout");
	const reversionRaw = readSection(raw, "reversion", "engine");
	assertKnownKeys(
		reversionRaw,
		["deviation", "slMultiplier", "targetMultiplier", "rrThreshold"],
		"reversion"
	);
	const healthRaw = readSection(raw, "healthCheck", "engine");
	assertKnownKeys(healthRaw, ["lookahead", "thresholdPct", "graceMinutes"], "healthCheck");
	const retryRaw = readSection(raw, "retry", "engine");
	assertKnownKeys(retryRaw, ["attempts", "baseDelayMs", "factor"], "retry");

	const interval = readString(raw, "interval", defaults.interval, "engine");
	try {
		parseTimeframe(interval);
	} catch (error) {
		throw new ConfigError(
			`engine.interval: ${error instanceof Error ? error.message : String(error)}`
		);
	}

	const timeZone = readString(raw, "timeZone", defaults.timeZone, "engine");
	if (!isValidTimeZone(timeZone)) {
		throw new ConfigError(`engine.timeZone "${timeZone}" is not a known time zone`);
	}

	return {
		symbol: readString(raw, "symbol", defaults.symbol, "engine"),
		interval,
		lookbackDays: readNumber(raw, "lookbackDays", defaults.lookbackDays, "engine", {
			min: 1,
			integer: true,
		}),
		timeZone,
		executionMode: readExecutionMode(raw, defaults.executionMode),
		strategyMode:
			raw.strategyMode === undefined
				? defaults.strategyMode
				: parseStrategyMode(raw.strategyMode),
		lotSize: readNumber(raw, "lotSize", defaults.lotSize, "engine", {
			min: 1,
			integer: true,
		}),
		marginPerLot: readNumber(raw, "marginPerLot", defaults.marginPerLot, "engine", {
			exclusiveMin: 0,
		}),
		maxLots: readNumber(raw, "maxLots", defaults.maxLots, "engine", {
			min: 1,
			integer: true,
		}),
		fallbackMargin: readNumber(
			raw,
			"fallbackMargin",
			defaults.fallbackMargin,
			"engine",
			{ min: 0 }
		),
		sleepIntervalSeconds: readNumber(
			raw,
			"sleepIntervalSeconds",
			defaults.sleepIntervalSeconds,
			"engine",
			{ exclusiveMin: 0 }
		),
		cooldownMinutes: readNumber(
			raw,
			"cooldownMinutes",
			defaults.cooldownMinutes,
			"engine",
			{ min: 0 }
		),
		maxDailyLoss: readNumber(raw, "maxDailyLoss", defaults.maxDailyLoss, "engine", {
			min: 0,
		}),
		minBars: readNumber(raw, "minBars", defaults.minBars, "engine", {
			min: 1,
			integer: true,
		}),
		weekendTesting: readBoolean(
			raw,
			"weekendTesting",
			defaults.weekendTesting,
			"engine"
		),
		holidays: parseHolidays(raw.holidays),
		breakout: {
			entryBuffer: readNumber(
				breakoutRaw,
				"entryBuffer",
				defaults.breakout.entryBuffer,
				"breakout",
				{ min: 0 }
			),
			slFactor: readNumber(
				breakoutRaw,
				"slFactor",
				defaults.breakout.slFactor,
				"breakout",
				{ exclusiveMin: 0 }
			),
			targetFactor: readNumber(
				breakoutRaw,
				"targetFactor",
				defaults.breakout.targetFactor,
				"breakout",
				{ exclusiveMin: 0 }
			),
		},
		reversion: {
			deviation: readNumber(
				reversionRaw,
				"deviation",
				defaults.reversion.deviation,
				"reversion",
				{ min: 0 }
			),
			slMultiplier: readNumber(
				reversionRaw,
				"slMultiplier",
				defaults.reversion.slMultiplier,
				"reversion",
				{ exclusiveMin: 0 }
			),
			targetMultiplier: readNumber(
				reversionRaw,
				"targetMultiplier",
				defaults.reversion.targetMultiplier,
				"reversion",
				{ exclusiveMin: 0 }
			),
			rrThreshold: readNumber(
				reversionRaw,
				"rrThreshold",
				defaults.reversion.rrThreshold,
				"reversion",
				{ min: 0 }
			),
		},
		healthCheck: {
			lookahead: readNumber(
				healthRaw,
				"lookahead",
				defaults.healthCheck.lookahead,
				"healthCheck",
				{ min: 1, integer: true }
			),
			thresholdPct: readNumber(
				healthRaw,
				"thresholdPct",
				defaults.healthCheck.thresholdPct,
				"healthCheck",
				{ min: 0 }
			),
			graceMinutes: readNumber(
				healthRaw,
				"graceMinutes",
				defaults.healthCheck.graceMinutes,
				"healthCheck",
				{ min: 0 }
			),
		},
		retry: {
			attempts: readNumber(retryRaw, "attempts", defaults.retry.attempts, "retry", {
				min: 1,
				integer: true,
			}),
			baseDelayMs: readNumber(
				retryRaw,
				"baseDelayMs",
				defaults.retry.baseDelayMs,
				"retry",
				{ min: 0 }
			),
			factor: readNumber(retryRaw, "factor", defaults.retry.factor, "retry", {
				min: 1,
			}),
		},
	};
};

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git", "config"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = current;
			return current;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const loadEnvConfig = (envFile?: string): EnvConfig => {
	loadEnvFiles(findWorkspaceRoot(), envFile);
	const mode = readOptionalEnvVar("EXECUTION_MODE");
	return {
		executionMode: mode ? normalizeExecutionMode(mode) : undefined,
		exchangeId: readOptionalEnvVar("EXCHANGE_ID") ?? "paper",
		apiKey: readOptionalEnvVar("EXCHANGE_API_KEY") ?? "",
		apiSecret: readOptionalEnvVar("EXCHANGE_API_SECRET") ?? "",
		symbol: readOptionalEnvVar("TRADE_SYMBOL"),
		engineProfile: readOptionalEnvVar("ENGINE_PROFILE") ?? "default",
		tradeStorePath: readOptionalEnvVar("TRADE_STORE_PATH"),
	};
};

export const resolveEngineConfigPath = (configDir: string, profile: string): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "engine", fileName),
		path.join(configDir, fileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigError(
		`Engine config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadEngineConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): EngineConfig => {
	const configPath = resolveEngineConfigPath(configDir, profile);
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (error) {
		throw new ConfigError(
			`Engine config at ${configPath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
	return withConfigMetadata(parseEngineConfig(parsed), {
		source: "file",
		path: configPath,
		profile,
	});
};

export interface AppConfig {
	env: EnvConfig;
	engine: EngineConfig;
}

export interface ConfigLoadOptions {
	envFile?: string;
	configDir?: string;
	profile?: string;
}

/**
 * Environment values win over the profile for the execution mode and symbol.
 */
export const loadAppConfig = (options: ConfigLoadOptions = {}): AppConfig => {
	const env = loadEnvConfig(options.envFile);
	const engine = loadEngineConfig(
		options.configDir ?? getDefaultConfigDir(),
		options.profile ?? env.engineProfile
	);
	const merged = withConfigMetadata(
		{
			...engine,
			executionMode: env.executionMode ?? engine.executionMode,
			symbol: env.symbol ?? engine.symbol,
		},
		getConfigMetadata(engine) ?? { source: "defaults" }
	);
	return { env, engine: merged };
};
