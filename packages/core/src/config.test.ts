import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import {
	DEFAULT_ENGINE_CONFIG,
	getConfigMetadata,
	loadAppConfig,
	loadEngineConfig,
	parseEngineConfig,
	parseStrategyMode,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(
	path.dirname(fileURLToPath(import.meta.url)),
	"__tests__",
	"fixtures"
);

describe("parseEngineConfig", () => {
	it("fills every option from defaults for an empty profile", () => {
		expect(parseEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
	});

	it("rejects unknown top-level keys", () => {
		expect(() => parseEngineConfig({ lotsize: 10 })).toThrowError(
			"Unknown engine option(s): lotsize"
		);
	});

	it("rejects unknown keys inside a section", () => {
		expect(() =>
			parseEngineConfig({ healthCheck: { lookahead: 3, grace: 5 } })
		).toThrowError("Unknown healthCheck option(s): grace");
	});

	it("validates numeric ranges", () => {
		expect(() => parseEngineConfig({ maxLots: 0 })).toThrowError(
			"engine.maxLots must be >= 1, got 0"
		);
		expect(() => parseEngineConfig({ lotSize: 7.5 })).toThrowError(
			"engine.lotSize must be an integer"
		);
		expect(() => parseEngineConfig({ breakout: { slFactor: 0 } })).toThrowError(
			"breakout.slFactor must be > 0, got 0"
		);
		expect(() => parseEngineConfig({ maxDailyLoss: "5000" })).toThrowError(
			"engine.maxDailyLoss must be a finite number"
		);
	});

	it("rejects a malformed interval or time zone", () => {
		expect(() => parseEngineConfig({ interval: "5x" })).toThrowError(ConfigError);
		expect(() => parseEngineConfig({ timeZone: "Mars/Olympus" })).toThrowError(
			'engine.timeZone "Mars/Olympus" is not a known time zone'
		);
	});

	it("rejects holidays that are not calendar dates", () => {
		expect(() => parseEngineConfig({ holidays: ["15-08-2024"] })).toThrowError(
			'holidays[0] must be a YYYY-MM-DD date, got "15-08-2024"'
		);
	});

	it("rejects a non-object profile", () => {
		expect(() => parseEngineConfig([])).toThrowError(
			"Engine config must be a JSON object"
		);
	});
});

describe("parseStrategyMode", () => {
	it("accepts any casing", () => {
		expect(parseStrategyMode("adaptive")).toBe("ADAPTIVE");
		expect(parseStrategyMode(" Reversion ")).toBe("REVERSION");
	});

	it("rejects anything else", () => {
		expect(() => parseStrategyMode("momentum")).toThrowError(
			'strategyMode must be one of ADAPTIVE, BREAKOUT, REVERSION; got "momentum"'
		);
	});
});

describe("loadEngineConfig", () => {
	it("loads a profile from the engine directory and merges defaults", () => {
		const config = loadEngineConfig(FIXTURE_DIR, "tight");
		expect(config.symbol).toBe("NIFTY-FUT");
		expect(config.interval).toBe("15m");
		expect(config.strategyMode).toBe("BREAKOUT");
		expect(config.maxLots).toBe(2);
		expect(config.holidays).toEqual(["2024-08-15"]);
		expect(config.breakout).toEqual({
			entryBuffer: 10,
			slFactor: 1.5,
			targetFactor: 4,
		});
		expect(config.reversion).toEqual(DEFAULT_ENGINE_CONFIG.reversion);
	});

	it("records where the profile came from", () => {
		const config = loadEngineConfig(FIXTURE_DIR, "tight.json");
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: path.join(FIXTURE_DIR, "engine", "tight.json"),
			profile: "tight.json",
		});
	});

	it("surfaces a misspelt option instead of ignoring it", () => {
		expect(() => loadEngineConfig(FIXTURE_DIR, "typo")).toThrowError(
			"Unknown reversion option(s): deviaton"
		);
	});

	it("reports invalid JSON with the file path", () => {
		expect(() => loadEngineConfig(FIXTURE_DIR, "truncated")).toThrowError(
			/truncated\.json is not valid JSON/
		);
	});

	it("reports a missing profile", () => {
		expect(() => loadEngineConfig(FIXTURE_DIR, "absent")).toThrowError(
			/Engine config not found/
		);
	});
});

describe("loadAppConfig", () => {
	const touched = ["EXECUTION_MODE", "TRADE_SYMBOL", "ENGINE_PROFILE"];
	const saved = touched.map((key) => [key, process.env[key]] as const);

	afterEach(() => {
		for (const [key, value] of saved) {
			if (value === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}
	});

	it("lets the environment override execution mode and symbol", () => {
		process.env.EXECUTION_MODE = "LIVE";
		process.env.TRADE_SYMBOL = "FINNIFTY-FUT";
		process.env.ENGINE_PROFILE = "tight";

		const { env, engine } = loadAppConfig({ configDir: FIXTURE_DIR });

		expect(env.engineProfile).toBe("tight");
		expect(engine.executionMode).toBe("live");
		expect(engine.symbol).toBe("FINNIFTY-FUT");
		expect(engine.interval).toBe("15m");
		expect(getConfigMetadata(engine)?.profile).toBe("tight");
	});
});
