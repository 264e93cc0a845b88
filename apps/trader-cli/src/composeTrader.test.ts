import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	ConfigError,
	DEFAULT_ENGINE_CONFIG,
	getConfigMetadata,
	setLogSink,
	withConfigMetadata,
	type AppConfig,
	type BaseLogPayload,
	type EnvConfig,
} from "@openrange/core";
import type { CcxtCredentials, CcxtVenue } from "@openrange/exchange-ccxt";
import type { TraderCliOptions } from "./cliArgs";
import { applyCliOverrides, composeTrader, resumeOpenTrade } from "./composeTrader";

const IST_OFFSET_MS = 5.5 * 60 * 60_000;
const FIVE_MINUTES = 5 * 60_000;
const ist = (day: number, hour: number, minute: number): number =>
	Date.UTC(2024, 4, day, hour, minute) - IST_OFFSET_MS;

const risingBars = (count = 16) =>
	Array.from({ length: count }, (_, index) => {
		const open = 22_000 + index * 2;
		const close = open + 10;
		return {
			timestamp: ist(10, 9, 15) + index * FIVE_MINUTES,
			open,
			high: close + 10,
			low: open - 10,
			close,
			volume: index === count - 1 ? 2_000 : 1_000,
		};
	});

const env = (overrides: Partial<EnvConfig> = {}): EnvConfig => ({
	exchangeId: "paper",
	apiKey: "",
	apiSecret: "",
	engineProfile: "default",
	...overrides,
});

const app = (envOverrides: Partial<EnvConfig> = {}): AppConfig => ({
	env: env(envOverrides),
	engine: DEFAULT_ENGINE_CONFIG,
});

const baseOptions: TraderCliOptions = { help: false };

class RecordingVenue implements CcxtVenue {
	readonly id = "binance";

	async fetchOHLCV(): Promise<[]> {
		return [];
	}

	async fetchFreeBalance(): Promise<number> {
		return 600_000;
	}

	async createStopMarketOrder(): Promise<{ id: string }> {
		return { id: "venue-order-1" };
	}
}

describe("applyCliOverrides", () => {
	it("prefers flags over the loaded profile", () => {
		const config = applyCliOverrides(DEFAULT_ENGINE_CONFIG, {
			help: false,
			executionMode: "live",
			strategyMode: "BREAKOUT",
		});

		expect(config.executionMode).toBe("live");
		expect(config.strategyMode).toBe("BREAKOUT");
		expect(config.symbol).toBe("BANKNIFTY-FUT");
	});

	it("keeps the profile source on the overridden config", () => {
		const loaded = withConfigMetadata(
			{ ...DEFAULT_ENGINE_CONFIG },
			{ source: "file", path: "config/engine.tight.json", profile: "tight" }
		);

		const config = applyCliOverrides(loaded, { help: false, symbol: "NIFTY-FUT" });

		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: "config/engine.tight.json",
			profile: "tight",
		});
	});
});

describe("composeTrader", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "openrange-cli-"));
		setLogSink((_record: BaseLogPayload) => undefined);
	});

	afterEach(async () => {
		setLogSink(null);
		await rm(dir, { recursive: true, force: true });
	});

	it("runs a paper session over a bars file", async () => {
		const barsFile = path.join(dir, "bars.json");
		await writeFile(barsFile, JSON.stringify(risingBars()));
		const storePath = path.join(dir, "trades.jsonl");

		const { session, store, state } = composeTrader(app(), {
			...baseOptions,
			barsFile,
			storePath,
			strategyMode: "BREAKOUT",
		});
		const report = await session.runCycle(ist(10, 10, 31));

		expect(report).toMatchObject({
			action: "opened",
			quantity: 15,
			decision: { signal: "BUY", entry: 22_040 },
		});
		expect(state.open).toBe(true);
		expect(store.tradesPath).toBe(storePath);
		expect(await store.readEvents()).toHaveLength(1);
		expect(await store.fetchSummary()).toMatchObject({ totalTrades: 0 });
	});

	it("resumes a trade left open in the store", async () => {
		const storePath = path.join(dir, "trades.jsonl");
		const record = {
			tradeId: "trade-9",
			symbol: "BANKNIFTY-FUT",
			direction: "BUY",
			strategy: "BREAKOUT",
			entryTime: "2024-05-10T10:00:00+05:30",
			entryPrice: 22_040,
			stopLoss: 21_995,
			targetPrice: 22_115,
			quantity: 15,
			exited: false,
			exitPrice: null,
			exitTime: null,
			pnl: 0,
			reason: "",
			sessionDate: "2024-05-10",
		};
		await writeFile(storePath, `${JSON.stringify(record)}\n`);
		const trader = composeTrader(app(), {
			...baseOptions,
			barsFile: path.join(dir, "bars.json"),
			storePath,
		});

		await expect(resumeOpenTrade(trader)).resolves.toBe("trade-9");
		expect(trader.state.openTrade()).toMatchObject({
			tradeId: "trade-9",
			stopLoss: 21_995,
			entryTime: ist(10, 10, 0),
		});
	});

	it("leaves the state flat when nothing is open", async () => {
		const trader = composeTrader(app(), {
			...baseOptions,
			barsFile: path.join(dir, "bars.json"),
			storePath: path.join(dir, "empty.jsonl"),
		});

		await expect(resumeOpenTrade(trader)).resolves.toBeNull();
		expect(trader.state.open).toBe(false);
	});

	it("logs where the engine config came from", () => {
		const records: BaseLogPayload[] = [];
		setLogSink((record: BaseLogPayload) => {
			records.push(record);
		});
		const engine = withConfigMetadata(
			{ ...DEFAULT_ENGINE_CONFIG },
			{ source: "file", path: "config/engine.default.json", profile: "default" }
		);

		composeTrader(
			{ env: env(), engine },
			{ ...baseOptions, barsFile: path.join(dir, "bars.json"), storePath: path.join(dir, "t.jsonl") }
		);

		expect(records.find((record) => record.event === "trader_composed")).toMatchObject({
			configSource: "file",
			configPath: "config/engine.default.json",
		});
	});

	it("needs a bars file when no exchange is configured", () => {
		expect(() => composeTrader(app(), baseOptions)).toThrow(
			"EXCHANGE_ID=paper has no market feed; pass --bars <file> or set a ccxt exchange"
		);
	});

	it("refuses live execution without an exchange", () => {
		expect(() =>
			composeTrader(app(), {
				...baseOptions,
				barsFile: path.join(dir, "bars.json"),
				executionMode: "live",
			})
		).toThrow(ConfigError);
	});

	it("builds the venue from the environment credentials", () => {
		const calls: Array<[string, CcxtCredentials | undefined]> = [];
		const venueFactory = (id: string, credentials?: CcxtCredentials): CcxtVenue => {
			calls.push([id, credentials]);
			return new RecordingVenue();
		};

		composeTrader(
			app({ exchangeId: "binance", apiKey: "test-key", apiSecret: "test-secret" }),
			{ ...baseOptions, executionMode: "live", storePath: path.join(dir, "t.jsonl") },
			{ venueFactory }
		);

		expect(calls).toEqual([["binance", { apiKey: "test-key", secret: "test-secret" }]]);
	});
});
