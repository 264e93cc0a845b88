import {
	ConfigError,
	createLogger,
	getConfigMetadata,
	withConfigMetadata,
	type AppConfig,
	type BrokerClient,
	type EngineConfig,
	type MarketDataSource,
} from "@openrange/core";
import {
	CcxtBrokerClient,
	CcxtMarketDataSource,
	createCcxtVenue,
	type CcxtVenue,
} from "@openrange/exchange-ccxt";
import {
	PaperBroker,
	PositionManager,
	TradeState,
	restoreOpenTrade,
} from "@openrange/execution-engine";
import { FileTradeStore } from "@openrange/persistence";
import { EntryGuard } from "@openrange/risk-engine";
import { ExchangeCalendar, TradingSession } from "@openrange/runtime";
import { BarsFileSource } from "./barsFileSource";
import type { TraderCliOptions } from "./cliArgs";

const logger = createLogger("trader-cli");

export const PAPER_EXCHANGE_ID = "paper";
export const DEFAULT_TRADE_STORE_PATH = "data/trades.jsonl";

export interface ComposedTrader {
	config: EngineConfig;
	session: TradingSession;
	store: FileTradeStore;
	state: TradeState;
}

export interface ComposeTraderDeps {
	/** Builds the venue for a non-paper EXCHANGE_ID. */
	venueFactory?: typeof createCcxtVenue;
}

/** CLI flags win over the environment, which wins over the engine profile. */
/** Flags win over the loaded profile; the profile's source stays attached. */
export const applyCliOverrides = (
	engine: EngineConfig,
	options: TraderCliOptions
): EngineConfig =>
	withConfigMetadata(
		{
			...engine,
			executionMode: options.executionMode ?? engine.executionMode,
			strategyMode: options.strategyMode ?? engine.strategyMode,
			symbol: options.symbol ?? engine.symbol,
		},
		getConfigMetadata(engine) ?? { source: "defaults" }
	);

const resolveMarketData = (
	venue: CcxtVenue | null,
	options: TraderCliOptions
): MarketDataSource => {
	if (options.barsFile) {
		return new BarsFileSource(options.barsFile);
	}
	if (!venue) {
		throw new ConfigError(
			`EXCHANGE_ID=${PAPER_EXCHANGE_ID} has no market feed; pass --bars <file> or set a ccxt exchange`
		);
	}
	return new CcxtMarketDataSource(venue);
};

const resolveBroker = (config: EngineConfig, venue: CcxtVenue | null): BrokerClient => {
	if (config.executionMode === "paper") {
		return new PaperBroker(config.fallbackMargin);
	}
	if (!venue) {
		throw new ConfigError(
			`Live execution needs a ccxt exchange; EXCHANGE_ID is "${PAPER_EXCHANGE_ID}"`
		);
	}
	return new CcxtBrokerClient(venue, { symbol: config.symbol });
};

/**
 * Wires the engine against concrete adapters: ccxt for bars and live orders,
 * the paper broker otherwise, and the JSON-lines trade store.
 */
export const composeTrader = (
	app: AppConfig,
	options: TraderCliOptions,
	deps: ComposeTraderDeps = {}
): ComposedTrader => {
	const config = applyCliOverrides(app.engine, options);
	const venueFactory = deps.venueFactory ?? createCcxtVenue;
	const venue =
		app.env.exchangeId === PAPER_EXCHANGE_ID
			? null
			: venueFactory(app.env.exchangeId, {
					apiKey: app.env.apiKey,
					secret: app.env.apiSecret,
				});

	const marketData = resolveMarketData(venue, options);
	const broker = resolveBroker(config, venue);
	const store = new FileTradeStore({
		tradesPath:
			options.storePath ??
			app.env.tradeStorePath ??
			DEFAULT_TRADE_STORE_PATH,
	});
	const state = new TradeState();
	const positions = new PositionManager({
		state,
		broker,
		store,
		symbol: config.symbol,
		timeZone: config.timeZone,
		executionMode: config.executionMode,
		cooldownMinutes: config.cooldownMinutes,
		healthCheck: config.healthCheck,
	});
	const session = new TradingSession({
		config,
		marketData,
		broker,
		store,
		calendar: new ExchangeCalendar(config),
		positions,
		guard: new EntryGuard(config),
	});

	const source = getConfigMetadata(config);
	logger.info("trader_composed", {
		configSource: source?.source ?? "defaults",
		configPath: source?.path ?? null,
		symbol: config.symbol,
		interval: config.interval,
		executionMode: config.executionMode,
		strategyMode: config.strategyMode,
		exchangeId: app.env.exchangeId,
		barsFile: options.barsFile ?? null,
		tradesPath: store.tradesPath,
	});

	return { config, session, store, state };
};

/** Picks up a trade left open by a previous run of the same store. */
export const resumeOpenTrade = async (trader: ComposedTrader): Promise<string | null> => {
	const record = await trader.store.fetchOpenTrade();
	if (!record) {
		return null;
	}
	restoreOpenTrade(trader.state, record, trader.config.timeZone);
	logger.info("trade_resumed", {
		tradeId: record.tradeId,
		direction: record.direction,
		entryPrice: record.entryPrice,
		stopLoss: record.stopLoss,
	});
	return record.tradeId;
};
