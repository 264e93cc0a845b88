import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import { ConfigError } from "@openrange/core";

export type CcxtOrderSide = "buy" | "sell";

/**
 * The slice of a ccxt exchange the adapters use. Kept narrow so tests can
 * supply an in-process venue.
 */
export interface CcxtVenue {
	readonly id: string;
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
	/** Free balance in `currency`, or null when the venue reports none. */
	fetchFreeBalance(currency: string): Promise<number | null>;
	createStopMarketOrder(
		symbol: string,
		side: CcxtOrderSide,
		amount: number,
		triggerPrice: number
	): Promise<{ id: string }>;
}

export interface CcxtCredentials {
	apiKey?: string;
	secret?: string;
}

interface VenueConfig {
	apiKey?: string;
	secret?: string;
	enableRateLimit: boolean;
}

const VENUES: Record<string, (config: VenueConfig) => Exchange> = {
	binance: (config) => new ccxt.binance(config),
	bybit: (config) => new ccxt.bybit(config),
	mexc: (config) => new ccxt.mexc(config),
};

export const SUPPORTED_VENUES = Object.keys(VENUES);

export const fromCcxtExchange = (exchange: Exchange): CcxtVenue => {
	let marketsLoaded = false;
	const ensureMarketsLoaded = async (): Promise<void> => {
		if (marketsLoaded) {
			return;
		}
		await exchange.loadMarkets();
		marketsLoaded = true;
	};

	return {
		id: exchange.id,
		async fetchOHLCV(symbol, timeframe, since, limit) {
			await ensureMarketsLoaded();
			return exchange.fetchOHLCV(symbol, timeframe, since, limit);
		},
		async fetchFreeBalance(currency) {
			const balance = await exchange.fetchBalance();
			const free = balance[currency]?.free;
			return typeof free === "number" && Number.isFinite(free) ? free : null;
		},
		async createStopMarketOrder(symbol, side, amount, triggerPrice) {
			await ensureMarketsLoaded();
			const order = await exchange.createOrder(symbol, "market", side, amount, undefined, {
				triggerPrice,
			});
			return { id: order.id };
		},
	};
};

export const createCcxtVenue = (
	exchangeId: string,
	credentials: CcxtCredentials = {}
): CcxtVenue => {
	const factory = VENUES[exchangeId];
	if (!factory) {
		throw new ConfigError(
			`Unsupported exchange "${exchangeId}". Expected one of: ${SUPPORTED_VENUES.join(", ")}`
		);
	}
	return fromCcxtExchange(
		factory({
			apiKey: credentials.apiKey || undefined,
			secret: credentials.secret || undefined,
			enableRateLimit: true,
		})
	);
};
