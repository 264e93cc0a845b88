import {
	createLogger,
	describeError,
	type ModuleLogger,
	type TradeSignal,
	type TradeStore,
} from "@openrange/core";
import { roundTo } from "./pnl";
import { buildTradeRecord, type RecordContext } from "./tradeRecords";
import type { TradeState } from "./tradeState";

export const MIN_TRAIL_AGE_SECONDS = 120;
export const LONG_TRADE_AGE_SECONDS = 1_800;
export const NEAR_TARGET_ATR_FRACTION = 0.25;
export const NEAR_TARGET_OFFSET = 30;
export const NATURAL_TRAIL_ATR_FRACTION = 0.6;
export const LONG_TRADE_TRAIL_CAP = 50;

export interface TrailingPosition {
	direction: TradeSignal;
	entryPrice: number;
	entryTime: number;
	stopLoss: number;
	targetPrice: number;
}

export interface TrailingInput {
	price: number;
	atr: number;
	/** Epoch ms. */
	now: number;
}

export type TrailingRule = "near_target" | "natural" | "fallback";

export interface TrailingStopProposal {
	stopLoss: number;
	rule: TrailingRule;
}

/**
 * Next stop for an open position, or null when the stop stays where it is.
 * A returned stop is always strictly more favourable than the current one.
 */
export function computeTrailingStop(
	position: TrailingPosition,
	input: TrailingInput
): TrailingStopProposal | null {
	const { price, atr } = input;
	const ageSeconds = Math.floor((input.now - position.entryTime) / 1_000);
	if (ageSeconds < MIN_TRAIL_AGE_SECONDS) {
		return null;
	}

	const sign = position.direction === "BUY" ? 1 : -1;

	if (Math.abs(price - position.targetPrice) <= NEAR_TARGET_ATR_FRACTION * atr) {
		return accept(position, price - sign * NEAR_TARGET_OFFSET, "near_target");
	}

	const move = sign * (price - position.entryPrice);
	if (move < atr) {
		return null;
	}

	const improves = (candidate: number): boolean =>
		sign * (candidate - position.stopLoss) > 0;
	const natural = price - sign * NATURAL_TRAIL_ATR_FRACTION * atr;
	const fallbackDistance =
		ageSeconds > LONG_TRADE_AGE_SECONDS ? Math.min(LONG_TRADE_TRAIL_CAP, atr) : atr;
	const fallback = price - sign * fallbackDistance;

	if (improves(natural)) {
		return accept(position, natural, "natural");
	}
	if (improves(fallback)) {
		return accept(position, fallback, "fallback");
	}
	return null;
}

const accept = (
	position: TrailingPosition,
	candidate: number,
	rule: TrailingRule
): TrailingStopProposal | null => {
	const stopLoss = roundTo(candidate, 2);
	if (Math.abs(stopLoss - position.stopLoss) < 0.01) {
		return null;
	}
	const sign = position.direction === "BUY" ? 1 : -1;
	if (sign * (stopLoss - position.stopLoss) <= 0) {
		return null;
	}
	return { stopLoss, rule };
};

export interface TrailingStopManagerOptions extends RecordContext {
	store: TradeStore;
	logger?: ModuleLogger;
}

/**
 * Applies `computeTrailingStop` to the shared TradeState and persists the
 * moved stop on the open trade record.
 */
export class TrailingStopManager {
	private readonly logger: ModuleLogger;

	constructor(private readonly options: TrailingStopManagerOptions) {
		this.logger = options.logger ?? createLogger("trailing-stop");
	}

	async update(state: TradeState, input: TrailingInput): Promise<number | null> {
		const trade = state.openTrade();
		if (!trade) {
			return null;
		}

		const proposal = computeTrailingStop(trade, input);
		if (!proposal) {
			return null;
		}

		state.stopLoss = proposal.stopLoss;
		state.lastStopUpdateTime = input.now;
		this.logger.info("stop_loss_trailed", {
			tradeId: trade.tradeId,
			direction: trade.direction,
			price: input.price,
			previousStop: trade.stopLoss,
			stopLoss: proposal.stopLoss,
			rule: proposal.rule,
		});

		try {
			await this.options.store.updateOpenTrade(
				buildTradeRecord({ ...trade, stopLoss: proposal.stopLoss }, this.options)
			);
		} catch (error) {
			this.logger.error("trade_store_failed", {
				operation: "updateOpenTrade",
				tradeId: trade.tradeId,
				error: describeError(error),
			});
		}

		return proposal.stopLoss;
	}
}
