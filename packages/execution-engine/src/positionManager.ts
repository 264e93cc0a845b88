import { randomUUID } from "node:crypto";
import {
	InvariantViolationError,
	MINUTE_MS,
	createLogger,
	describeError,
	oppositeSignal,
	type BrokerClient,
	type BrokerOrderReceipt,
	type ExecutionMode,
	type HealthCheckConfig,
	type IndicatorBar,
	type ModuleLogger,
	type ProposedTrade,
	type TradeRecord,
	type TradeSignal,
	type TradeStore,
} from "@openrange/core";
import { postEntryHealthCheck } from "./healthCheck";
import { calculateNetPnl, roundTo, type PnlBreakdown } from "./pnl";
import { buildTradeRecord } from "./tradeRecords";
import type { TradeState } from "./tradeState";
import { TrailingStopManager } from "./trailingStopManager";

/** ATR assumed for target sizing before any bar has supplied one. */
export const FALLBACK_ATR = 20;
export const CALM_TARGET_MULTIPLIER = 1.8;
export const DEFAULT_TARGET_MULTIPLIER = 2.5;

export const STOP_HIT_REASON = "Stop-loss hit";
export const WEAK_FOLLOW_THROUGH_REASON = "Weak post-entry momentum";

export interface PositionManagerOptions {
	state: TradeState;
	broker: BrokerClient;
	store: TradeStore;
	symbol: string;
	timeZone: string;
	executionMode: ExecutionMode;
	cooldownMinutes: number;
	healthCheck: HealthCheckConfig;
	trailing?: TrailingStopManager;
	logger?: ModuleLogger;
	idFactory?: () => string;
}

export interface EntryContext {
	atr: number | null;
	quantity: number;
	/** Epoch ms. */
	now: number;
}

export type OpenPositionResult =
	| {
			status: "opened";
			tradeId: string;
			targetPrice: number;
			stopOrder: BrokerOrderReceipt | null;
	  }
	| {
			status: "refused";
			reason: "trade_already_open" | "invalid_quantity";
			error: InvariantViolationError;
	  };

export interface ClosedTradeSummary {
	tradeId: string;
	direction: TradeSignal;
	entryPrice: number;
	exitPrice: number;
	quantity: number;
	reason: string;
	pnl: PnlBreakdown;
}

export type MonitorResult =
	| { status: "flat" }
	| { status: "no_data" }
	| { status: "holding"; price: number; stopLoss: number | null }
	| { status: "exited"; trade: ClosedTradeSummary };

/**
 * Owns the entry and exit transitions of the shared TradeState and drives the
 * per-tick monitoring of an open trade.
 */
export class PositionManager {
	private readonly logger: ModuleLogger;
	private readonly trailing: TrailingStopManager;
	private readonly entryAtrHistory: number[] = [];
	private atr = 0;

	constructor(private readonly options: PositionManagerOptions) {
		this.logger = options.logger ?? createLogger("position-manager");
		this.trailing =
			options.trailing ??
			new TrailingStopManager({
				store: options.store,
				symbol: options.symbol,
				timeZone: options.timeZone,
			});
	}

	get state(): TradeState {
		return this.options.state;
	}

	/** Latest ATR seen on a monitoring tick or entry; 0 before any. */
	get trackedAtr(): number {
		return this.atr;
	}

	isOpen(): boolean {
		return this.options.state.open;
	}

	inCooldown(now: number): boolean {
		const lastExit = this.options.state.lastExitTime;
		return (
			lastExit !== null && now - lastExit < this.options.cooldownMinutes * MINUTE_MS
		);
	}

	cooldownRemainingMs(now: number): number {
		const lastExit = this.options.state.lastExitTime;
		if (lastExit === null) {
			return 0;
		}
		return Math.max(0, lastExit + this.options.cooldownMinutes * MINUTE_MS - now);
	}

	async openPosition(
		trade: ProposedTrade,
		context: EntryContext
	): Promise<OpenPositionResult> {
		const { state } = this.options;
		if (state.open) {
			const error = new InvariantViolationError(
				`Trade ${state.tradeId ?? "?"} is already open`
			);
			this.logger.warn("open_refused", {
				reason: "trade_already_open",
				openTradeId: state.tradeId,
				error: error.message,
			});
			return { status: "refused", reason: "trade_already_open", error };
		}
		if (!Number.isInteger(context.quantity) || context.quantity <= 0) {
			const error = new InvariantViolationError(
				`Quantity must be a positive integer, got ${context.quantity}`
			);
			this.logger.warn("open_refused", {
				reason: "invalid_quantity",
				error: error.message,
			});
			return { status: "refused", reason: "invalid_quantity", error };
		}

		if (context.atr !== null && context.atr > 0) {
			this.atr = context.atr;
		}
		const entryPrice = roundTo(trade.entry, 2);
		const targetPrice = this.adaptiveTarget(trade.signal, entryPrice);
		const tradeId = (this.options.idFactory ?? randomUUID)();

		state.tradeId = tradeId;
		state.direction = trade.signal;
		state.strategy = trade.strategy;
		state.entryPrice = entryPrice;
		state.entryTime = context.now;
		state.entryBarTimestamp = trade.timestamp;
		state.stopLoss = roundTo(trade.stopLoss, 2);
		state.targetPrice = targetPrice;
		state.quantity = context.quantity;
		state.lastStopUpdateTime = null;
		state.checkedPostEntry = false;
		state.open = true;

		const opened = state.openTrade();
		if (!opened) {
			throw new InvariantViolationError("Trade state incomplete after entry");
		}

		this.logger.info("trade_opened", {
			tradeId,
			direction: opened.direction,
			strategy: opened.strategy,
			entryPrice: opened.entryPrice,
			stopLoss: opened.stopLoss,
			targetPrice: opened.targetPrice,
			quantity: opened.quantity,
		});

		await this.persist(buildTradeRecord(opened, this.options));

		let stopOrder: BrokerOrderReceipt | null = null;
		if (this.options.executionMode === "live") {
			stopOrder = await this.submitProtectiveStop(
				opened.direction,
				opened.quantity,
				opened.stopLoss
			);
		}

		return { status: "opened", tradeId, targetPrice, stopOrder };
	}

	/**
	 * One monitoring pass over freshly fetched bars: refresh ATR, trail the
	 * stop, exit on a stop cross, and run the one-off follow-through check once
	 * the trade is past the grace period.
	 */
	async monitorTick(
		bars: readonly IndicatorBar[],
		now: number
	): Promise<MonitorResult> {
		const { state } = this.options;
		if (!state.open) {
			return { status: "flat" };
		}
		const last = bars.at(-1);
		if (!last) {
			this.logger.warn("monitor_no_data", { tradeId: state.tradeId });
			return { status: "no_data" };
		}

		if (last.atr14 !== null && last.atr14 > 0) {
			this.atr = last.atr14;
		}
		const price = last.close;
		await this.trailing.update(state, { price, atr: this.atr, now });

		const trade = state.openTrade();
		if (!trade) {
			return { status: "flat" };
		}

		const stopCrossed =
			trade.direction === "BUY" ? price < trade.stopLoss : price > trade.stopLoss;
		if (stopCrossed) {
			return this.exitAndReport(price, STOP_HIT_REASON, now);
		}

		const graceMs = this.options.healthCheck.graceMinutes * MINUTE_MS;
		if (
			!state.checkedPostEntry &&
			trade.entryBarTimestamp !== null &&
			now - trade.entryTime >= graceMs
		) {
			const health = postEntryHealthCheck(bars, trade.entryBarTimestamp, {
				lookahead: this.options.healthCheck.lookahead,
				thresholdPct: this.options.healthCheck.thresholdPct,
			});
			// One attempt per trade; an unreadable window keeps the trade.
			state.checkedPostEntry = true;
			if (health.verdict === "valid") {
				this.logger.info("post_entry_checked", {
					tradeId: trade.tradeId,
					passed: health.passed,
					movePct: health.movePct,
				});
				if (!health.passed) {
					return this.exitAndReport(
						trade.entryPrice,
						WEAK_FOLLOW_THROUGH_REASON,
						now
					);
				}
			} else {
				this.logger.info("post_entry_check_skipped", {
					tradeId: trade.tradeId,
					reason: health.reason,
				});
			}
		}

		return { status: "holding", price, stopLoss: state.stopLoss };
	}

	/** Closes the open trade at `price`. Returns null when flat. */
	async exitPosition(
		price: number,
		reason = "Manual exit",
		now = Date.now()
	): Promise<ClosedTradeSummary | null> {
		const { state } = this.options;
		const trade = state.openTrade();
		if (!trade) {
			this.logger.warn("exit_without_open_trade", { price, reason });
			return null;
		}

		const pnl = calculateNetPnl({
			entry: trade.entryPrice,
			exit: price,
			quantity: trade.quantity,
			direction: trade.direction,
		});

		this.logger.info("trade_closed", {
			tradeId: trade.tradeId,
			direction: trade.direction,
			entryPrice: trade.entryPrice,
			exitPrice: price,
			pnl: pnl.net,
			grossPnl: pnl.gross,
			charges: roundTo(pnl.totalCharges, 2),
			reason,
		});

		await this.persist(
			buildTradeRecord(trade, this.options, {
				price,
				time: now,
				pnl: pnl.net,
				reason,
			})
		);

		state.reset();
		state.lastExitPrice = price;
		state.lastExitTime = now;

		return {
			tradeId: trade.tradeId,
			direction: trade.direction,
			entryPrice: trade.entryPrice,
			exitPrice: price,
			quantity: trade.quantity,
			reason,
			pnl,
		};
	}

	private async exitAndReport(
		price: number,
		reason: string,
		now: number
	): Promise<MonitorResult> {
		const closed = await this.exitPosition(price, reason, now);
		return closed ? { status: "exited", trade: closed } : { status: "flat" };
	}

	/**
	 * Target distance scales with volatility: 1.8 × ATR when the current ATR is
	 * below the median of entry ATRs so far (this one included), else 2.5 × ATR.
	 */
	private adaptiveTarget(direction: TradeSignal, entryPrice: number): number {
		const atr = this.atr || FALLBACK_ATR;
		this.entryAtrHistory.push(atr);
		const sorted = [...this.entryAtrHistory].sort((a, b) => a - b);
		const median = sorted[Math.floor(sorted.length / 2)];
		const multiplier = atr < median ? CALM_TARGET_MULTIPLIER : DEFAULT_TARGET_MULTIPLIER;
		return roundTo(
			direction === "BUY" ? entryPrice + multiplier * atr : entryPrice - multiplier * atr,
			2
		);
	}

	private async submitProtectiveStop(
		direction: TradeSignal,
		quantity: number,
		stopLoss: number
	): Promise<BrokerOrderReceipt | null> {
		const exitSide = oppositeSignal(direction);
		const triggerPrice = roundTo(stopLoss, 1);
		try {
			const receipt = await this.options.broker.submitStopOrder(
				exitSide,
				quantity,
				triggerPrice
			);
			this.logger.info("stop_order_submitted", {
				orderId: receipt.orderId,
				direction: exitSide,
				quantity,
				triggerPrice,
			});
			return receipt;
		} catch (error) {
			this.logger.error("stop_order_failed", {
				direction: exitSide,
				quantity,
				triggerPrice,
				error: describeError(error),
			});
			return null;
		}
	}

	private async persist(record: TradeRecord): Promise<void> {
		try {
			await this.options.store.recordTrade(record);
		} catch (error) {
			this.logger.error("trade_store_failed", {
				operation: "recordTrade",
				tradeId: record.tradeId,
				error: describeError(error),
			});
		}
	}
}
