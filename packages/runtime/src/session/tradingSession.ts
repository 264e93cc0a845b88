import {
	DataError,
	ExternalCallFailureError,
	MINUTE_MS,
	SECOND_MS,
	createLogger,
	describeError,
	exchangeDate,
	type BrokerClient,
	type DailyLogEntry,
	type EngineConfig,
	type IndicatorBar,
	type MarketCalendar,
	type MarketDataSource,
	type ModuleLogger,
	type StrategyName,
	type TradeDecision,
	type TradeStore,
} from "@openrange/core";
import type { MonitorResult, PositionManager } from "@openrange/execution-engine";
import { addTechnicalIndicators } from "@openrange/indicators";
import { EntryGuard } from "@openrange/risk-engine";
import { assignLevels, decideTrade } from "@openrange/strategy-engine";
import { retryWithBackoff } from "../retry";
import type { Sleep } from "../sleep";

/** Closed-market cycles wait this many sleep intervals. */
export const CLOSED_MARKET_WAIT_FACTOR = 5;

export type SessionEndReason = "cutoff" | "daily_loss_limit";

export type CycleReport =
	| { action: "market_closed"; waitMs: number }
	| {
			action: "session_end";
			reason: SessionEndReason;
			dailyLog: DailyLogEntry[];
			waitMs: number;
	  }
	| { action: "external_failure"; operation: string; error: string; waitMs: number }
	| { action: "data_error"; detail: string; waitMs: number }
	| { action: "insufficient_data"; bars: number; waitMs: number }
	| { action: "monitored"; result: MonitorResult; waitMs: number }
	| { action: "cooldown"; waitMs: number }
	| { action: "no_signal"; strategy: StrategyName; reason: string; waitMs: number }
	| { action: "entry_blocked"; reason: string; waitMs: number }
	| {
			action: "opened";
			tradeId: string;
			decision: TradeDecision;
			quantity: number;
			waitMs: number;
	  }
	| { action: "refused"; reason: string; waitMs: number };

export type CycleAction = CycleReport["action"];

export interface TradingSessionOptions {
	config: EngineConfig;
	marketData: MarketDataSource;
	broker: BrokerClient;
	store: TradeStore;
	calendar: MarketCalendar;
	positions: PositionManager;
	guard?: EntryGuard;
	/** Used between retries of external calls. */
	sleep?: Sleep;
	logger?: ModuleLogger;
}

/**
 * One decision cycle per call: calendar, daily loss, fetch, indicators, then
 * either a monitoring tick on the open trade or an entry attempt. The session
 * never sleeps between cycles; the report says how long the caller should.
 */
export class TradingSession {
	private readonly config: EngineConfig;
	private readonly guard: EntryGuard;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: TradingSessionOptions) {
		this.config = options.config;
		this.guard = options.guard ?? new EntryGuard(options.config);
		this.logger = options.logger ?? createLogger("trading-session");
	}

	get positions(): PositionManager {
		return this.options.positions;
	}

	private get sleepMs(): number {
		return this.config.sleepIntervalSeconds * SECOND_MS;
	}

	async runCycle(now: number): Promise<CycleReport> {
		const { calendar, positions, store } = this.options;
		if (!calendar.isTradingSessionNow(now)) {
			this.logger.debug("market_closed", { now });
			return { action: "market_closed", waitMs: this.sleepMs * CLOSED_MARKET_WAIT_FACTOR };
		}

		const sessionDate = exchangeDate(now, this.config.timeZone);
		const pnlToday = await this.external("fetchPnlToday", () =>
			store.fetchPnlToday(sessionDate)
		);
		// An unreadable P&L blocks new entries but never the open trade's monitoring.
		if (pnlToday.status === "failed") {
			if (!positions.isOpen()) {
				return pnlToday.report;
			}
			this.logger.warn("pnl_unavailable_monitoring_only", {
				sessionDate,
				tradeId: positions.state.tradeId,
			});
		}
		const lossLimitHit =
			pnlToday.status === "ok" && this.guard.dailyLossBreached(pnlToday.value);
		if (lossLimitHit && !positions.isOpen() && pnlToday.status === "ok") {
			this.logger.warn("daily_loss_limit_breached", {
				sessionDate,
				pnlToday: pnlToday.value,
				maxDailyLoss: this.config.maxDailyLoss,
			});
			return this.endSession("daily_loss_limit", sessionDate);
		}

		const fetched = await this.external("fetchBars", () =>
			this.options.marketData.fetchBars(
				this.config.symbol,
				this.config.interval,
				this.config.lookbackDays
			)
		);
		if (fetched.status === "failed") {
			return fetched.report;
		}

		let bars: IndicatorBar[];
		try {
			bars = addTechnicalIndicators(fetched.value, { timeZone: this.config.timeZone });
		} catch (error) {
			if (error instanceof DataError) {
				this.logger.warn("cycle_data_error", { detail: error.message });
				return { action: "data_error", detail: error.message, waitMs: this.sleepMs };
			}
			throw error;
		}
		if (bars.length < this.config.minBars) {
			this.logger.info("waiting_for_data", {
				bars: bars.length,
				minBars: this.config.minBars,
			});
			return { action: "insufficient_data", bars: bars.length, waitMs: this.sleepMs };
		}

		if (positions.isOpen()) {
			const result = await positions.monitorTick(bars, now);
			return { action: "monitored", result, waitMs: this.sleepMs };
		}

		if (this.guard.reachedCutoff(now)) {
			return this.endSession("cutoff", sessionDate);
		}
		if (lossLimitHit) {
			return this.endSession("daily_loss_limit", sessionDate);
		}

		return this.attemptEntry(bars, now);
	}

	private async attemptEntry(bars: IndicatorBar[], now: number): Promise<CycleReport> {
		const { positions } = this.options;
		const { state } = positions;
		if (this.guard.inCooldown(state, now)) {
			const remaining = this.guard.cooldownRemainingMs(state, now);
			this.logger.info("in_cooldown", { remainingMs: remaining });
			return { action: "cooldown", waitMs: Math.max(remaining, this.sleepMs) };
		}

		const levels = assignLevels(bars, {
			...this.config.breakout,
			mode: this.config.strategyMode,
			timeZone: this.config.timeZone,
		});
		const engine = decideTrade(levels.bars, {
			plan: levels.plan,
			mode: this.config.strategyMode,
			timeZone: this.config.timeZone,
			reversion: this.config.reversion,
			lastExitTime: state.lastExitTime,
			lastExitPrice: state.lastExitPrice,
			cooldownMs: this.config.cooldownMinutes * MINUTE_MS,
		});

		const { outcome } = engine;
		if (outcome.status === "data_error") {
			return { action: "data_error", detail: outcome.detail, waitMs: this.sleepMs };
		}
		if (outcome.status === "rejected") {
			this.logger.info("no_signal", { strategy: outcome.strategy, reason: outcome.reason });
			return {
				action: "no_signal",
				strategy: outcome.strategy,
				reason: outcome.reason,
				waitMs: this.sleepMs,
			};
		}

		const { trade } = outcome;
		const late = this.guard.lateSessionGate(bars, trade.timestamp);
		if (late.status === "blocked") {
			this.logger.info("entry_blocked", { reason: late.reason });
			return { action: "entry_blocked", reason: late.reason, waitMs: this.sleepMs };
		}
		if (late.status === "allowed") {
			this.logger.info("late_session_entry_allowed", {
				atr: late.atr,
				threshold: late.threshold,
			});
		}

		const margin = await this.availableMargin();
		const size = this.guard.sizePosition(margin);
		const opened = await positions.openPosition(trade, {
			atr: engine.bar.atr14,
			quantity: size.quantity,
			now,
		});
		if (opened.status === "refused") {
			return { action: "refused", reason: opened.reason, waitMs: this.sleepMs };
		}
		return {
			action: "opened",
			tradeId: opened.tradeId,
			decision: engine.decision,
			quantity: size.quantity,
			waitMs: this.sleepMs,
		};
	}

	private async availableMargin(): Promise<number> {
		const margin = await this.external("getAvailableMargin", () =>
			this.options.broker.getAvailableMargin()
		);
		if (margin.status === "ok") {
			return margin.value;
		}
		this.logger.warn("margin_fallback", { fallbackMargin: this.config.fallbackMargin });
		return this.config.fallbackMargin;
	}

	private async endSession(
		reason: SessionEndReason,
		sessionDate: string
	): Promise<CycleReport> {
		let dailyLog: DailyLogEntry[] = [];
		try {
			dailyLog = await this.options.store.populateDailyLog(sessionDate);
		} catch (error) {
			this.logger.error("trade_store_failed", {
				operation: "populateDailyLog",
				error: describeError(error),
			});
		}
		this.logger.info("session_end", { reason, sessionDate, trades: dailyLog.length });
		return { action: "session_end", reason, dailyLog, waitMs: 0 };
	}

	private async external<T>(
		operation: string,
		fn: () => Promise<T>
	): Promise<
		| { status: "ok"; value: T }
		| { status: "failed"; report: Extract<CycleReport, { action: "external_failure" }> }
	> {
		try {
			const value = await retryWithBackoff(fn, {
				...this.config.retry,
				operation,
				sleep: this.options.sleep,
				logger: this.logger,
			});
			return { status: "ok", value };
		} catch (error) {
			if (!(error instanceof ExternalCallFailureError)) {
				throw error;
			}
			this.logger.error("external_call_failed", {
				operation,
				attempts: error.attempts,
				error: error.message,
			});
			return {
				status: "failed",
				report: {
					action: "external_failure",
					operation,
					error: error.message,
					waitMs: this.sleepMs,
				},
			};
		}
	}
}
