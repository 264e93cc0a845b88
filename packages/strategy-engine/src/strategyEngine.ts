import {
	DataError,
	createLogger,
	toTradeDecision,
	type EvaluationOutcome,
	type ReversionConfig,
	type StrategyBar,
	type StrategyMode,
	type StrategyName,
	type TradeDecision,
} from "@openrange/core";
import { evaluateBreakout } from "./evaluators/breakout";
import { evaluateReversion } from "./evaluators/reversion";
import { applySignalFilters } from "./filters/signalFilterChain";
import { resolveStrategyForBar, type DailyStrategyPlan } from "./strategySelector";

const logger = createLogger("strategy-engine");

export interface DecideTradeContext {
	plan: DailyStrategyPlan;
	mode: StrategyMode;
	timeZone: string;
	reversion: ReversionConfig;
	lastExitTime: number | null;
	lastExitPrice: number | null;
	cooldownMs: number;
}

export interface EngineDecision {
	strategy: StrategyName;
	outcome: EvaluationOutcome;
	decision: TradeDecision;
	bar: StrategyBar;
}

export const evaluateStrategy = (
	strategy: StrategyName,
	bars: readonly StrategyBar[],
	index: number,
	context: Pick<DecideTradeContext, "timeZone" | "reversion">
): EvaluationOutcome =>
	strategy === "BREAKOUT"
		? evaluateBreakout(bars, index, { timeZone: context.timeZone })
		: evaluateReversion(bars, index, context.reversion);

/**
 * Evaluates the latest bar with the strategy assigned to its session and runs
 * the signal filters on a valid proposal.
 *
 * @throws DataError when `bars` is empty.
 */
export function decideTrade(
	bars: readonly StrategyBar[],
	context: DecideTradeContext
): EngineDecision {
	const index = bars.length - 1;
	const bar = bars.at(index);
	if (!bar) {
		throw new DataError("No bars to evaluate");
	}

	const strategy = resolveStrategyForBar(bar, context.plan, context.mode);
	const evaluated = evaluateStrategy(strategy, bars, index, context);
	const outcome = applySignalFilters(evaluated, {
		bars,
		index,
		lastExitTime: context.lastExitTime,
		lastExitPrice: context.lastExitPrice,
		cooldownMs: context.cooldownMs,
	});
	const decision = toTradeDecision(outcome);

	if (outcome.status === "data_error") {
		logger.warn("decision_data_error", {
			strategy,
			timestamp: bar.timestamp,
			detail: outcome.detail,
		});
	} else if (outcome.status === "rejected") {
		logger.debug("decision_rejected", {
			strategy,
			timestamp: bar.timestamp,
			close: bar.close,
			reason: outcome.reason,
		});
	} else {
		logger.info("decision_accepted", {
			strategy,
			signal: outcome.trade.signal,
			entry: outcome.trade.entry,
			stopLoss: outcome.trade.stopLoss,
			target: outcome.trade.target,
		});
	}

	return { strategy, outcome, decision, bar };
}
