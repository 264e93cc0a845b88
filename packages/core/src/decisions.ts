import type {
	EvaluationOutcome,
	ProposedTrade,
	StrategyName,
	TradeDecision,
} from "./types";

export const validDecision = (trade: ProposedTrade): TradeDecision => ({
	timestamp: trade.timestamp,
	signal: trade.signal,
	entry: trade.entry,
	stopLoss: trade.stopLoss,
	target: trade.target,
	valid: true,
	strategy: trade.strategy,
	reason: "",
});

export const invalidDecision = (
	reason: string,
	strategy: StrategyName | null = null
): TradeDecision => ({
	timestamp: null,
	signal: null,
	entry: null,
	stopLoss: null,
	target: null,
	valid: false,
	strategy,
	reason,
});

/**
 * Downgrades a decision to invalid. Price fields are kept so the caller can
 * still report what was rejected.
 */
export const rejectDecision = (
	decision: TradeDecision,
	reason: string
): TradeDecision => ({
	...decision,
	valid: false,
	reason: decision.reason ? `${decision.reason}; ${reason}` : reason,
});

export const toTradeDecision = (outcome: EvaluationOutcome): TradeDecision => {
	switch (outcome.status) {
		case "valid":
			return validDecision(outcome.trade);
		case "rejected":
			return outcome.proposal
				? rejectDecision(validDecision(outcome.proposal), outcome.reason)
				: invalidDecision(outcome.reason, outcome.strategy);
		case "data_error":
			return invalidDecision(outcome.detail, outcome.strategy);
	}
};

export const rejectOutcome = (
	strategy: StrategyName,
	reason: string
): EvaluationOutcome => ({ status: "rejected", strategy, reason });

/** Turns a valid proposal into a rejection, keeping the proposal for reporting. */
export const vetoProposal = (
	trade: ProposedTrade,
	reason: string
): EvaluationOutcome => ({
	status: "rejected",
	strategy: trade.strategy,
	reason,
	proposal: trade,
});

export const dataErrorOutcome = (
	strategy: StrategyName,
	detail: string
): EvaluationOutcome => ({ status: "data_error", strategy, detail });

export const outcomeReason = (outcome: EvaluationOutcome): string => {
	switch (outcome.status) {
		case "valid":
			return "";
		case "rejected":
			return outcome.reason;
		case "data_error":
			return outcome.detail;
	}
};
