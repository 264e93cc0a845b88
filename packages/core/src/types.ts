export * from "./time";

export interface Bar {
	readonly timestamp: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

/**
 * Bar as it arrives from a market-data collaborator, before the timestamp has
 * been resolved. Strings without an offset are read as exchange-local time.
 */
export interface RawBar {
	timestamp: number | string | Date | null | undefined;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export interface IndicatorFields {
	readonly emaShort: number;
	readonly emaLong: number;
	readonly rsi14: number | null;
	readonly atr14: number | null;
	readonly macd: number;
	readonly typicalPrice: number;
	readonly openPrev1: number | null;
	readonly closePrev1: number | null;
	readonly openPrev2: number | null;
	readonly closePrev2: number | null;
	readonly prevClose: number | null;
}

export type IndicatorBar = Bar & IndicatorFields;

export type StrategyName = "BREAKOUT" | "REVERSION";

export const isStrategyName = (value: unknown): value is StrategyName =>
	value === "BREAKOUT" || value === "REVERSION";

/**
 * `null` means no level was assigned for the session; `0` means the session
 * runs the reversion strategy and breakout levels are switched off.
 */
export interface BreakoutLevels {
	readonly breakoutLongEntry: number | null;
	readonly breakoutShortEntry: number | null;
	readonly breakoutStopDistance: number | null;
	readonly breakoutTargetDistance: number | null;
}

export type StrategyBar = IndicatorBar &
	BreakoutLevels & {
		readonly sessionDate: string;
	};

export type TradeSignal = "BUY" | "SELL";

export const oppositeSignal = (signal: TradeSignal): TradeSignal =>
	signal === "BUY" ? "SELL" : "BUY";

export interface TradeDecision {
	readonly timestamp: number | null;
	readonly signal: TradeSignal | null;
	readonly entry: number | null;
	readonly stopLoss: number | null;
	readonly target: number | null;
	readonly valid: boolean;
	readonly strategy: StrategyName | null;
	readonly reason: string;
}

export interface ProposedTrade {
	readonly timestamp: number;
	readonly signal: TradeSignal;
	readonly entry: number;
	readonly stopLoss: number;
	readonly target: number;
	readonly strategy: StrategyName;
}

export type EvaluationOutcome =
	| { readonly status: "valid"; readonly trade: ProposedTrade }
	| {
			readonly status: "rejected";
			readonly strategy: StrategyName;
			readonly reason: string;
			/** Set when a filter vetoed an otherwise valid proposal. */
			readonly proposal?: ProposedTrade;
	  }
	| {
			readonly status: "data_error";
			readonly strategy: StrategyName;
			readonly detail: string;
	  };

export type ExecutionMode = "paper" | "live";
