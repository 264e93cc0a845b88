import type { StrategyName, TradeSignal } from "@openrange/core";

/** View of a populated, open TradeState with every entry field present. */
export interface OpenTrade {
	tradeId: string;
	direction: TradeSignal;
	strategy: StrategyName | null;
	entryPrice: number;
	entryTime: number;
	entryBarTimestamp: number | null;
	stopLoss: number;
	targetPrice: number;
	quantity: number;
}

/**
 * The single position record. One instance is created by the caller and passed
 * to the position manager and the trailing stop manager; nothing else writes
 * to it.
 */
export class TradeState {
	direction: TradeSignal | null = null;
	entryPrice: number | null = null;
	/** Wall-clock entry time, epoch ms. */
	entryTime: number | null = null;
	/** Timestamp of the bar that produced the entry signal. */
	entryBarTimestamp: number | null = null;
	stopLoss: number | null = null;
	targetPrice: number | null = null;
	open = false;
	strategy: StrategyName | null = null;
	tradeId: string | null = null;
	lastExitTime: number | null = null;
	lastExitPrice: number | null = null;
	lastStopUpdateTime: number | null = null;
	quantity = 0;
	checkedPostEntry = false;

	/** Clears the position; last exit price and time survive for re-entry checks. */
	reset(): void {
		this.direction = null;
		this.entryPrice = null;
		this.entryTime = null;
		this.entryBarTimestamp = null;
		this.stopLoss = null;
		this.targetPrice = null;
		this.open = false;
		this.strategy = null;
		this.tradeId = null;
		this.lastStopUpdateTime = null;
		this.quantity = 0;
		this.checkedPostEntry = false;
	}

	openTrade(): OpenTrade | null {
		const { tradeId, direction, entryPrice, entryTime, stopLoss, targetPrice } = this;
		if (
			!this.open ||
			tradeId === null ||
			direction === null ||
			entryPrice === null ||
			entryTime === null ||
			stopLoss === null ||
			targetPrice === null
		) {
			return null;
		}
		return {
			tradeId,
			direction,
			strategy: this.strategy,
			entryPrice,
			entryTime,
			entryBarTimestamp: this.entryBarTimestamp,
			stopLoss,
			targetPrice,
			quantity: this.quantity,
		};
	}
}
