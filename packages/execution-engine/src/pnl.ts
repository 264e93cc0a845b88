import type { TradeSignal } from "@openrange/core";

export const BROKERAGE_RATE = 0.0003;
export const BROKERAGE_CAP_PER_LEG = 20;
export const STT_RATE = 0.00025;
export const GST_RATE = 0.18;
export const SEBI_RATE = 0.000001;
export const STAMP_DUTY_RATE = 0.00003;

export interface NetPnlInput {
	entry: number;
	exit: number;
	quantity: number;
	direction: TradeSignal;
	/** Side the charges are levied on; defaults to the direction. */
	tradeType?: TradeSignal;
}

export interface PnlBreakdown {
	gross: number;
	turnover: number;
	brokerage: number;
	stt: number;
	gst: number;
	sebi: number;
	stampDuty: number;
	totalCharges: number;
	/** Rounded to 2 decimals. */
	net: number;
}

export const roundTo = (value: number, decimals: number): number => {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
};

/**
 * Realised P&L net of brokerage (capped per leg, both legs), securities
 * transaction tax on the sell side, GST on brokerage, the regulatory fee on
 * turnover and stamp duty on the buy side.
 */
export function calculateNetPnl(input: NetPnlInput): PnlBreakdown {
	const { entry, exit, quantity, direction } = input;
	const tradeType = input.tradeType ?? direction;

	const gross =
		direction === "SELL" ? (entry - exit) * quantity : (exit - entry) * quantity;
	const turnover = (entry + exit) * quantity;
	const brokerage = Math.min(BROKERAGE_CAP_PER_LEG, BROKERAGE_RATE * turnover) * 2;
	const stt = tradeType === "SELL" ? STT_RATE * exit * quantity : 0;
	const gst = GST_RATE * brokerage;
	const sebi = SEBI_RATE * turnover;
	const stampDuty = tradeType === "BUY" ? STAMP_DUTY_RATE * entry * quantity : 0;
	const totalCharges = brokerage + stt + gst + sebi + stampDuty;

	return {
		gross,
		turnover,
		brokerage,
		stt,
		gst,
		sebi,
		stampDuty,
		totalCharges,
		net: roundTo(gross - totalCharges, 2),
	};
}
