import type { TradeSignal } from "../types";

export interface BrokerOrderReceipt {
	orderId: string;
	direction: TradeSignal;
	quantity: number;
	triggerPrice: number;
}

/**
 * Broker execution collaborator. Failures are surfaced to the operator but do
 * not roll back position bookkeeping.
 */
export interface BrokerClient {
	getAvailableMargin(): Promise<number>;

	/**
	 * Submit a stop-market order.
	 * @param direction - Order side
	 * @param quantity - Units (lot size × lots)
	 * @param triggerPrice - Price at which the order becomes a market order
	 */
	submitStopOrder(
		direction: TradeSignal,
		quantity: number,
		triggerPrice: number
	): Promise<BrokerOrderReceipt>;
}
