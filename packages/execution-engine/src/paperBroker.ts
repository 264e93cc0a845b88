import type {
	BrokerClient,
	BrokerOrderReceipt,
	TradeSignal,
} from "@openrange/core";

/**
 * Broker stand-in for paper trading: reports a fixed margin and keeps the stop
 * orders it was asked to place.
 */
export class PaperBroker implements BrokerClient {
	private readonly orders: BrokerOrderReceipt[] = [];

	constructor(private readonly margin: number) {}

	async getAvailableMargin(): Promise<number> {
		return this.margin;
	}

	async submitStopOrder(
		direction: TradeSignal,
		quantity: number,
		triggerPrice: number
	): Promise<BrokerOrderReceipt> {
		const receipt: BrokerOrderReceipt = {
			orderId: `paper-${this.orders.length + 1}`,
			direction,
			quantity,
			triggerPrice,
		};
		this.orders.push(receipt);
		return receipt;
	}

	listOrders(): BrokerOrderReceipt[] {
		return this.orders.map((order) => ({ ...order }));
	}
}
