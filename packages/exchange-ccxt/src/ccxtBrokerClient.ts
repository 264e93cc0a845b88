import {
	ExternalCallFailureError,
	createLogger,
	type BrokerClient,
	type BrokerOrderReceipt,
	type TradeSignal,
} from "@openrange/core";
import type { CcxtVenue } from "./ccxtVenue";

const logger = createLogger("exchange:ccxt");

export interface CcxtBrokerClientOptions {
	symbol: string;
	/** Currency whose free balance counts as margin. */
	marginCurrency?: string;
}

export class CcxtBrokerClient implements BrokerClient {
	private readonly marginCurrency: string;

	constructor(
		private readonly venue: CcxtVenue,
		private readonly options: CcxtBrokerClientOptions
	) {
		this.marginCurrency = options.marginCurrency ?? "INR";
	}

	async getAvailableMargin(): Promise<number> {
		const free = await this.venue.fetchFreeBalance(this.marginCurrency);
		if (free === null) {
			throw new ExternalCallFailureError("getAvailableMargin", 1, {
				cause: new Error(`${this.venue.id} reported no ${this.marginCurrency} balance`),
			});
		}
		return free;
	}

	async submitStopOrder(
		direction: TradeSignal,
		quantity: number,
		triggerPrice: number
	): Promise<BrokerOrderReceipt> {
		const order = await this.venue.createStopMarketOrder(
			this.options.symbol,
			direction === "BUY" ? "buy" : "sell",
			quantity,
			triggerPrice
		);
		logger.info("stop_order_placed", {
			venue: this.venue.id,
			orderId: order.id,
			symbol: this.options.symbol,
			direction,
			quantity,
			triggerPrice,
		});
		return { orderId: order.id, direction, quantity, triggerPrice };
	}
}
