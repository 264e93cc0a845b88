import type {
	BaseLogPayload,
	BrokerClient,
	BrokerOrderReceipt,
	DailyLogEntry,
	IndicatorBar,
	TradeRecord,
	TradeSignal,
	TradeStore,
} from "@openrange/core";

export const OPENED_AT = Date.UTC(2024, 4, 10, 4, 30, 0); // 10:00 IST

export class FakeTradeStore implements TradeStore {
	readonly records: TradeRecord[] = [];
	readonly updates: TradeRecord[] = [];
	failing = false;

	async recordTrade(record: TradeRecord): Promise<void> {
		if (this.failing) {
			throw new Error("store offline");
		}
		this.records.push(record);
	}

	async updateOpenTrade(record: TradeRecord): Promise<void> {
		if (this.failing) {
			throw new Error("store offline");
		}
		this.updates.push(record);
	}

	async fetchPnlToday(sessionDate: string): Promise<number> {
		return this.records
			.filter((record) => record.exited && record.sessionDate === sessionDate)
			.reduce((acc, record) => acc + record.pnl, 0);
	}

	async populateDailyLog(): Promise<DailyLogEntry[]> {
		return [];
	}
}

export class FakeBroker implements BrokerClient {
	readonly orders: BrokerOrderReceipt[] = [];
	failing = false;

	async getAvailableMargin(): Promise<number> {
		return 500_000;
	}

	async submitStopOrder(
		direction: TradeSignal,
		quantity: number,
		triggerPrice: number
	): Promise<BrokerOrderReceipt> {
		if (this.failing) {
			throw new Error("broker rejected order");
		}
		const receipt = { orderId: `order-${this.orders.length + 1}`, direction, quantity, triggerPrice };
		this.orders.push(receipt);
		return receipt;
	}
}

export const sequentialIds = (): (() => string) => {
	let next = 0;
	return () => {
		next += 1;
		return `trade-${next}`;
	};
};

export const captureLogs = (): { records: BaseLogPayload[]; sink: (record: BaseLogPayload) => void } => {
	const records: BaseLogPayload[] = [];
	return { records, sink: (record) => records.push(record) };
};

export const bar = (
	timestamp: number,
	open: number,
	close: number,
	atr14: number | null = 20
): IndicatorBar => ({
	timestamp,
	open,
	close,
	high: Math.max(open, close) + 5,
	low: Math.min(open, close) - 5,
	volume: 1_000,
	emaShort: close,
	emaLong: close,
	rsi14: 50,
	atr14,
	macd: 0,
	typicalPrice: close,
	openPrev1: null,
	closePrev1: null,
	openPrev2: null,
	closePrev2: null,
	prevClose: null,
});
