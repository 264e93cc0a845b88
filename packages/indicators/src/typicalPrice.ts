export interface PriceTriple {
	high: number;
	low: number;
	close: number;
}

export const typicalPrice = (bar: PriceTriple): number =>
	(bar.high + bar.low + bar.close) / 3;
