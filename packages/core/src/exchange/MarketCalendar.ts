export interface MarketCalendar {
	/** Weekday, exchange hours and holiday set, evaluated at `now`. */
	isTradingSessionNow(now: number): boolean;
}
