import {
	SESSION_CLOSE,
	SESSION_OPEN,
	getExchangeClock,
	isWithinClockWindow,
	type EngineConfig,
	type MarketCalendar,
} from "@openrange/core";

export type ExchangeCalendarOptions = Pick<
	EngineConfig,
	"timeZone" | "holidays" | "weekendTesting"
>;

/**
 * Weekdays from 09:15 to 15:30 exchange time, both inclusive, minus the
 * configured holidays. Weekend testing opens every minute of every day.
 */
export class ExchangeCalendar implements MarketCalendar {
	private readonly holidays: ReadonlySet<string>;

	constructor(private readonly options: ExchangeCalendarOptions) {
		this.holidays = new Set(options.holidays);
	}

	isHoliday(date: string): boolean {
		return this.holidays.has(date);
	}

	isTradingSessionNow(now: number): boolean {
		if (this.options.weekendTesting) {
			return true;
		}
		const clock = getExchangeClock(now, this.options.timeZone);
		if (clock.weekday === 0 || clock.weekday === 6) {
			return false;
		}
		if (this.isHoliday(clock.date)) {
			return false;
		}
		return isWithinClockWindow(now, SESSION_OPEN, SESSION_CLOSE, this.options.timeZone);
	}
}
