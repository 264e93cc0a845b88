import {
	ENTRY_CUTOFF,
	LATE_SESSION_START,
	MINUTE_MS,
	isAtOrAfterClock,
	type EngineConfig,
	type IndicatorBar,
} from "@openrange/core";

/** After LATE_SESSION_START a new entry needs ATR at least this multiple of the mean. */
export const LATE_SESSION_ATR_MULTIPLIER = 1.2;

export type EntryGuardConfig = Pick<
	EngineConfig,
	| "timeZone"
	| "cooldownMinutes"
	| "maxDailyLoss"
	| "weekendTesting"
	| "lotSize"
	| "marginPerLot"
	| "maxLots"
>;

export interface ExitMemory {
	lastExitTime: number | null;
}

export type LateSessionVerdict =
	| { status: "not_late" }
	| { status: "allowed"; atr: number; threshold: number }
	| { status: "blocked"; atr: number | null; threshold: number | null; reason: string };

export interface PositionSize {
	lots: number;
	quantity: number;
}

/**
 * Gates the caller applies before asking for a new entry: cooldown after an
 * exit, the daily loss limit, the late-session volatility gate and the
 * end-of-day cut-off.
 */
export class EntryGuard {
	constructor(private readonly config: EntryGuardConfig) {}

	inCooldown(memory: ExitMemory, now: number): boolean {
		return this.cooldownRemainingMs(memory, now) > 0;
	}

	cooldownRemainingMs(memory: ExitMemory, now: number): number {
		if (memory.lastExitTime === null) {
			return 0;
		}
		const until = memory.lastExitTime + this.config.cooldownMinutes * MINUTE_MS;
		return Math.max(0, until - now);
	}

	dailyLossBreached(pnlToday: number): boolean {
		return pnlToday <= -this.config.maxDailyLoss;
	}

	/**
	 * `at` is the signal bar's timestamp. From 14:30 exchange time the last
	 * bar's ATR must reach 1.2 × the mean of every ATR in the series.
	 */
	lateSessionGate(bars: readonly IndicatorBar[], at: number): LateSessionVerdict {
		if (!isAtOrAfterClock(at, LATE_SESSION_START, this.config.timeZone)) {
			return { status: "not_late" };
		}

		const atrs = bars
			.map((bar) => bar.atr14)
			.filter((value): value is number => value !== null && Number.isFinite(value));
		const current = bars.at(-1)?.atr14 ?? null;
		if (!atrs.length || current === null) {
			return {
				status: "blocked",
				atr: current,
				threshold: null,
				reason: "ATR unavailable after 14:30",
			};
		}

		const mean = atrs.reduce((acc, value) => acc + value, 0) / atrs.length;
		const threshold = LATE_SESSION_ATR_MULTIPLIER * mean;
		if (current < threshold) {
			return {
				status: "blocked",
				atr: current,
				threshold,
				reason: `ATR ${current.toFixed(2)} below late-session threshold ${threshold.toFixed(2)}`,
			};
		}
		return { status: "allowed", atr: current, threshold };
	}

	/** At or after 15:25 exchange time; never while weekend testing. */
	reachedCutoff(now: number): boolean {
		if (this.config.weekendTesting) {
			return false;
		}
		return isAtOrAfterClock(now, ENTRY_CUTOFF, this.config.timeZone);
	}

	sizePosition(availableMargin: number): PositionSize {
		const affordable =
			Number.isFinite(availableMargin) && availableMargin > 0
				? Math.floor(availableMargin / this.config.marginPerLot)
				: 0;
		const lots = Math.min(this.config.maxLots, Math.max(1, affordable));
		return { lots, quantity: lots * this.config.lotSize };
	}
}
