import { createLogger } from "@openrange/core";
import type { CycleReport } from "../session/tradingSession";
import { sleep as defaultSleep, type Sleep } from "../sleep";

const logger = createLogger("trader-loop");

/** Anything that can run one decision cycle, usually a TradingSession. */
export interface CycleRunner {
	runCycle(now: number): Promise<CycleReport>;
}

export interface StartTraderOptions {
	signal?: AbortSignal;
	sleep?: Sleep;
	clock?: () => number;
	/** Stop after this many cycles. Unbounded when omitted. */
	maxCycles?: number;
}

export interface TraderRunSummary {
	cycles: number;
	stoppedBy: "session_end" | "aborted" | "max_cycles";
	lastReport: CycleReport | null;
}

/**
 * Drives `session.runCycle` with explicit sleeps in between until the session
 * ends, the signal aborts or `maxCycles` is reached.
 */
export async function startTrader(
	session: CycleRunner,
	options: StartTraderOptions = {}
): Promise<TraderRunSummary> {
	const wait = options.sleep ?? defaultSleep;
	const clock = options.clock ?? Date.now;
	let cycles = 0;
	let lastReport: CycleReport | null = null;

	logger.info("trader_started", { maxCycles: options.maxCycles ?? null });

	while (!options.signal?.aborted) {
		if (options.maxCycles !== undefined && cycles >= options.maxCycles) {
			return finish({ cycles, stoppedBy: "max_cycles", lastReport });
		}

		lastReport = await session.runCycle(clock());
		cycles += 1;
		logger.debug("cycle_completed", {
			cycle: cycles,
			action: lastReport.action,
			waitMs: lastReport.waitMs,
		});

		if (lastReport.action === "session_end") {
			return finish({ cycles, stoppedBy: "session_end", lastReport });
		}
		await wait(lastReport.waitMs, options.signal);
	}

	return finish({ cycles, stoppedBy: "aborted", lastReport });
}

const finish = (summary: TraderRunSummary): TraderRunSummary => {
	logger.info("trader_stopped", {
		cycles: summary.cycles,
		stoppedBy: summary.stoppedBy,
		lastAction: summary.lastReport?.action ?? null,
	});
	return summary;
};
