import {
	ExternalCallFailureError,
	createLogger,
	describeError,
	type ModuleLogger,
	type RetryConfig,
} from "@openrange/core";
import { sleep as defaultSleep, type Sleep } from "./sleep";

export interface RetryOptions extends RetryConfig {
	/** Name used in logs and in the final error. */
	operation: string;
	sleep?: Sleep;
	logger?: ModuleLogger;
}

/** Delay before retry number `retry` (1-based). */
export const backoffDelayMs = (
	retry: number,
	options: Pick<RetryConfig, "baseDelayMs" | "factor">
): number => options.baseDelayMs * options.factor ** (retry - 1);

/**
 * Runs `fn` up to `attempts` times with exponentially growing pauses between
 * attempts.
 *
 * @throws ExternalCallFailureError carrying the last failure as its cause.
 */
export async function retryWithBackoff<T>(
	fn: () => Promise<T>,
	options: RetryOptions
): Promise<T> {
	const attempts = Math.max(1, options.attempts);
	const wait = options.sleep ?? defaultSleep;
	const logger = options.logger ?? createLogger("retry");

	let lastError: unknown;
	for (let attempt = 1; attempt <= attempts; attempt += 1) {
		try {
			return await fn();
		} catch (error) {
			lastError = error;
			if (attempt === attempts) {
				break;
			}
			const delayMs = backoffDelayMs(attempt, options);
			logger.warn("external_call_retry", {
				operation: options.operation,
				attempt,
				attempts,
				delayMs,
				error: describeError(error),
			});
			await wait(delayMs);
		}
	}

	throw new ExternalCallFailureError(options.operation, attempts, {
		cause: lastError,
	});
}
