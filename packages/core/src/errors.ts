export type EngineErrorCode =
	| "DATA_ERROR"
	| "INVARIANT_VIOLATION"
	| "EXTERNAL_CALL_FAILURE"
	| "CONFIG_ERROR";

export class EngineError extends Error {
	readonly code: EngineErrorCode;

	constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Missing or insufficient bars, or timestamps that cannot be resolved. */
export class DataError extends EngineError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("DATA_ERROR", message, options);
	}
}

export class InvariantViolationError extends EngineError {
	constructor(message: string) {
		super("INVARIANT_VIOLATION", message);
	}
}

export class ExternalCallFailureError extends EngineError {
	readonly operation: string;
	readonly attempts: number;

	constructor(
		operation: string,
		attempts: number,
		options?: { cause?: unknown }
	) {
		const causeMessage =
			options?.cause instanceof Error ? `: ${options.cause.message}` : "";
		super(
			"EXTERNAL_CALL_FAILURE",
			`${operation} failed after ${attempts} attempt(s)${causeMessage}`,
			options
		);
		this.operation = operation;
		this.attempts = attempts;
	}
}

export class ConfigError extends EngineError {
	constructor(message: string) {
		super("CONFIG_ERROR", message);
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
