/**
 * Core package centralizes shared contracts, configuration and logging.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./decisions";
export * from "./config";
export * from "./env";
export * from "./data/bars";
export type * from "./exchange";
export { createLogger, log, setLogSink } from "./utils/logger";
export type {
	BaseLogPayload,
	LogLevel,
	LogSink,
	ModuleLogger,
} from "./utils/logger";
