import {
	createLogger,
	describeError,
	getConfigMetadata,
	loadAppConfig,
} from "@openrange/core";
import { startTrader } from "@openrange/runtime";
import { USAGE, resolveCliOptions } from "./cliArgs";
import { composeTrader, resumeOpenTrade } from "./composeTrader";

const logger = createLogger("trader-cli");

const main = async (): Promise<void> => {
	const options = resolveCliOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const app = loadAppConfig({ envFile: options.envFile, profile: options.profile });
	const trader = composeTrader(app, options);
	const { config, session, store } = trader;
	await resumeOpenTrade(trader);

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals): void => {
		logger.info("cli_stop_requested", { signal });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	logger.info("cli_starting", {
		symbol: config.symbol,
		executionMode: config.executionMode,
		strategyMode: config.strategyMode,
		profile: options.profile ?? app.env.engineProfile,
		configPath: getConfigMetadata(config)?.path ?? null,
		maxCycles: options.maxCycles ?? null,
	});

	const summary = await startTrader(session, {
		signal: controller.signal,
		maxCycles: options.maxCycles,
	});

	process.off("SIGINT", stop);
	process.off("SIGTERM", stop);

	logger.info("cli_finished", {
		cycles: summary.cycles,
		stoppedBy: summary.stoppedBy,
		lastAction: summary.lastReport?.action ?? null,
		trades: await store.fetchSummary(),
	});
};

main().catch((error: unknown) => {
	logger.error("cli_unhandled_error", {
		message: describeError(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
