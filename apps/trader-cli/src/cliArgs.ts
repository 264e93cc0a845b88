import {
	ConfigError,
	parseStrategyMode,
	type ExecutionMode,
	type StrategyMode,
} from "@openrange/core";

type ArgValue = string | boolean;

export interface TraderCliOptions {
	envFile?: string;
	profile?: string;
	executionMode?: ExecutionMode;
	strategyMode?: StrategyMode;
	symbol?: string;
	/** JSON file of bars served on every cycle when EXCHANGE_ID is "paper". */
	barsFile?: string;
	storePath?: string;
	maxCycles?: number;
	help: boolean;
}

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

const getPositiveIntArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = getStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigError(`--${key} must be a positive integer, got "${raw}"`);
	}
	return value;
};

const parseModeArg = (value: string): ExecutionMode => {
	const normalized = value.trim().toLowerCase();
	if (normalized === "paper" || normalized === "live") {
		return normalized;
	}
	throw new ConfigError(`--mode must be paper or live, got "${value}"`);
};

export const resolveCliOptions = (argv: string[]): TraderCliOptions => {
	const args = parseCliArgs(argv);
	const mode = getStringArg(args, "mode");
	const strategy = getStringArg(args, "strategy");
	return {
		envFile: getStringArg(args, "env-file"),
		profile: getStringArg(args, "profile"),
		executionMode: mode ? parseModeArg(mode) : undefined,
		strategyMode: strategy ? parseStrategyMode(strategy) : undefined,
		symbol: getStringArg(args, "symbol"),
		barsFile: getStringArg(args, "bars"),
		storePath: getStringArg(args, "store"),
		maxCycles: getPositiveIntArg(args, "cycles"),
		help: args.help === true,
	};
};

export const USAGE = `Usage: openrange-trader [options]

  --profile <name>     engine profile under config/engine (default: ENGINE_PROFILE or "default")
  --mode <paper|live>  execution mode
  --strategy <mode>    ADAPTIVE, BREAKOUT or REVERSION
  --symbol <symbol>    instrument to trade
  --bars <file>        JSON bars served on every cycle (EXCHANGE_ID=paper)
  --store <file>       trade store path (JSON lines)
  --cycles <n>         stop after n cycles
  --env-file <file>    extra .env file
  --help               show this message`;
