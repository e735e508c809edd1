import {
	ConfigurationError,
	describeError,
	isStrategyId,
	parseSymbolList,
	toTradingDate,
	type OptionlabConfig,
	type StrategyId,
	type TradingDate,
} from "@optionlab/core";
import type { BacktestConfig } from "@optionlab/backtest-core";

export type ArgValue = string | boolean;

export const USAGE = `Usage:
  npm run backtest -- --start <YYYY-MM-DD> --end <YYYY-MM-DD> [options]
  npm run backtest -- <start> <end> [options]

Options (all optional unless noted):
  --start <date>             First trading date (required unless in the profile)
  --end <date>               Last trading date (required unless in the profile)
  --symbols <list>           Comma separated underlyings, e.g. SPY,QQQ
  --strategy <id>            Strategy id (liquidity_momentum, unusual_volume)
  --strategyProfile <name>   Strategy profile under config/strategies
  --backtestProfile <name>   Backtest profile under config/backtest
  --initialCapital <usd>     Starting capital
  --maxPositions <n>         Concurrent open positions
  --positionSizePct <pct>    Fraction of capital per position, e.g. 0.1
  --commission <usd>         Commission per contract
  --slippage <pct>           Slippage fraction, e.g. 0.01
  --dataDir <path>           Snapshot directory (<SYMBOL>/<date>.json)
  --outputDir <path>         Where run files are written
  --configDir <path>         Custom config directory
  --envPath <path>           Custom .env path
  --csv                      Also write summary, trades and equity CSV files
  --json                     Print the full run as JSON
  --help                     Show this message
`;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
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
	if (positionals[0] && args.start === undefined) {
		args.start = positionals[0];
	}
	if (positionals[1] && args.end === undefined) {
		args.end = positionals[1];
	}
	return args;
};

export const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const readStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new ConfigurationError(`Flag --${key} requires a value`);
	}
	return value;
};

export const readNumberArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = readStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const num = Number(raw);
	if (!raw.trim() || !Number.isFinite(num)) {
		throw new ConfigurationError(`Invalid numeric value for --${key}: ${raw}`);
	}
	return num;
};

const readDateArg = (
	args: Record<string, ArgValue>,
	key: "start" | "end",
	fallback: TradingDate | undefined
): TradingDate => {
	const raw = readStringArg(args, key);
	if (raw === undefined) {
		if (fallback === undefined) {
			throw new ConfigurationError(`Missing required --${key} <YYYY-MM-DD>`);
		}
		return fallback;
	}
	try {
		return toTradingDate(raw);
	} catch (error) {
		throw new ConfigurationError(`Invalid --${key} date: ${describeError(error)}`);
	}
};

/** Strategy id asked for on the command line, if any. */
export const readStrategyArg = (
	args: Record<string, ArgValue>
): StrategyId | undefined => {
	const raw = readStringArg(args, "strategy") ?? readStringArg(args, "strategyId");
	if (raw === undefined) {
		return undefined;
	}
	if (!isStrategyId(raw)) {
		throw new ConfigurationError(`Unknown strategy id: ${raw}`);
	}
	return raw;
};

export interface BacktestCliRequest {
	config: BacktestConfig;
	dataDir: string;
	outputDir: string;
	writeCsv: boolean;
	printJson: boolean;
}

/** Flags override profile values, which already carry the defaults. */
export const resolveBacktestRequest = (
	args: Record<string, ArgValue>,
	loaded: OptionlabConfig
): BacktestCliRequest => {
	const { backtest, env, strategy } = loaded;
	const strategyId = readStrategyArg(args) ?? strategy.id;
	if (strategyId !== strategy.id) {
		throw new ConfigurationError(
			`Strategy profile ${strategy.id} does not match --strategy ${strategyId}`
		);
	}
	const symbolsArg = readStringArg(args, "symbols");
	const symbols = symbolsArg !== undefined ? parseSymbolList(symbolsArg, "--symbols") : backtest.symbols;

	return {
		config: {
			symbols,
			startDate: readDateArg(args, "start", backtest.startDate),
			endDate: readDateArg(args, "end", backtest.endDate),
			strategyId,
			settings: {
				initialCapital: readNumberArg(args, "initialCapital") ?? backtest.initialCapital,
				maxPositions: readNumberArg(args, "maxPositions") ?? backtest.maxPositions,
				positionSizePct: readNumberArg(args, "positionSizePct") ?? backtest.positionSizePct,
				commissionPerContract:
					readNumberArg(args, "commission") ?? backtest.commissionPerContract,
				slippagePct: readNumberArg(args, "slippage") ?? backtest.slippagePct,
			},
			fetchTimeoutMs: backtest.fetchTimeoutMs ?? env.fetchTimeoutMs,
			maxSignalsPerDay: backtest.maxSignalsPerDay,
		},
		dataDir: readStringArg(args, "dataDir") ?? env.dataDir,
		outputDir: readStringArg(args, "outputDir") ?? env.outputDir,
		writeCsv: readFlag(args, "csv"),
		printJson: readFlag(args, "json"),
	};
};
