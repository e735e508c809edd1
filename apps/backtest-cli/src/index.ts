#!/usr/bin/env node

import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import {
	OrchestrationFailure,
	createLogger,
	describeError,
	loadOptionlabConfig,
	resolveStrategyProfileName,
} from "@optionlab/core";
import { runBacktest, type BacktestRun } from "@optionlab/backtest-core";
import { FileSnapshotProvider } from "@optionlab/data";
import { formatMetricsCsv, type CsvMode } from "@optionlab/metrics";
import { JsonFileResultsSink } from "@optionlab/persistence";
import {
	USAGE,
	parseCliArgs,
	readStrategyArg,
	readStringArg,
	resolveBacktestRequest,
} from "./cliArgs";

const logger = createLogger("backtest-cli");

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;
const formatPct = (value: number): string => `${value.toFixed(2)}%`;

const printSummary = (run: BacktestRun, savedPath: string): void => {
	const { metrics } = run;
	console.log("---- Summary ----");
	console.log(`Strategy: ${run.strategyId} on ${run.symbols.join(", ")}`);
	console.log(`Period: ${run.startDate} to ${run.endDate} (${run.tradingDays} trading days)`);
	console.log(`Initial capital: ${formatUsd(run.initialCapital)}`);
	console.log(`Final capital: ${formatUsd(run.finalCapital)}`);
	console.log(`Total return: ${formatPct(metrics.totalReturnPct)}`);
	console.log(`Annualized return: ${formatPct(metrics.annualizedReturnPct)}`);
	console.log(`Sharpe: ${metrics.sharpeRatio.toFixed(2)}  Sortino: ${metrics.sortinoRatio.toFixed(2)}`);
	console.log(
		`Max drawdown: ${formatPct(metrics.maxDrawdownPct)} over ${metrics.maxDrawdownDurationDays} days`
	);
	console.log(
		`Trades: ${metrics.totalTrades} (win rate ${formatPct(metrics.winRate)}, profit factor ${metrics.profitFactor.toFixed(2)}${metrics.profitFactorCapped ? " capped" : ""})`
	);
	console.log(`Non-fatal errors: ${run.errors.totalErrors}`);
	const relative = path.relative(process.cwd(), savedPath) || savedPath;
	console.log(`Backtest saved to ${relative}`);
};

const writeCsvFiles = async (run: BacktestRun, outputDir: string, runId: string): Promise<void> => {
	const modes: CsvMode[] = ["summary", "trades", "equity"];
	const source = {
		...run,
		runId,
		report: {
			metrics: run.metrics,
			drawdowns: run.drawdowns,
			equity: run.equityStats,
			diagnostics: run.diagnostics,
		},
	};
	for (const mode of modes) {
		const filePath = path.join(outputDir, `${runId}.${mode}.csv`);
		await fs.writeFile(filePath, formatMetricsCsv(source, { mode }), "utf8");
		console.log(`CSV ${mode} saved to ${filePath}`);
	}
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (args.help) {
		console.log(USAGE);
		return;
	}

	const requestedStrategy = readStrategyArg(args);
	const loaded = loadOptionlabConfig({
		envPath: readStringArg(args, "envPath"),
		configDir: readStringArg(args, "configDir"),
		backtestProfile: readStringArg(args, "backtestProfile"),
		strategyProfile:
			readStringArg(args, "strategyProfile") ??
			(requestedStrategy ? resolveStrategyProfileName(requestedStrategy) : undefined),
	});
	const request = resolveBacktestRequest(args, loaded);

	console.log(
		`Running backtest for ${request.config.symbols.join(", ")} (${request.config.strategyId})...`
	);
	const sink = new JsonFileResultsSink({ outputDir: request.outputDir });
	const run = await runBacktest(request.config, {
		marketData: new FileSnapshotProvider({ rootDir: request.dataDir }),
		strategyConfig: loaded.strategy,
		sink,
	});
	const runId = run.runId ?? "unsaved";

	if (request.printJson) {
		console.log(JSON.stringify(run, null, 2));
	}
	printSummary(run, sink.runPath(runId));
	if (request.writeCsv) {
		await writeCsvFiles(run, request.outputDir, runId);
	}
};

main().catch((error: unknown) => {
	if (error instanceof OrchestrationFailure) {
		logger.error("backtest_cli_failed", {
			error: error.message,
			partial: error.partial,
		});
	}
	console.error("Backtest failed:", describeError(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
