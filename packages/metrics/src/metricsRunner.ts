#!/usr/bin/env node

import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import { createLogger, describeError, loadEnvConfig } from "@optionlab/core";
import { calculatePerformance } from "./calcPerformance";
import { formatMetricsCsv, isCsvMode, type CsvMode } from "./formatCSV";
import { parseSavedRun } from "./savedRun";

const logger = createLogger("metrics-runner");

interface CliOptions {
	file?: string;
	outputDir?: string;
	mode?: CsvMode;
}

export interface ProcessedRunFiles {
	summaryPath: string;
	csvPath: string;
	equityPath: string;
	groupedPath: string;
}

const parseArgs = (args: string[]): CliOptions => {
	const options: CliOptions = {};
	for (let i = 0; i < args.length; i += 1) {
		const token = args[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const key = token.slice(2);
		const next = args[i + 1];
		switch (key) {
			case "file":
				options.file = next;
				i += 1;
				break;
			case "outputDir":
				options.outputDir = next;
				i += 1;
				break;
			case "mode":
				if (next && isCsvMode(next)) {
					options.mode = next;
				}
				i += 1;
				break;
			default:
				break;
		}
	}
	return options;
};

/** Newest `<runId>.json` in the backtest output directory, by mtime. */
export const resolveLatestBacktest = async (
	backtestDir: string
): Promise<string | null> => {
	let files: string[];
	try {
		files = await fs.readdir(backtestDir);
	} catch (error) {
		logger.warn("backtest_dir_unreadable", {
			dir: backtestDir,
			error: describeError(error),
		});
		return null;
	}
	let latest: { file: string; mtimeMs: number } | null = null;
	for (const file of files.filter((name) => name.endsWith(".json"))) {
		const stat = await fs.stat(path.join(backtestDir, file));
		if (stat.isFile() && (!latest || latest.mtimeMs < stat.mtimeMs)) {
			latest = { file, mtimeMs: stat.mtimeMs };
		}
	}
	return latest ? path.join(backtestDir, latest.file) : null;
};

export const processBacktestFile = async (
	filePath: string,
	metricsDir: string,
	mode: CsvMode = "trades"
): Promise<ProcessedRunFiles> => {
	const payload: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
	const run = parseSavedRun(payload);
	const report = calculatePerformance(run);
	const source = { ...run, runId: run.runId ?? undefined, report };

	await fs.mkdir(metricsDir, { recursive: true });
	const baseName = path.basename(filePath, path.extname(filePath));
	const files: ProcessedRunFiles = {
		summaryPath: path.join(metricsDir, `${baseName}.summary.json`),
		csvPath: path.join(metricsDir, `${baseName}.${mode}.csv`),
		equityPath: path.join(metricsDir, `${baseName}.equity.csv`),
		groupedPath: path.join(metricsDir, `${baseName}.symbols.csv`),
	};

	await fs.writeFile(files.summaryPath, JSON.stringify(report, null, 2), "utf8");
	await fs.writeFile(files.csvPath, formatMetricsCsv(source, { mode }), "utf8");
	await fs.writeFile(
		files.equityPath,
		formatMetricsCsv(source, { mode: "equity" }),
		"utf8"
	);
	await fs.writeFile(
		files.groupedPath,
		formatMetricsCsv(source, { mode: "grouped", groupBy: "symbol" }),
		"utf8"
	);
	logger.info("metrics_processed", { filePath, ...files });
	return files;
};

const run = async (): Promise<void> => {
	const options = parseArgs(process.argv.slice(2));
	const env = loadEnvConfig();
	const filePath = options.file ?? (await resolveLatestBacktest(env.outputDir));
	if (!filePath) {
		console.error(
			"No backtest result found. Provide --file <path> or run a backtest first."
		);
		process.exitCode = 1;
		return;
	}

	const metricsDir =
		options.outputDir ?? path.join(path.dirname(env.outputDir), "metrics");
	const files = await processBacktestFile(filePath, metricsDir, options.mode);
	console.log(`Metrics summary saved to ${files.summaryPath}`);
	console.log(`CSV saved to ${files.csvPath}`);
	console.log(`Equity CSV saved to ${files.equityPath}`);
	console.log(`Per-symbol CSV saved to ${files.groupedPath}`);
};

if (require.main === module) {
	run().catch((error: unknown) => {
		logger.error("metrics_runner_failed", { error: describeError(error) });
		process.exitCode = 1;
	});
}
