import { promises as fs } from "node:fs";
import path from "node:path";
import type { ClosedTrade, ModuleLogger } from "@optionlab/core";
import { createLogger } from "@optionlab/core";
import type { BacktestRun, ResultsSink } from "@optionlab/backtest-core";
import { buildRunId } from "./runId";

export interface JsonFileResultsSinkOptions {
	outputDir: string;
	clock?: () => Date;
	logger?: ModuleLogger;
}

/**
 * Writes `<outputDir>/<runId>.json` once per run and appends one JSON line
 * per trade to `<outputDir>/<runId>.trades.jsonl`.
 */
export class JsonFileResultsSink implements ResultsSink {
	private readonly outputDir: string;
	private readonly clock: () => Date;
	private readonly logger: ModuleLogger;

	constructor(options: JsonFileResultsSinkOptions) {
		this.outputDir = path.resolve(options.outputDir);
		this.clock = options.clock ?? (() => new Date());
		this.logger = options.logger ?? createLogger("results-sink");
	}

	runPath(runId: string): string {
		return path.join(this.outputDir, `${runId}.json`);
	}

	tradesPath(runId: string): string {
		return path.join(this.outputDir, `${runId}.trades.jsonl`);
	}

	async persist(run: BacktestRun): Promise<string> {
		const runId = buildRunId(run, this.clock());
		await fs.mkdir(this.outputDir, { recursive: true });
		await fs.writeFile(
			this.runPath(runId),
			JSON.stringify({ ...run, runId }, null, 2),
			"utf8"
		);
		await fs.writeFile(this.tradesPath(runId), "", "utf8");
		this.logger.info("run_persisted", {
			runId,
			path: this.runPath(runId),
			trades: run.closedTrades.length,
		});
		return runId;
	}

	async persistTrade(runId: string, trade: ClosedTrade): Promise<void> {
		await fs.appendFile(
			this.tradesPath(runId),
			`${JSON.stringify({ runId, ...trade })}\n`,
			"utf8"
		);
	}
}
