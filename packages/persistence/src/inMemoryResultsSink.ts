import type { ClosedTrade } from "@optionlab/core";
import type { BacktestRun, ResultsSink } from "@optionlab/backtest-core";

export interface StoredRun {
	run: BacktestRun;
	trades: ClosedTrade[];
}

/** Keeps runs in memory with sequential ids; used by tests and dry runs. */
export class InMemoryResultsSink implements ResultsSink {
	private readonly runs = new Map<string, StoredRun>();
	private sequence = 0;

	constructor(private readonly idPrefix = "run") {}

	async persist(run: BacktestRun): Promise<string> {
		this.sequence += 1;
		const runId = `${this.idPrefix}-${this.sequence}`;
		this.runs.set(runId, { run: { ...run, runId }, trades: [] });
		return runId;
	}

	async persistTrade(runId: string, trade: ClosedTrade): Promise<void> {
		const stored = this.runs.get(runId);
		if (!stored) {
			throw new Error(`Unknown run ${runId}`);
		}
		stored.trades.push({ ...trade });
	}

	get(runId: string): StoredRun | undefined {
		return this.runs.get(runId);
	}

	runIds(): string[] {
		return [...this.runs.keys()];
	}
}
