import { createHash } from "node:crypto";
import type { BacktestRun } from "@optionlab/backtest-core";

/** Short hash of what makes two runs comparable. */
export const runFingerprint = (run: BacktestRun): string =>
	createHash("sha1")
		.update(
			JSON.stringify({
				strategyId: run.strategyId,
				symbols: run.symbols,
				startDate: run.startDate,
				endDate: run.endDate,
				settings: run.settings,
			})
		)
		.digest("hex")
		.slice(0, 8);

export const buildRunId = (run: BacktestRun, now: Date): string => {
	const timestamp = now.toISOString().replace(/[:.]/g, "-");
	return `${run.strategyId}-${timestamp}-${runFingerprint(run)}`;
};
