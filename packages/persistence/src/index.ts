export * from "./runId";
export * from "./inMemoryResultsSink";
export * from "./jsonFileResultsSink";
export type { ResultsSink } from "@optionlab/backtest-core";
