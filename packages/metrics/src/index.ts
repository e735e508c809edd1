export * from "./metricsSchema";
export * from "./calcPerformance";
export * from "./diagnostics";
export * from "./formatCSV";
export * from "./savedRun";
export { processBacktestFile, resolveLatestBacktest } from "./metricsRunner";
export type { ProcessedRunFiles } from "./metricsRunner";
