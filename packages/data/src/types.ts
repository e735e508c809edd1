import type { ErrorReporter, OptionQuote, TradingDate } from "@optionlab/core";

export interface DataProviderLogger {
	debug?: (event: string, payload?: Record<string, unknown>) => void;
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface FileSnapshotProviderConfig {
	/** Directory holding `<SYMBOL>/<YYYY-MM-DD>.json` chain files. */
	rootDir: string;
	logger?: DataProviderLogger;
}

export interface SnapshotLoadOptions {
	/** Per-symbol fetch bound; a timed out symbol has no data that day. */
	timeoutMs: number;
	reporter?: ErrorReporter;
	logger?: DataProviderLogger;
}

export interface ParsedChain {
	date?: TradingDate;
	quotes: OptionQuote[];
	/** One entry per dropped row: index and what was wrong with it. */
	rejected: Array<{ index: number; reason: string }>;
}
