import {
	DataUnavailableError,
	type MarketDataProvider,
	type MarketSnapshot,
	type OptionQuote,
	type TradingDate,
	createLogger,
	describeError,
} from "@optionlab/core";
import type { DataProviderLogger, SnapshotLoadOptions } from "./types";

const defaultLogger = createLogger("snapshot-loader");

export class FetchTimeoutError extends Error {
	constructor(readonly timeoutMs: number) {
		super(`Fetch timed out after ${timeoutMs}ms`);
		this.name = "FetchTimeoutError";
	}
}

/** Races `promise` against a timer; the timer is always cleared. */
export const withTimeout = async <T>(
	promise: Promise<T>,
	timeoutMs: number
): Promise<T> => {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new FetchTimeoutError(timeoutMs)), timeoutMs);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
};

type SymbolFetchResult =
	| { symbol: string; quotes: OptionQuote[] }
	| { symbol: string; error: DataUnavailableError };

const fetchSymbol = async (
	provider: MarketDataProvider,
	symbol: string,
	date: TradingDate,
	timeoutMs: number
): Promise<SymbolFetchResult> => {
	try {
		const quotes = await withTimeout(provider.getOptionChain(symbol, date), timeoutMs);
		if (!quotes.length) {
			return {
				symbol,
				error: new DataUnavailableError(symbol, date, "empty option chain"),
			};
		}
		return { symbol, quotes };
	} catch (error) {
		const detail =
			error instanceof FetchTimeoutError
				? `timed out after ${timeoutMs}ms`
				: describeError(error);
		return { symbol, error: new DataUnavailableError(symbol, date, detail, error) };
	}
};

const underlyingFrom = (quotes: OptionQuote[]): number | null => {
	const quote = quotes.find((item) => item.underlyingPrice > 0);
	return quote ? quote.underlyingPrice : null;
};

/**
 * Fetches every symbol's chain for one day concurrently. A symbol that fails,
 * times out or returns nothing is reported and left out of `chains`.
 */
export const loadDailySnapshot = async (
	provider: MarketDataProvider,
	symbols: readonly string[],
	date: TradingDate,
	options: SnapshotLoadOptions
): Promise<MarketSnapshot> => {
	const logger: DataProviderLogger = options.logger ?? defaultLogger;
	const results = await Promise.all(
		symbols.map((symbol) => fetchSymbol(provider, symbol, date, options.timeoutMs))
	);

	const snapshot: MarketSnapshot = {
		date,
		chains: {},
		underlyingPrices: {},
		missingSymbols: [],
	};
	for (const result of results) {
		if ("error" in result) {
			snapshot.missingSymbols.push(result.symbol);
			options.reporter?.report(result.error);
			logger.warn?.("symbol_data_unavailable", {
				symbol: result.symbol,
				date,
				detail: result.error.context.detail,
			});
			continue;
		}
		snapshot.chains[result.symbol] = result.quotes;
		const underlying = underlyingFrom(result.quotes);
		if (underlying !== null) {
			snapshot.underlyingPrices[result.symbol] = underlying;
		}
	}
	logger.debug?.("snapshot_loaded", {
		date,
		symbols: Object.keys(snapshot.chains).length,
		missing: snapshot.missingSymbols.length,
	});
	return snapshot;
};
