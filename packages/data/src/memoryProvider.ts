import {
	type DailyChain,
	type MarketDataProvider,
	type OptionQuote,
	type TradingDate,
	compareTradingDates,
} from "@optionlab/core";

export type ChainFixtures = Record<string, Record<TradingDate, OptionQuote[]>>;

/**
 * Fixture-backed provider. Chains are keyed by symbol then date; a failure
 * registered for a symbol/date pair is thrown instead of returning data.
 */
export class InMemoryMarketDataProvider implements MarketDataProvider {
	private readonly chains = new Map<string, Map<TradingDate, OptionQuote[]>>();
	private readonly failures = new Map<string, Error>();
	readonly requests: Array<{ symbol: string; date: TradingDate }> = [];

	constructor(fixtures: ChainFixtures = {}) {
		for (const [symbol, byDate] of Object.entries(fixtures)) {
			for (const [date, quotes] of Object.entries(byDate)) {
				this.setChain(symbol, date, quotes);
			}
		}
	}

	setChain(symbol: string, date: TradingDate, quotes: OptionQuote[]): this {
		const byDate = this.chains.get(symbol) ?? new Map<TradingDate, OptionQuote[]>();
		byDate.set(date, quotes.map((quote) => ({ ...quote })));
		this.chains.set(symbol, byDate);
		return this;
	}

	setFailure(symbol: string, date: TradingDate, error: Error): this {
		this.failures.set(`${symbol}|${date}`, error);
		return this;
	}

	async getOptionChain(symbol: string, date: TradingDate): Promise<OptionQuote[]> {
		this.requests.push({ symbol, date });
		const failure = this.failures.get(`${symbol}|${date}`);
		if (failure) {
			throw failure;
		}
		const quotes = this.chains.get(symbol)?.get(date) ?? [];
		return quotes.map((quote) => ({ ...quote }));
	}

	async getHistoricalChains(
		symbol: string,
		from: TradingDate,
		to: TradingDate
	): Promise<DailyChain[]> {
		const byDate = this.chains.get(symbol);
		if (!byDate) {
			return [];
		}
		return [...byDate.entries()]
			.filter(
				([date]) =>
					compareTradingDates(date, from) >= 0 && compareTradingDates(date, to) <= 0
			)
			.sort(([a], [b]) => compareTradingDates(a, b))
			.map(([date, quotes]) => ({
				date,
				quotes: quotes.map((quote) => ({ ...quote })),
			}));
	}
}
