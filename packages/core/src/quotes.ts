import type {
	MarketSnapshot,
	OptionContract,
	OptionQuote,
	OptionType,
} from "./types";

export const CONTRACT_MULTIPLIER = 100;

const STRIKE_EPSILON = 1e-6;

export const contractKey = (contract: OptionContract): string =>
	`${contract.symbol}|${contract.optionType}|${contract.strike}|${contract.expiration}`;

export const quoteMatchesContract = (
	quote: OptionQuote,
	contract: Pick<OptionContract, "optionType" | "strike" | "expiration">
): boolean =>
	quote.optionType === contract.optionType &&
	Math.abs(quote.strike - contract.strike) < STRIKE_EPSILON &&
	quote.expiration === contract.expiration;

/** Looks up a contract in the day's snapshot; null when its symbol or row is absent. */
export const findContractQuote = (
	snapshot: MarketSnapshot,
	contract: OptionContract
): OptionQuote | null => {
	const chain = snapshot.chains[contract.symbol];
	if (!chain) {
		return null;
	}
	return chain.find((quote) => quoteMatchesContract(quote, contract)) ?? null;
};

/**
 * Reference price for a quote: last trade when positive, otherwise the bid/ask
 * mid when both sides are quoted. Null means the row carries no usable price.
 */
export const quoteMarkPrice = (quote: OptionQuote): number | null => {
	if (Number.isFinite(quote.last) && quote.last > 0) {
		return quote.last;
	}
	if (
		Number.isFinite(quote.bid) &&
		Number.isFinite(quote.ask) &&
		quote.bid > 0 &&
		quote.ask > 0
	) {
		return (quote.bid + quote.ask) / 2;
	}
	return null;
};

/** Dollar-equivalent size of the day's traded volume. */
export const notionalValue = (price: number, volume: number): number =>
	price * volume * CONTRACT_MULTIPLIER;

export const isOptionType = (value: unknown): value is OptionType =>
	value === "call" || value === "put";
