import type { DailyChain, OptionQuote, TradingDate } from "../types";

/**
 * Source of historical option-chain snapshots.
 *
 * Implementations may read from disk, a vendor API or fixtures. The backtest
 * only ever reads through this interface:
 * - one chain per symbol per simulated day
 * - a date-range series for strategies that need history (volume averages)
 */
export interface MarketDataProvider {
	/**
	 * Fetch the option chain for a symbol as of a trading date.
	 * @returns Every quoted contract; an empty array means no data that day
	 * @throws when the snapshot cannot be read
	 */
	getOptionChain(symbol: string, date: TradingDate): Promise<OptionQuote[]>;

	/**
	 * Fetch daily chains for an inclusive date range, oldest first. Days with
	 * no snapshot are omitted.
	 */
	getHistoricalChains(
		symbol: string,
		from: TradingDate,
		to: TradingDate
	): Promise<DailyChain[]>;
}
