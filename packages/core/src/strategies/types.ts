import type { MarketDataProvider } from "../marketData/MarketDataProvider";
import type {
	MarketSnapshot,
	OptionQuote,
	OptionSignal,
	Position,
	TradingDate,
} from "../types";
import type { StrategyId } from "./ids";

/**
 * Pluggable trading policy. The backtest asks for entries once per day while
 * capacity remains, and asks about exits for every open position whose
 * contract is quoted that day.
 */
export interface OptionsStrategy {
	generateSignals(
		snapshot: MarketSnapshot,
		date: TradingDate
	): Promise<OptionSignal[]> | OptionSignal[];

	/** @returns an exit reason to close the position, or null to keep holding */
	checkExitCriteria(
		position: Position,
		quote: OptionQuote,
		date: TradingDate
	): Promise<string | null> | string | null;
}

export interface StrategyConfig {
	id: StrategyId;
	name?: string;
	[key: string]: unknown;
}

export interface StrategyDependencies {
	/** Historical accessor for strategies that look back over prior days. */
	marketData?: MarketDataProvider;
}

export interface StrategyManifest {
	strategyId: StrategyId;
	name: string;
	description: string;
}
