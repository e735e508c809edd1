import type { TradingDate } from "./time";

export * from "./time";

export type OptionType = "call" | "put";

export interface OptionContract {
	symbol: string;
	optionType: OptionType;
	strike: number;
	expiration: TradingDate;
}

export interface OptionGreeks {
	delta?: number;
	gamma?: number;
	theta?: number;
	vega?: number;
}

/**
 * One row of a provider's option chain for a symbol on a given day.
 */
export interface OptionQuote {
	strike: number;
	optionType: OptionType;
	expiration: TradingDate;
	bid: number;
	ask: number;
	last: number;
	volume: number;
	openInterest: number;
	underlyingPrice: number;
	impliedVolatility?: number;
	greeks?: OptionGreeks;
}

export interface DailyChain {
	date: TradingDate;
	quotes: OptionQuote[];
}

export interface MarketSnapshot {
	date: TradingDate;
	chains: Record<string, OptionQuote[]>;
	underlyingPrices: Record<string, number>;
	/** Symbols requested for the day that produced no usable chain. */
	missingSymbols: string[];
}

export interface OptionSignal extends OptionContract {
	price: number;
	reason?: string;
}

export type PositionStatus = "OPEN" | "CLOSED";

export const EXIT_REASON_EXPIRATION = "expiration";
export const EXIT_REASON_END_OF_BACKTEST = "end_of_backtest";

export type BuiltInExitReason =
	| typeof EXIT_REASON_EXPIRATION
	| typeof EXIT_REASON_END_OF_BACKTEST;

/** Built-in reasons plus whatever label a strategy exit returns. */
export type ExitReason = BuiltInExitReason | (string & {});

export interface Position extends OptionContract {
	id: string;
	status: "OPEN";
	entryDate: TradingDate;
	/** Slippage-adjusted fill paid per share. */
	entryPrice: number;
	contracts: number;
	costBasis: number;
	currentPrice: number;
	lastMarkDate: TradingDate;
}

export type ExitPriceSource = "market" | "stale";

export interface ClosedTrade extends OptionContract {
	id: string;
	status: "CLOSED";
	entryDate: TradingDate;
	entryPrice: number;
	contracts: number;
	costBasis: number;
	exitDate: TradingDate;
	/** Slippage-adjusted fill received per share. */
	exitPrice: number;
	exitReason: ExitReason;
	priceSource: ExitPriceSource;
	proceeds: number;
	profitLoss: number;
	profitLossPct: number;
}

export interface EquityPoint {
	date: TradingDate;
	cash: number;
	positionsValue: number;
	totalEquity: number;
}

export interface SimulationSettings {
	initialCapital: number;
	maxPositions: number;
	positionSizePct: number;
	commissionPerContract: number;
	slippagePct: number;
}
