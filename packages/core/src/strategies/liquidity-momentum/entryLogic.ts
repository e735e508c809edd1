import { quoteMarkPrice } from "../../quotes";
import { daysBetween, type TradingDate } from "../../time";
import type { MarketSnapshot, OptionQuote, OptionSignal } from "../../types";
import type { LiquidityMomentumConfig } from "./config";

export interface LiquidityCandidate {
	symbol: string;
	quote: OptionQuote;
	price: number;
	daysToExpiration: number;
}

export const meetsLiquidityCriteria = (
	quote: OptionQuote,
	date: TradingDate,
	config: LiquidityMomentumConfig
): boolean => {
	if (!config.optionTypes.includes(quote.optionType)) {
		return false;
	}
	if (quote.volume < config.minVolume) {
		return false;
	}
	if (quote.openInterest < config.minOpenInterest) {
		return false;
	}
	if ((quote.impliedVolatility ?? 0) < config.minImpliedVolatility) {
		return false;
	}
	const dte = daysBetween(date, quote.expiration);
	return dte >= config.minDaysToExpiration && dte <= config.maxDaysToExpiration;
};

const rankCandidates = (a: LiquidityCandidate, b: LiquidityCandidate): number =>
	b.quote.volume - a.quote.volume || b.quote.openInterest - a.quote.openInterest;

export const selectLiquidityCandidates = (
	snapshot: MarketSnapshot,
	date: TradingDate,
	config: LiquidityMomentumConfig
): LiquidityCandidate[] => {
	const selected: LiquidityCandidate[] = [];
	for (const [symbol, chain] of Object.entries(snapshot.chains)) {
		const candidates: LiquidityCandidate[] = [];
		for (const quote of chain) {
			if (!meetsLiquidityCriteria(quote, date, config)) {
				continue;
			}
			const price = quoteMarkPrice(quote);
			if (price === null || price < config.minPremium || price > config.maxPremium) {
				continue;
			}
			candidates.push({
				symbol,
				quote,
				price,
				daysToExpiration: daysBetween(date, quote.expiration),
			});
		}
		candidates.sort(rankCandidates);
		selected.push(...candidates.slice(0, config.maxSignalsPerSymbol));
	}
	return selected;
};

export const toLiquiditySignal = (candidate: LiquidityCandidate): OptionSignal => ({
	symbol: candidate.symbol,
	optionType: candidate.quote.optionType,
	strike: candidate.quote.strike,
	expiration: candidate.quote.expiration,
	price: candidate.price,
	reason: `liquidity_momentum vol=${candidate.quote.volume} oi=${candidate.quote.openInterest} dte=${candidate.daysToExpiration}`,
});
