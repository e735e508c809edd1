import { quoteMarkPrice } from "../../quotes";
import { daysBetween, type TradingDate } from "../../time";
import type { OptionQuote, Position } from "../../types";
import type { LiquidityMomentumConfig } from "./config";

export const EXIT_PROFIT_TARGET = "profit_target";
export const EXIT_STOP_LOSS = "stop_loss";
export const EXIT_PRE_EXPIRATION = "pre_expiration";

/** Percentage change of the quote's mark against the entry fill. */
export const unrealizedChangePct = (
	position: Position,
	quote: OptionQuote
): number | null => {
	const mark = quoteMarkPrice(quote);
	if (mark === null || position.entryPrice <= 0) {
		return null;
	}
	return ((mark - position.entryPrice) / position.entryPrice) * 100;
};

export const evaluateLiquidityExit = (
	position: Position,
	quote: OptionQuote,
	date: TradingDate,
	config: LiquidityMomentumConfig
): string | null => {
	const changePct = unrealizedChangePct(position, quote);
	if (changePct !== null) {
		if (changePct >= config.profitTargetPct) {
			return EXIT_PROFIT_TARGET;
		}
		if (changePct <= config.stopLossPct) {
			return EXIT_STOP_LOSS;
		}
	}
	if (config.exitDaysBeforeExpiration > 0) {
		const dte = daysBetween(date, position.expiration);
		if (dte > 0 && dte <= config.exitDaysBeforeExpiration) {
			return EXIT_PRE_EXPIRATION;
		}
	}
	return null;
};
