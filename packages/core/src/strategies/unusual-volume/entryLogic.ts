import { contractKey, notionalValue, quoteMarkPrice } from "../../quotes";
import type { TradingDate } from "../../time";
import type { DailyChain, OptionQuote, OptionSignal } from "../../types";
import type { UnusualVolumeConfig } from "./config";

export interface VolumeBaseline {
	averageVolume: number;
	days: number;
}

export interface UnusualActivity {
	symbol: string;
	quote: OptionQuote;
	price: number;
	notional: number;
	volumeRatio: number;
}

/** Average daily volume per contract over the supplied history. */
export const buildVolumeBaselines = (
	symbol: string,
	history: DailyChain[]
): Map<string, VolumeBaseline> => {
	const totals = new Map<string, { volume: number; days: number }>();
	for (const day of history) {
		for (const quote of day.quotes) {
			const key = contractKey({ symbol, ...quote });
			const entry = totals.get(key) ?? { volume: 0, days: 0 };
			entry.volume += quote.volume;
			entry.days += 1;
			totals.set(key, entry);
		}
	}
	const baselines = new Map<string, VolumeBaseline>();
	for (const [key, { volume, days }] of totals) {
		baselines.set(key, { averageVolume: volume / days, days });
	}
	return baselines;
};

export const detectUnusualActivity = (
	symbol: string,
	quote: OptionQuote,
	baselines: Map<string, VolumeBaseline>,
	config: UnusualVolumeConfig
): UnusualActivity | null => {
	if (!config.optionTypes.includes(quote.optionType)) {
		return null;
	}
	if (quote.volume < config.minTradeSize) {
		return null;
	}
	const price = quoteMarkPrice(quote);
	if (price === null) {
		return null;
	}
	const notional = notionalValue(price, quote.volume);
	if (notional < config.minNotionalValue) {
		return null;
	}
	const baseline = baselines.get(contractKey({ symbol, ...quote }));
	if (!baseline || baseline.days < config.minHistoryDays) {
		return null;
	}
	// Zero average with today's volume counts as unusual.
	const volumeRatio =
		baseline.averageVolume > 0
			? quote.volume / baseline.averageVolume
			: Number.POSITIVE_INFINITY;
	if (volumeRatio < config.unusualVolumeMultiplier) {
		return null;
	}
	return { symbol, quote, price, notional, volumeRatio };
};

export const rankUnusualActivity = (
	activity: UnusualActivity[],
	limit: number
): UnusualActivity[] =>
	[...activity].sort((a, b) => b.notional - a.notional).slice(0, limit);

export const toUnusualVolumeSignal = (
	activity: UnusualActivity,
	date: TradingDate
): OptionSignal => ({
	symbol: activity.symbol,
	optionType: activity.quote.optionType,
	strike: activity.quote.strike,
	expiration: activity.quote.expiration,
	price: activity.price,
	reason: `unusual_volume ${date} notional=${Math.round(activity.notional)} ratio=${
		Number.isFinite(activity.volumeRatio) ? activity.volumeRatio.toFixed(2) : "inf"
	}`,
});
