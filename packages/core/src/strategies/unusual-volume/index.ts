import { ConfigurationError, describeError } from "../../errors";
import type { MarketDataProvider } from "../../marketData/MarketDataProvider";
import { addDays, type TradingDate } from "../../time";
import type { MarketSnapshot, OptionQuote, OptionSignal, Position } from "../../types";
import { createLogger } from "../../utils/logger";
import type {
	OptionsStrategy,
	StrategyConfig,
	StrategyDependencies,
} from "../types";
import {
	UNUSUAL_VOLUME_ID,
	type UnusualVolumeConfig,
	parseUnusualVolumeConfig,
	unusualVolumeManifest,
} from "./config";
import {
	type UnusualActivity,
	buildVolumeBaselines,
	detectUnusualActivity,
	rankUnusualActivity,
	toUnusualVolumeSignal,
} from "./entryLogic";
import { evaluateUnusualVolumeExit } from "./exitLogic";

const logger = createLogger("strategy:unusual-volume");

export class UnusualVolumeStrategy implements OptionsStrategy {
	constructor(
		private readonly config: UnusualVolumeConfig,
		private readonly marketData: MarketDataProvider
	) {}

	async generateSignals(
		snapshot: MarketSnapshot,
		date: TradingDate
	): Promise<OptionSignal[]> {
		const from = addDays(date, -this.config.lookbackDays);
		const to = addDays(date, -1);
		const perSymbol = await Promise.all(
			Object.entries(snapshot.chains).map(([symbol, chain]) =>
				this.scanSymbol(symbol, chain, from, to, date)
			)
		);
		const ranked = rankUnusualActivity(
			perSymbol.flat(),
			this.config.maxSignalsPerDay
		);
		if (ranked.length) {
			logger.info("unusual_activity_detected", {
				date,
				signals: ranked.length,
				contracts: ranked.map(
					(item) =>
						`${item.symbol} ${item.quote.optionType} ${item.quote.strike} ${item.quote.expiration}`
				),
			});
		}
		return ranked.map((item) => toUnusualVolumeSignal(item, date));
	}

	checkExitCriteria(position: Position, quote: OptionQuote): string | null {
		return evaluateUnusualVolumeExit(position, quote, this.config);
	}

	private async scanSymbol(
		symbol: string,
		chain: OptionQuote[],
		from: TradingDate,
		to: TradingDate,
		date: TradingDate
	): Promise<UnusualActivity[]> {
		try {
			const history = await this.marketData.getHistoricalChains(symbol, from, to);
			const baselines = buildVolumeBaselines(symbol, history);
			const found: UnusualActivity[] = [];
			for (const quote of chain) {
				const activity = detectUnusualActivity(symbol, quote, baselines, this.config);
				if (activity) {
					found.push(activity);
				}
			}
			return found;
		} catch (error) {
			logger.warn("volume_history_unavailable", {
				symbol,
				date,
				from,
				to,
				error: describeError(error),
			});
			return [];
		}
	}
}

export const unusualVolumeModule = {
	id: UNUSUAL_VOLUME_ID,
	manifest: unusualVolumeManifest,
	defaultProfile: "unusual-volume",
	createStrategy: (
		config: StrategyConfig,
		deps: StrategyDependencies
	): OptionsStrategy => {
		if (!deps.marketData) {
			throw new ConfigurationError(
				"unusual_volume requires a market data provider for volume history",
				{ strategyId: UNUSUAL_VOLUME_ID }
			);
		}
		return new UnusualVolumeStrategy(parseUnusualVolumeConfig(config), deps.marketData);
	},
};

export default unusualVolumeModule;
