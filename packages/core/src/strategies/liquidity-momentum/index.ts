import type { TradingDate } from "../../time";
import type { MarketSnapshot, OptionQuote, OptionSignal, Position } from "../../types";
import { createLogger } from "../../utils/logger";
import type {
	OptionsStrategy,
	StrategyConfig,
	StrategyDependencies,
} from "../types";
import {
	LIQUIDITY_MOMENTUM_ID,
	type LiquidityMomentumConfig,
	liquidityMomentumManifest,
	parseLiquidityMomentumConfig,
} from "./config";
import { selectLiquidityCandidates, toLiquiditySignal } from "./entryLogic";
import { evaluateLiquidityExit } from "./exitLogic";

const logger = createLogger("strategy:liquidity-momentum");

export class LiquidityMomentumStrategy implements OptionsStrategy {
	constructor(private readonly config: LiquidityMomentumConfig) {}

	generateSignals(snapshot: MarketSnapshot, date: TradingDate): OptionSignal[] {
		const candidates = selectLiquidityCandidates(snapshot, date, this.config);
		logger.debug("signals_generated", {
			date,
			symbols: Object.keys(snapshot.chains).length,
			signals: candidates.length,
		});
		return candidates.map(toLiquiditySignal);
	}

	checkExitCriteria(
		position: Position,
		quote: OptionQuote,
		date: TradingDate
	): string | null {
		return evaluateLiquidityExit(position, quote, date, this.config);
	}
}

export const liquidityMomentumModule = {
	id: LIQUIDITY_MOMENTUM_ID,
	manifest: liquidityMomentumManifest,
	defaultProfile: "liquidity-momentum",
	createStrategy: (
		config: StrategyConfig,
		_deps: StrategyDependencies
	): OptionsStrategy =>
		new LiquidityMomentumStrategy(parseLiquidityMomentumConfig(config)),
};

export default liquidityMomentumModule;
