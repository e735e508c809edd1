import { ConfigurationError } from "../../errors";
import { readNameField, readNumberField, readOptionTypesField } from "../configFields";
import type { OptionType } from "../../types";
import type { StrategyId } from "../ids";
import type { StrategyConfig, StrategyManifest } from "../types";

export const LIQUIDITY_MOMENTUM_ID: StrategyId = "liquidity_momentum";

export interface LiquidityMomentumConfig {
	name: string;
	minVolume: number;
	minOpenInterest: number;
	/** Decimal implied volatility floor; quotes without IV count as 0. */
	minImpliedVolatility: number;
	minPremium: number;
	maxPremium: number;
	minDaysToExpiration: number;
	maxDaysToExpiration: number;
	optionTypes: OptionType[];
	maxSignalsPerSymbol: number;
	profitTargetPct: number;
	/** Negative percentage, e.g. -15 closes after a 15% loss. */
	stopLossPct: number;
	/** Close this many calendar days before expiry; 0 disables. */
	exitDaysBeforeExpiration: number;
}

export const LIQUIDITY_MOMENTUM_DEFAULTS: LiquidityMomentumConfig = {
	name: "Liquidity Momentum",
	minVolume: 100,
	minOpenInterest: 500,
	minImpliedVolatility: 0.7,
	minPremium: 0.5,
	maxPremium: 20,
	minDaysToExpiration: 1,
	maxDaysToExpiration: 45,
	optionTypes: ["call", "put"],
	maxSignalsPerSymbol: 2,
	profitTargetPct: 30,
	stopLossPct: -15,
	exitDaysBeforeExpiration: 0,
};

export const liquidityMomentumManifest: StrategyManifest = {
	strategyId: LIQUIDITY_MOMENTUM_ID,
	name: LIQUIDITY_MOMENTUM_DEFAULTS.name,
	description:
		"Buys the most actively traded liquid contracts with elevated implied volatility; exits on profit target, stop loss or approaching expiry.",
};

export const parseLiquidityMomentumConfig = (
	raw: StrategyConfig
): LiquidityMomentumConfig => {
	const d = LIQUIDITY_MOMENTUM_DEFAULTS;
	const config: LiquidityMomentumConfig = {
		name: readNameField(raw, d.name),
		minVolume: readNumberField(raw, "minVolume", d.minVolume, { min: 0 }),
		minOpenInterest: readNumberField(raw, "minOpenInterest", d.minOpenInterest, {
			min: 0,
		}),
		minImpliedVolatility: readNumberField(
			raw,
			"minImpliedVolatility",
			d.minImpliedVolatility,
			{ min: 0 }
		),
		minPremium: readNumberField(raw, "minPremium", d.minPremium, { min: 0 }),
		maxPremium: readNumberField(raw, "maxPremium", d.maxPremium, { min: 0 }),
		minDaysToExpiration: readNumberField(
			raw,
			"minDaysToExpiration",
			d.minDaysToExpiration,
			{ min: 0, integer: true }
		),
		maxDaysToExpiration: readNumberField(
			raw,
			"maxDaysToExpiration",
			d.maxDaysToExpiration,
			{ min: 0, integer: true }
		),
		optionTypes: readOptionTypesField(raw, "optionTypes", d.optionTypes),
		maxSignalsPerSymbol: readNumberField(
			raw,
			"maxSignalsPerSymbol",
			d.maxSignalsPerSymbol,
			{ min: 1, integer: true }
		),
		profitTargetPct: readNumberField(raw, "profitTargetPct", d.profitTargetPct, {
			min: 0,
		}),
		stopLossPct: readNumberField(raw, "stopLossPct", d.stopLossPct, { max: 0 }),
		exitDaysBeforeExpiration: readNumberField(
			raw,
			"exitDaysBeforeExpiration",
			d.exitDaysBeforeExpiration,
			{ min: 0, integer: true }
		),
	};
	if (config.minPremium > config.maxPremium) {
		throw new ConfigurationError("minPremium must not exceed maxPremium", {
			minPremium: config.minPremium,
			maxPremium: config.maxPremium,
		});
	}
	if (config.minDaysToExpiration > config.maxDaysToExpiration) {
		throw new ConfigurationError(
			"minDaysToExpiration must not exceed maxDaysToExpiration",
			{
				minDaysToExpiration: config.minDaysToExpiration,
				maxDaysToExpiration: config.maxDaysToExpiration,
			}
		);
	}
	return config;
};
