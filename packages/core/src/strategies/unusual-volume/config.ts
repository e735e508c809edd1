import { readNameField, readNumberField, readOptionTypesField } from "../configFields";
import type { OptionType } from "../../types";
import type { StrategyId } from "../ids";
import type { StrategyConfig, StrategyManifest } from "../types";

export const UNUSUAL_VOLUME_ID: StrategyId = "unusual_volume";

export interface UnusualVolumeConfig {
	name: string;
	/** price × volume × 100 floor for the day's activity. */
	minNotionalValue: number;
	unusualVolumeMultiplier: number;
	/** Minimum day volume in contracts. */
	minTradeSize: number;
	lookbackDays: number;
	/** Days of history a contract needs before its average counts. */
	minHistoryDays: number;
	maxSignalsPerDay: number;
	optionTypes: OptionType[];
	profitTargetPct: number;
	stopLossPct: number;
}

export const UNUSUAL_VOLUME_DEFAULTS: UnusualVolumeConfig = {
	name: "Unusual Volume",
	minNotionalValue: 1_000_000,
	unusualVolumeMultiplier: 3,
	minTradeSize: 100,
	lookbackDays: 20,
	minHistoryDays: 5,
	maxSignalsPerDay: 3,
	optionTypes: ["call", "put"],
	profitTargetPct: 50,
	stopLossPct: -30,
};

export const unusualVolumeManifest: StrategyManifest = {
	strategyId: UNUSUAL_VOLUME_ID,
	name: UNUSUAL_VOLUME_DEFAULTS.name,
	description:
		"Follows large-notional contracts trading at a multiple of their trailing average volume; exits on profit target or stop loss.",
};

export const parseUnusualVolumeConfig = (raw: StrategyConfig): UnusualVolumeConfig => {
	const d = UNUSUAL_VOLUME_DEFAULTS;
	return {
		name: readNameField(raw, d.name),
		minNotionalValue: readNumberField(raw, "minNotionalValue", d.minNotionalValue, {
			min: 0,
		}),
		unusualVolumeMultiplier: readNumberField(
			raw,
			"unusualVolumeMultiplier",
			d.unusualVolumeMultiplier,
			{ min: 1 }
		),
		minTradeSize: readNumberField(raw, "minTradeSize", d.minTradeSize, { min: 0 }),
		lookbackDays: readNumberField(raw, "lookbackDays", d.lookbackDays, {
			min: 1,
			integer: true,
		}),
		minHistoryDays: readNumberField(raw, "minHistoryDays", d.minHistoryDays, {
			min: 1,
			integer: true,
		}),
		maxSignalsPerDay: readNumberField(raw, "maxSignalsPerDay", d.maxSignalsPerDay, {
			min: 1,
			integer: true,
		}),
		optionTypes: readOptionTypesField(raw, "optionTypes", d.optionTypes),
		profitTargetPct: readNumberField(raw, "profitTargetPct", d.profitTargetPct, {
			min: 0,
		}),
		stopLossPct: readNumberField(raw, "stopLossPct", d.stopLossPct, { max: 0 }),
	};
};
