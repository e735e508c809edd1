import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors";
import type { MarketSnapshot, OptionQuote, Position } from "../../types";
import { parseLiquidityMomentumConfig } from "./config";
import { LiquidityMomentumStrategy } from "./index";

const quote = (overrides: Partial<OptionQuote> = {}): OptionQuote => ({
	strike: 100,
	optionType: "call",
	expiration: "2024-01-19",
	bid: 2.4,
	ask: 2.6,
	last: 2.5,
	volume: 800,
	openInterest: 1_000,
	underlyingPrice: 101,
	impliedVolatility: 0.8,
	...overrides,
});

const position = (overrides: Partial<Position> = {}): Position => ({
	id: "pos_1",
	status: "OPEN",
	symbol: "SPY",
	optionType: "call",
	strike: 100,
	expiration: "2024-01-19",
	entryDate: "2024-01-02",
	entryPrice: 2,
	contracts: 5,
	costBasis: 1_003.25,
	currentPrice: 2,
	lastMarkDate: "2024-01-02",
	...overrides,
});

const snapshot: MarketSnapshot = {
	date: "2024-01-02",
	chains: {
		SPY: [
			quote(),
			quote({ strike: 105, volume: 1_200, openInterest: 900, impliedVolatility: 0.9, last: 1.2 }),
			quote({ optionType: "put", strike: 95, volume: 50 }),
			quote({ strike: 110, impliedVolatility: undefined }),
			quote({ strike: 90, volume: 2_000, openInterest: 2_000, last: 25 }),
			quote({ strike: 100, expiration: "2024-03-29", volume: 3_000 }),
			quote({ optionType: "put", strike: 98, volume: 900, last: 0, bid: 1, ask: 1.5 }),
		],
	},
	underlyingPrices: { SPY: 101 },
	missingSymbols: [],
};

describe("LiquidityMomentumStrategy", () => {
	const strategy = new LiquidityMomentumStrategy(
		parseLiquidityMomentumConfig({ id: "liquidity_momentum" })
	);

	it("keeps the most active contracts that pass every filter", () => {
		const signals = strategy.generateSignals(snapshot, "2024-01-02");
		expect(signals).toEqual([
			{
				symbol: "SPY",
				optionType: "call",
				strike: 105,
				expiration: "2024-01-19",
				price: 1.2,
				reason: "liquidity_momentum vol=1200 oi=900 dte=17",
			},
			{
				symbol: "SPY",
				optionType: "put",
				strike: 98,
				expiration: "2024-01-19",
				price: 1.25,
				reason: "liquidity_momentum vol=900 oi=1000 dte=17",
			},
		]);
	});

	it("restricts signals to the configured option types", () => {
		const callsOnly = new LiquidityMomentumStrategy(
			parseLiquidityMomentumConfig({
				id: "liquidity_momentum",
				optionTypes: ["call"],
				maxSignalsPerSymbol: 5,
			})
		);
		const signals = callsOnly.generateSignals(snapshot, "2024-01-02");
		expect(signals.map((signal) => signal.strike)).toEqual([105, 100]);
	});

	it("exits at the profit target and the stop loss", () => {
		expect(
			strategy.checkExitCriteria(position(), quote({ last: 2.7 }), "2024-01-05")
		).toBe("profit_target");
		expect(
			strategy.checkExitCriteria(position(), quote({ last: 1.6 }), "2024-01-05")
		).toBe("stop_loss");
		expect(
			strategy.checkExitCriteria(position(), quote({ last: 2.2 }), "2024-01-05")
		).toBeNull();
	});

	it("exits shortly before expiration when configured", () => {
		const cautious = new LiquidityMomentumStrategy(
			parseLiquidityMomentumConfig({
				id: "liquidity_momentum",
				exitDaysBeforeExpiration: 3,
			})
		);
		expect(
			cautious.checkExitCriteria(position(), quote({ last: 2.2 }), "2024-01-17")
		).toBe("pre_expiration");
		expect(
			cautious.checkExitCriteria(position(), quote({ last: 2.2 }), "2024-01-19")
		).toBeNull();
	});
});

describe("parseLiquidityMomentumConfig", () => {
	it("applies defaults", () => {
		const config = parseLiquidityMomentumConfig({ id: "liquidity_momentum" });
		expect(config.minVolume).toBe(100);
		expect(config.minOpenInterest).toBe(500);
		expect(config.minImpliedVolatility).toBe(0.7);
		expect(config.stopLossPct).toBe(-15);
	});

	it("rejects invalid values", () => {
		expect(() =>
			parseLiquidityMomentumConfig({ id: "liquidity_momentum", minVolume: "lots" })
		).toThrow(ConfigurationError);
		expect(() =>
			parseLiquidityMomentumConfig({ id: "liquidity_momentum", stopLossPct: 10 })
		).toThrow("Strategy field stopLossPct must be <= 0");
		expect(() =>
			parseLiquidityMomentumConfig({
				id: "liquidity_momentum",
				minPremium: 5,
				maxPremium: 1,
			})
		).toThrow("minPremium must not exceed maxPremium");
		expect(() =>
			parseLiquidityMomentumConfig({
				id: "liquidity_momentum",
				optionTypes: ["straddle"],
			})
		).toThrow("Unknown option type in optionTypes: straddle");
	});
});
