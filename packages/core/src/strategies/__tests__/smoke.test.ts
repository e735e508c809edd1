/**
 * Every registered strategy builds from its bundled defaults and produces
 * well-formed signals for a plain snapshot.
 */

import { describe, it, expect } from "vitest";
import type { MarketDataProvider } from "../../marketData/MarketDataProvider";
import type { MarketSnapshot } from "../../types";
import { getRegisteredStrategyIds, getStrategyDefinition } from "../registry";

const emptyProvider: MarketDataProvider = {
	getOptionChain: async () => [],
	getHistoricalChains: async () => [],
};

const snapshot: MarketSnapshot = {
	date: "2024-01-02",
	chains: {
		SPY: [
			{
				strike: 470,
				optionType: "call",
				expiration: "2024-01-19",
				bid: 3.9,
				ask: 4.1,
				last: 4,
				volume: 2_500,
				openInterest: 8_000,
				underlyingPrice: 472,
				impliedVolatility: 0.75,
			},
		],
	},
	underlyingPrices: { SPY: 472 },
	missingSymbols: [],
};

describe("Strategy Registry Smoke Tests", () => {
	for (const id of getRegisteredStrategyIds()) {
		it(`${id} builds and generates signals without throwing`, async () => {
			const definition = getStrategyDefinition(id);
			const strategy = definition.createStrategy(
				{ id },
				{ marketData: emptyProvider }
			);
			const signals = await strategy.generateSignals(snapshot, "2024-01-02");
			expect(Array.isArray(signals)).toBe(true);
			for (const signal of signals) {
				expect(signal.price).toBeGreaterThan(0);
				expect(signal.symbol).toBe("SPY");
			}
		});
	}
});
