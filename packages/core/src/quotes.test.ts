import { describe, expect, it } from "vitest";
import {
	contractKey,
	findContractQuote,
	notionalValue,
	quoteMarkPrice,
} from "./quotes";
import type { MarketSnapshot, OptionQuote } from "./types";

const buildQuote = (overrides: Partial<OptionQuote> = {}): OptionQuote => ({
	strike: 100,
	optionType: "call",
	expiration: "2024-02-16",
	bid: 1.9,
	ask: 2.1,
	last: 2,
	volume: 500,
	openInterest: 1_000,
	underlyingPrice: 101,
	...overrides,
});

const snapshot: MarketSnapshot = {
	date: "2024-01-02",
	chains: {
		SPY: [
			buildQuote(),
			buildQuote({ optionType: "put", last: 1.5 }),
			buildQuote({ strike: 105, last: 0.8 }),
		],
	},
	underlyingPrices: { SPY: 101 },
	missingSymbols: [],
};

describe("findContractQuote", () => {
	it("matches on option type, strike and expiration", () => {
		const quote = findContractQuote(snapshot, {
			symbol: "SPY",
			optionType: "put",
			strike: 100,
			expiration: "2024-02-16",
		});
		expect(quote?.last).toBe(1.5);
	});

	it("returns null for a different expiration or an absent symbol", () => {
		expect(
			findContractQuote(snapshot, {
				symbol: "SPY",
				optionType: "call",
				strike: 100,
				expiration: "2024-03-15",
			})
		).toBeNull();
		expect(
			findContractQuote(snapshot, {
				symbol: "QQQ",
				optionType: "call",
				strike: 100,
				expiration: "2024-02-16",
			})
		).toBeNull();
	});
});

describe("quoteMarkPrice", () => {
	it("prefers the last trade", () => {
		expect(quoteMarkPrice(buildQuote({ last: 2.4 }))).toBe(2.4);
	});

	it("falls back to the mid when there is no last trade", () => {
		expect(quoteMarkPrice(buildQuote({ last: 0, bid: 1, ask: 1.5 }))).toBe(1.25);
	});

	it("returns null when nothing is quoted", () => {
		expect(quoteMarkPrice(buildQuote({ last: 0, bid: 0, ask: 1 }))).toBeNull();
	});
});

describe("contract helpers", () => {
	it("builds a stable key", () => {
		expect(
			contractKey({
				symbol: "SPY",
				optionType: "call",
				strike: 450,
				expiration: "2024-02-16",
			})
		).toBe("SPY|call|450|2024-02-16");
	});

	it("computes notional value per 100-share contract", () => {
		expect(notionalValue(2.5, 400)).toBe(100_000);
	});
});
