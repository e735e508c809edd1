import { describe, expect, it } from "vitest";
import type { MarketDataProvider } from "../../marketData/MarketDataProvider";
import type { DailyChain, MarketSnapshot, OptionQuote, Position } from "../../types";
import { parseUnusualVolumeConfig } from "./config";
import { buildVolumeBaselines } from "./entryLogic";
import { UnusualVolumeStrategy } from "./index";

const quote = (overrides: Partial<OptionQuote> = {}): OptionQuote => ({
	strike: 100,
	optionType: "call",
	expiration: "2024-02-16",
	bid: 14.8,
	ask: 15.2,
	last: 15,
	volume: 900,
	openInterest: 4_000,
	underlyingPrice: 480,
	...overrides,
});

const historyDays = ["2024-01-03", "2024-01-04", "2024-01-05", "2024-01-08", "2024-01-09"];

const spyHistory: DailyChain[] = historyDays.map((date) => ({
	date,
	quotes: [
		quote({ volume: 200 }),
		quote({ optionType: "put", strike: 95, volume: 1_000 }),
	],
}));

class StubProvider implements MarketDataProvider {
	readonly historyCalls: Array<{ symbol: string; from: string; to: string }> = [];

	async getOptionChain(): Promise<OptionQuote[]> {
		return [];
	}

	async getHistoricalChains(
		symbol: string,
		from: string,
		to: string
	): Promise<DailyChain[]> {
		this.historyCalls.push({ symbol, from, to });
		if (symbol === "QQQ") {
			throw new Error("history offline");
		}
		return spyHistory;
	}
}

const snapshot: MarketSnapshot = {
	date: "2024-01-10",
	chains: {
		SPY: [
			quote(),
			quote({ optionType: "put", strike: 95, volume: 1_200, last: 10 }),
			quote({ strike: 110, volume: 5_000, last: 5 }),
		],
		QQQ: [quote({ volume: 10_000 })],
	},
	underlyingPrices: { SPY: 480, QQQ: 400 },
	missingSymbols: [],
};

const position: Position = {
	id: "pos_1",
	status: "OPEN",
	symbol: "SPY",
	optionType: "call",
	strike: 100,
	expiration: "2024-02-16",
	entryDate: "2024-01-10",
	entryPrice: 10,
	contracts: 1,
	costBasis: 1_000.65,
	currentPrice: 10,
	lastMarkDate: "2024-01-10",
};

describe("UnusualVolumeStrategy", () => {
	it("flags large contracts trading well above their trailing average", async () => {
		const provider = new StubProvider();
		const strategy = new UnusualVolumeStrategy(
			parseUnusualVolumeConfig({ id: "unusual_volume" }),
			provider
		);
		const signals = await strategy.generateSignals(snapshot, "2024-01-10");
		expect(signals).toEqual([
			{
				symbol: "SPY",
				optionType: "call",
				strike: 100,
				expiration: "2024-02-16",
				price: 15,
				reason: "unusual_volume 2024-01-10 notional=1350000 ratio=4.50",
			},
		]);
		expect(provider.historyCalls).toContainEqual({
			symbol: "SPY",
			from: "2023-12-21",
			to: "2024-01-09",
		});
	});

	it("ignores contracts without enough history", async () => {
		const strategy = new UnusualVolumeStrategy(
			parseUnusualVolumeConfig({ id: "unusual_volume", minHistoryDays: 6 }),
			new StubProvider()
		);
		expect(await strategy.generateSignals(snapshot, "2024-01-10")).toEqual([]);
	});

	it("exits at the profit target and the stop loss", () => {
		const strategy = new UnusualVolumeStrategy(
			parseUnusualVolumeConfig({ id: "unusual_volume" }),
			new StubProvider()
		);
		expect(strategy.checkExitCriteria(position, quote({ last: 15.5 }))).toBe(
			"profit_target"
		);
		expect(strategy.checkExitCriteria(position, quote({ last: 6 }))).toBe(
			"stop_loss"
		);
		expect(
			strategy.checkExitCriteria(position, quote({ last: 0, bid: 0, ask: 0 }))
		).toBeNull();
	});
});

describe("buildVolumeBaselines", () => {
	it("averages daily volume per contract", () => {
		const baselines = buildVolumeBaselines("SPY", [
			{ date: "2024-01-03", quotes: [quote({ volume: 100 })] },
			{ date: "2024-01-04", quotes: [quote({ volume: 300 })] },
		]);
		expect(baselines.get("SPY|call|100|2024-02-16")).toEqual({
			averageVolume: 200,
			days: 2,
		});
	});
});
