import {
	type DailyChain,
	InMemoryErrorReporter,
	type MarketDataProvider,
	type OptionQuote,
} from "@optionlab/core";
import { describe, expect, it } from "vitest";
import { InMemoryMarketDataProvider } from "./memoryProvider";
import { FetchTimeoutError, loadDailySnapshot, withTimeout } from "./snapshot";

const quote = (overrides: Partial<OptionQuote> = {}): OptionQuote => ({
	strike: 470,
	optionType: "call",
	expiration: "2024-01-19",
	bid: 3.9,
	ask: 4.1,
	last: 4,
	volume: 1_000,
	openInterest: 5_000,
	underlyingPrice: 472.5,
	...overrides,
});

const silentLogger = {};

describe("loadDailySnapshot", () => {
	it("collects chains and underlying prices for every symbol with data", async () => {
		const provider = new InMemoryMarketDataProvider({
			SPY: { "2024-01-02": [quote()] },
			QQQ: { "2024-01-02": [quote({ strike: 400, underlyingPrice: 401 })] },
		});
		const snapshot = await loadDailySnapshot(provider, ["SPY", "QQQ"], "2024-01-02", {
			timeoutMs: 1_000,
			logger: silentLogger,
		});
		expect(snapshot.date).toBe("2024-01-02");
		expect(Object.keys(snapshot.chains)).toEqual(["SPY", "QQQ"]);
		expect(snapshot.underlyingPrices).toEqual({ SPY: 472.5, QQQ: 401 });
		expect(snapshot.missingSymbols).toEqual([]);
	});

	it("skips and reports symbols that fail or return nothing", async () => {
		const provider = new InMemoryMarketDataProvider({
			SPY: { "2024-01-02": [quote()] },
		}).setFailure("QQQ", "2024-01-02", new Error("vendor 503"));
		const reporter = new InMemoryErrorReporter();
		const snapshot = await loadDailySnapshot(
			provider,
			["SPY", "QQQ", "IWM"],
			"2024-01-02",
			{ timeoutMs: 1_000, reporter, logger: silentLogger }
		);
		expect(Object.keys(snapshot.chains)).toEqual(["SPY"]);
		expect(snapshot.missingSymbols).toEqual(["QQQ", "IWM"]);
		expect(reporter.records().map((record) => record.message)).toEqual([
			"No market data for QQQ on 2024-01-02: vendor 503",
			"No market data for IWM on 2024-01-02: empty option chain",
		]);
	});

	it("treats a slow symbol as unavailable without holding up the others", async () => {
		const hanging: MarketDataProvider = {
			getOptionChain: (symbol) =>
				symbol === "SLOW"
					? new Promise<OptionQuote[]>(() => undefined)
					: Promise.resolve([quote()]),
			getHistoricalChains: async (): Promise<DailyChain[]> => [],
		};
		const reporter = new InMemoryErrorReporter();
		const snapshot = await loadDailySnapshot(hanging, ["SPY", "SLOW"], "2024-01-02", {
			timeoutMs: 20,
			reporter,
			logger: silentLogger,
		});
		expect(Object.keys(snapshot.chains)).toEqual(["SPY"]);
		expect(snapshot.missingSymbols).toEqual(["SLOW"]);
		expect(reporter.records()[0]?.context.detail).toBe("timed out after 20ms");
	});
});

describe("withTimeout", () => {
	it("resolves with the wrapped value", async () => {
		await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
	});

	it("rejects with a FetchTimeoutError", async () => {
		await expect(
			withTimeout(new Promise<number>(() => undefined), 10)
		).rejects.toBeInstanceOf(FetchTimeoutError);
	});
});

describe("InMemoryMarketDataProvider", () => {
	it("returns history inside the range, oldest first", async () => {
		const provider = new InMemoryMarketDataProvider()
			.setChain("SPY", "2024-01-05", [quote({ volume: 5 })])
			.setChain("SPY", "2024-01-03", [quote({ volume: 3 })])
			.setChain("SPY", "2024-01-09", [quote({ volume: 9 })]);
		const history = await provider.getHistoricalChains("SPY", "2024-01-03", "2024-01-08");
		expect(history.map((day) => [day.date, day.quotes[0]?.volume])).toEqual([
			["2024-01-03", 3],
			["2024-01-05", 5],
		]);
	});
});
