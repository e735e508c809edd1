import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	BACKTEST_DEFAULTS,
	getConfigMetadata,
	loadBacktestProfile,
	loadStrategyConfig,
	parseSymbolList,
	withConfigMetadata,
} from "./config";
import { ConfigurationError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");

describe("loadStrategyConfig", () => {
	it("throws when the config file omits an id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "missing-id")).toThrowError(
			/must include an "id"/i
		);
	});

	it("throws when the config file references an unknown strategy id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "unknown-id")).toThrowError(
			/Unknown strategy id/i
		);
	});

	it("throws when the profile does not exist", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "absent")).toThrowError(
			ConfigurationError
		);
	});

	it("loads a registered strategy and records where it came from", () => {
		const config = loadStrategyConfig(FIXTURE_DIR, "momentum-fixture");
		expect(config.id).toBe("liquidity_momentum");
		expect(config.minVolume).toBe(250);
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: path.join(FIXTURE_DIR, "strategies", "momentum-fixture.json"),
			profile: "momentum-fixture",
		});
		expect(Object.keys(config)).toEqual(["id", "name", "minVolume"]);
	});
});

describe("loadBacktestProfile", () => {
	it("fills missing numbers from defaults and normalizes symbols", () => {
		const profile = loadBacktestProfile(FIXTURE_DIR);
		expect(profile.symbols).toEqual(["SPY", "QQQ"]);
		expect(profile.startDate).toBe("2024-01-02");
		expect(profile.endDate).toBe("2024-03-28");
		expect(profile.initialCapital).toBe(50_000);
		expect(profile.maxPositions).toBe(3);
		expect(profile.positionSizePct).toBe(BACKTEST_DEFAULTS.positionSizePct);
		expect(profile.commissionPerContract).toBe(0.65);
		expect(profile.slippagePct).toBe(0.01);
		expect(profile.strategyProfile).toBe("momentum-fixture");
		expect(getConfigMetadata(profile)?.profile).toBe("default");
	});

	it("accepts comma-separated symbols and a strategy id", () => {
		const profile = loadBacktestProfile(FIXTURE_DIR, "by-strategy");
		expect(profile.symbols).toEqual(["IWM", "DIA"]);
		expect(profile.strategyId).toBe("liquidity_momentum");
	});

	it("rejects non-numeric values", () => {
		expect(() => loadBacktestProfile(FIXTURE_DIR, "bad-number")).toThrowError(
			"Required numeric field missing in backtest.initialCapital"
		);
	});
});

describe("config helpers", () => {
	it("keeps metadata out of enumeration and JSON", () => {
		const config = withConfigMetadata({ value: 1 }, { source: "embedded" });
		expect(JSON.stringify(config)).toBe('{"value":1}');
		expect(getConfigMetadata(config)).toEqual({
			source: "embedded",
			path: undefined,
			profile: undefined,
		});
		expect(getConfigMetadata({ value: 1 })).toBeNull();
	});

	it("parses symbol lists", () => {
		expect(parseSymbolList(" aapl,msft ,,AAPL")).toEqual(["AAPL", "MSFT"]);
		expect(() => parseSymbolList(42)).toThrowError(ConfigurationError);
	});
});
