import { ConfigurationError, type OptionlabConfig } from "@optionlab/core";
import { describe, expect, it } from "vitest";
import {
	parseCliArgs,
	readNumberArg,
	readStrategyArg,
	resolveBacktestRequest,
} from "./cliArgs";

const loaded: OptionlabConfig = {
	env: {
		dataDir: "/data/snapshots",
		outputDir: "/output/backtests",
		fetchTimeoutMs: 10_000,
	},
	backtest: {
		symbols: ["SPY", "QQQ"],
		startDate: "2024-01-02",
		initialCapital: 100_000,
		maxPositions: 5,
		positionSizePct: 0.1,
		commissionPerContract: 0.65,
		slippagePct: 0.01,
	},
	strategy: { id: "liquidity_momentum" },
};

describe("backtest CLI arg parsing", () => {
	it("captures --strategy flag with space", () => {
		const args = parseCliArgs(["--strategy", "unusual_volume", "--start", "2024-01-02"]);
		expect(args.strategy).toBe("unusual_volume");
		expect(args.start).toBe("2024-01-02");
	});

	it("captures flags with equals syntax and bare booleans", () => {
		const args = parseCliArgs(["--strategy=liquidity_momentum", "--csv", "--json"]);
		expect(args).toEqual({ strategy: "liquidity_momentum", csv: true, json: true });
	});

	it("takes start and end from positionals", () => {
		const args = parseCliArgs(["2024-01-02", "2024-03-28", "--symbols", "SPY"]);
		expect(args.start).toBe("2024-01-02");
		expect(args.end).toBe("2024-03-28");
	});

	it("accepts --strategyId as an alias", () => {
		expect(readStrategyArg(parseCliArgs(["--strategyId", "unusual_volume"]))).toBe(
			"unusual_volume"
		);
		expect(() => readStrategyArg({ strategy: "moon_shot" })).toThrow(
			"Unknown strategy id: moon_shot"
		);
	});

	it("rejects non-numeric values", () => {
		expect(readNumberArg({ maxPositions: "3" }, "maxPositions")).toBe(3);
		expect(() => readNumberArg({ maxPositions: "many" }, "maxPositions")).toThrow(
			"Invalid numeric value for --maxPositions: many"
		);
		expect(() => readNumberArg({ maxPositions: true }, "maxPositions")).toThrow(
			"Flag --maxPositions requires a value"
		);
	});
});

describe("resolveBacktestRequest", () => {
	it("lets flags override profile values", () => {
		const request = resolveBacktestRequest(
			parseCliArgs([
				"--end",
				"2024-01-31",
				"--symbols",
				"iwm, dia",
				"--initialCapital",
				"25000",
				"--slippage",
				"0",
				"--outputDir",
				"/tmp/runs",
				"--csv",
			]),
			loaded
		);
		expect(request.config).toEqual({
			symbols: ["IWM", "DIA"],
			startDate: "2024-01-02",
			endDate: "2024-01-31",
			strategyId: "liquidity_momentum",
			settings: {
				initialCapital: 25_000,
				maxPositions: 5,
				positionSizePct: 0.1,
				commissionPerContract: 0.65,
				slippagePct: 0,
			},
			fetchTimeoutMs: 10_000,
			maxSignalsPerDay: undefined,
		});
		expect(request.dataDir).toBe("/data/snapshots");
		expect(request.outputDir).toBe("/tmp/runs");
		expect(request.writeCsv).toBe(true);
		expect(request.printJson).toBe(false);
	});

	it("requires an end date when the profile has none", () => {
		expect(() => resolveBacktestRequest({}, loaded)).toThrow(ConfigurationError);
		expect(() => resolveBacktestRequest({}, loaded)).toThrow(
			"Missing required --end <YYYY-MM-DD>"
		);
	});

	it("refuses a strategy that differs from the loaded profile", () => {
		expect(() =>
			resolveBacktestRequest({ strategy: "unusual_volume", end: "2024-01-31" }, loaded)
		).toThrow("Strategy profile liquidity_momentum does not match --strategy unusual_volume");
	});
});
