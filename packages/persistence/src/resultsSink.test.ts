import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BacktestRun } from "@optionlab/backtest-core";
import type { ClosedTrade, EquityPoint, SimulationSettings } from "@optionlab/core";
import { calculatePerformance } from "@optionlab/metrics";
import { afterEach, describe, expect, it } from "vitest";
import { InMemoryResultsSink } from "./inMemoryResultsSink";
import { JsonFileResultsSink } from "./jsonFileResultsSink";
import { buildRunId, runFingerprint } from "./runId";

const settings: SimulationSettings = {
	initialCapital: 10_000,
	maxPositions: 5,
	positionSizePct: 0.05,
	commissionPerContract: 0.65,
	slippagePct: 0.01,
};

const trade: ClosedTrade = {
	id: "pos_1",
	status: "CLOSED",
	symbol: "SPY",
	optionType: "call",
	strike: 470,
	expiration: "2024-01-19",
	entryDate: "2024-01-02",
	entryPrice: 2,
	contracts: 2,
	costBasis: 401.3,
	exitDate: "2024-01-03",
	exitPrice: 2.5,
	exitReason: "profit_target",
	priceSource: "market",
	proceeds: 498.7,
	profitLoss: 97.4,
	profitLossPct: 24.27,
};

const buildRun = (): BacktestRun => {
	const equityCurve: EquityPoint[] = [
		{ date: "2024-01-02", cash: 9598.7, positionsValue: 400, totalEquity: 9998.7 },
		{ date: "2024-01-03", cash: 10_097.4, positionsValue: 0, totalEquity: 10_097.4 },
	];
	const report = calculatePerformance({
		initialCapital: 10_000,
		finalCapital: 10_097.4,
		equityCurve,
		closedTrades: [trade],
	});
	return {
		runId: null,
		strategyId: "liquidity_momentum",
		symbols: ["SPY"],
		startDate: "2024-01-02",
		endDate: "2024-01-03",
		tradingDays: 2,
		initialCapital: 10_000,
		finalCapital: 10_097.4,
		settings,
		equityCurve,
		closedTrades: [trade],
		metrics: report.metrics,
		drawdowns: report.drawdowns,
		equityStats: report.equity,
		diagnostics: report.diagnostics,
		errors: { totalErrors: 0, byCode: {}, retained: 0 },
		startedAt: "2024-06-01T00:00:00.000Z",
		completedAt: "2024-06-01T00:00:01.000Z",
	};
};

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

describe("buildRunId", () => {
	it("combines strategy, timestamp and fingerprint", () => {
		const run = buildRun();
		const id = buildRunId(run, new Date("2024-06-01T12:30:45.123Z"));
		expect(id).toBe(`liquidity_momentum-2024-06-01T12-30-45-123Z-${runFingerprint(run)}`);
		expect(runFingerprint(run)).toMatch(/^[0-9a-f]{8}$/);
	});

	it("changes the fingerprint with the settings", () => {
		const run = buildRun();
		const other = { ...run, settings: { ...settings, slippagePct: 0.02 } };
		expect(runFingerprint(other)).not.toBe(runFingerprint(run));
	});
});

describe("InMemoryResultsSink", () => {
	it("assigns sequential ids and stores trades per run", async () => {
		const sink = new InMemoryResultsSink();
		const first = await sink.persist(buildRun());
		const second = await sink.persist(buildRun());
		await sink.persistTrade(first, trade);

		expect([first, second]).toEqual(["run-1", "run-2"]);
		expect(sink.get(first)?.run.runId).toBe("run-1");
		expect(sink.get(first)?.trades).toHaveLength(1);
		expect(sink.get(second)?.trades).toEqual([]);
		expect(sink.runIds()).toEqual(["run-1", "run-2"]);
	});

	it("rejects trades for an unknown run", async () => {
		const sink = new InMemoryResultsSink();
		await expect(sink.persistTrade("run-9", trade)).rejects.toThrow("Unknown run run-9");
	});
});

describe("JsonFileResultsSink", () => {
	it("writes the run file and appends trades as JSON lines", async () => {
		const outputDir = path.join(
			fs.mkdtempSync(path.join(os.tmpdir(), "optionlab-sink-")),
			"backtests"
		);
		tempDirs.push(path.dirname(outputDir));
		const sink = new JsonFileResultsSink({
			outputDir,
			clock: () => new Date("2024-06-01T00:00:00.000Z"),
		});
		const run = buildRun();

		const runId = await sink.persist(run);
		await sink.persistTrade(runId, trade);
		await sink.persistTrade(runId, { ...trade, id: "pos_2" });

		expect(runId.startsWith("liquidity_momentum-2024-06-01T00-00-00-000Z-")).toBe(true);
		const saved: unknown = JSON.parse(fs.readFileSync(sink.runPath(runId), "utf8"));
		expect(saved).toMatchObject({
			runId,
			strategyId: "liquidity_momentum",
			finalCapital: 10_097.4,
			metrics: { totalTrades: 1 },
		});

		const lines = fs.readFileSync(sink.tradesPath(runId), "utf8").trim().split("\n");
		expect(lines).toHaveLength(2);
		expect(JSON.parse(lines[1])).toMatchObject({ runId, id: "pos_2", symbol: "SPY" });
	});
});
