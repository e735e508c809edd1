import {
	ConfigurationError,
	EXIT_REASON_END_OF_BACKTEST,
	InMemoryErrorReporter,
	OrchestrationFailure,
	buildTradingCalendar,
	createLogger,
	createStrategy,
	describeError,
	isBacktestError,
	type ClosedTrade,
	type EquityPoint,
	type ErrorReporter,
	type MarketSnapshot,
	type ModuleLogger,
	type OptionsStrategy,
	type TradingDate,
} from "@optionlab/core";
import { loadDailySnapshot } from "@optionlab/data";
import { PositionLedger } from "@optionlab/execution-engine";
import { calculatePerformance } from "@optionlab/metrics";
import {
	DEFAULT_FETCH_TIMEOUT_MS,
	DEFAULT_PROGRESS_EVERY_DAYS,
	type BacktestConfig,
	type BacktestDependencies,
	type BacktestRun,
	type PartialBacktestState,
} from "./backtestTypes";
import { validateBacktestConfig } from "./validation";

const backtestLogger = createLogger("backtest");

const resolveStrategy = (
	config: BacktestConfig,
	deps: BacktestDependencies
): OptionsStrategy => {
	if (deps.strategy) {
		return deps.strategy;
	}
	const strategyConfig = deps.strategyConfig ?? { id: config.strategyId };
	if (strategyConfig.id !== config.strategyId) {
		throw new ConfigurationError(
			`Strategy config ${strategyConfig.id} does not match strategyId ${config.strategyId}`
		);
	}
	try {
		return createStrategy(strategyConfig, { marketData: deps.marketData });
	} catch (error) {
		if (isBacktestError(error)) {
			throw error;
		}
		throw new ConfigurationError(describeError(error), {
			strategyId: config.strategyId,
		});
	}
};

const freezeRun = (run: BacktestRun): BacktestRun => {
	Object.freeze(run.equityCurve);
	Object.freeze(run.closedTrades);
	Object.freeze(run.symbols);
	return Object.freeze(run);
};

/**
 * Replays the trading days between `startDate` and `endDate`.
 *
 * Each day loads every symbol's chain, settles exits before any new entry
 * can use the freed capital, opens positions while capacity remains and
 * records one equity point. Positions still open after the last day are
 * closed on that day, then analytics run and the sink receives the run.
 *
 * @throws ConfigurationError before the run starts
 * @throws OrchestrationFailure carrying the partial state on any fatal error
 */
export const runBacktest = async (
	config: BacktestConfig,
	deps: BacktestDependencies
): Promise<BacktestRun> => {
	validateBacktestConfig(config);
	const calendar = buildTradingCalendar(config.startDate, config.endDate);
	if (!calendar.length) {
		throw new ConfigurationError(
			`No trading days between ${config.startDate} and ${config.endDate}`
		);
	}

	const logger = deps.logger ?? backtestLogger;
	const clock = deps.clock ?? (() => new Date());
	const reporter: ErrorReporter = deps.reporter ?? new InMemoryErrorReporter();
	const strategy = resolveStrategy(config, deps);
	const ledger = new PositionLedger({ settings: config.settings, reporter });
	const timeoutMs = config.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
	const progressEvery = config.progressEveryDays ?? DEFAULT_PROGRESS_EVERY_DAYS;
	const startedAt = clock().toISOString();

	const equityCurve: EquityPoint[] = [];
	let currentDate: TradingDate | null = null;

	const partialState = (): PartialBacktestState => ({
		date: currentDate,
		capital: ledger.currentCapital,
		equityCurve: [...equityCurve],
		closedTrades: ledger.closedTrades(),
		openPositions: ledger.openPositions(),
	});

	logger.info("backtest_started", {
		strategyId: config.strategyId,
		symbols: config.symbols,
		startDate: config.startDate,
		endDate: config.endDate,
		tradingDays: calendar.length,
		initialCapital: config.settings.initialCapital,
	});

	try {
		let lastSnapshot: MarketSnapshot | null = null;
		for (const [index, date] of calendar.entries()) {
			currentDate = date;
			const snapshot = await loadDailySnapshot(deps.marketData, config.symbols, date, {
				timeoutMs,
				reporter,
			});
			lastSnapshot = snapshot;

			await ledger.evaluateExits(snapshot, date, strategy);
			if (ledger.openCount < config.settings.maxPositions) {
				await enterPositions(ledger, strategy, snapshot, date, config, logger);
			}
			ledger.markToMarket(snapshot, date);

			const point = ledger.snapshotEquity(date);
			equityCurve.push(point);
			logger.debug("equity_point", { ...point });

			if ((index + 1) % progressEvery === 0) {
				logger.info("backtest_progress", {
					date,
					day: index + 1,
					tradingDays: calendar.length,
					openPositions: ledger.openCount,
					totalEquity: point.totalEquity,
				});
			}
		}

		const finalDate = calendar[calendar.length - 1];
		if (lastSnapshot) {
			for (const position of ledger.openPositions()) {
				ledger.closePosition(
					position.id,
					lastSnapshot,
					finalDate,
					EXIT_REASON_END_OF_BACKTEST
				);
			}
		}

		const closedTrades = ledger.closedTrades();
		const report = calculatePerformance({
			initialCapital: ledger.initialCapital,
			finalCapital: ledger.currentCapital,
			equityCurve,
			closedTrades,
		});
		const run: BacktestRun = {
			runId: null,
			strategyId: config.strategyId,
			symbols: [...config.symbols],
			startDate: config.startDate,
			endDate: config.endDate,
			tradingDays: calendar.length,
			initialCapital: ledger.initialCapital,
			finalCapital: ledger.currentCapital,
			settings: { ...config.settings },
			equityCurve,
			closedTrades,
			metrics: report.metrics,
			drawdowns: report.drawdowns,
			equityStats: report.equity,
			diagnostics: report.diagnostics,
			errors: reporter.summary(),
			startedAt,
			completedAt: clock().toISOString(),
		};

		const runId = deps.sink ? await persistRun(deps.sink, run, closedTrades) : null;

		logger.info("backtest_summary", {
			runId,
			strategyId: config.strategyId,
			tradingDays: calendar.length,
			finalCapital: run.finalCapital,
			totalReturnPct: report.metrics.totalReturnPct,
			sharpeRatio: report.metrics.sharpeRatio,
			maxDrawdownPct: report.metrics.maxDrawdownPct,
			totalTrades: report.metrics.totalTrades,
			winRate: report.metrics.winRate,
			errors: run.errors.totalErrors,
		});
		return freezeRun({ ...run, runId });
	} catch (error) {
		const message = `Backtest failed${currentDate ? ` on ${currentDate}` : ""}: ${describeError(error)}`;
		logger.error("backtest_failed", {
			date: currentDate,
			error: describeError(error),
		});
		throw new OrchestrationFailure<PartialBacktestState>(message, partialState(), {
			date: currentDate ?? undefined,
			cause: error,
		});
	}
};

const enterPositions = async (
	ledger: PositionLedger,
	strategy: OptionsStrategy,
	snapshot: MarketSnapshot,
	date: TradingDate,
	config: BacktestConfig,
	logger: ModuleLogger
): Promise<void> => {
	const signals = await strategy.generateSignals(snapshot, date);
	const considered =
		config.maxSignalsPerDay !== undefined
			? signals.slice(0, config.maxSignalsPerDay)
			: signals;
	let opened = 0;
	for (const signal of considered) {
		if (ledger.openCount >= config.settings.maxPositions) {
			break;
		}
		const result = ledger.openPosition(signal, date);
		if (result.status === "opened") {
			opened += 1;
		}
	}
	logger.debug("signals_processed", {
		date,
		signals: signals.length,
		considered: considered.length,
		opened,
	});
};

const persistRun = async (
	sink: NonNullable<BacktestDependencies["sink"]>,
	run: BacktestRun,
	trades: ClosedTrade[]
): Promise<string> => {
	const runId = await sink.persist(run);
	for (const trade of trades) {
		await sink.persistTrade(runId, trade);
	}
	return runId;
};
