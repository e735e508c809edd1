import type {
	ClosedTrade,
	EquityPoint,
	ErrorReporter,
	ErrorSummary,
	MarketDataProvider,
	ModuleLogger,
	OptionsStrategy,
	Position,
	SimulationSettings,
	StrategyConfig,
	StrategyId,
	TradingDate,
} from "@optionlab/core";
import type {
	DiagnosticsReport,
	DrawdownSpan,
	EquityCurveStats,
	PerformanceMetrics,
} from "@optionlab/metrics";

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_PROGRESS_EVERY_DAYS = 20;

export interface BacktestConfig {
	symbols: string[];
	startDate: TradingDate;
	endDate: TradingDate;
	strategyId: StrategyId;
	settings: SimulationSettings;
	fetchTimeoutMs?: number;
	/** Cap on signals considered per day, applied before capacity. */
	maxSignalsPerDay?: number;
	progressEveryDays?: number;
}

export interface BacktestRun {
	/** Assigned by the results sink; null when no sink was given. */
	runId: string | null;
	strategyId: StrategyId;
	symbols: string[];
	startDate: TradingDate;
	endDate: TradingDate;
	tradingDays: number;
	initialCapital: number;
	finalCapital: number;
	settings: SimulationSettings;
	equityCurve: EquityPoint[];
	closedTrades: ClosedTrade[];
	metrics: PerformanceMetrics;
	drawdowns: DrawdownSpan[];
	equityStats: EquityCurveStats;
	diagnostics: DiagnosticsReport;
	errors: ErrorSummary;
	startedAt: string;
	completedAt: string;
}

/**
 * Receives a finished run once. `persist` assigns the run id, then each
 * closed trade goes through `persistTrade` in close order.
 */
export interface ResultsSink {
	persist(run: BacktestRun): Promise<string>;
	persistTrade(runId: string, trade: ClosedTrade): Promise<void>;
}

export interface BacktestDependencies {
	marketData: MarketDataProvider;
	/** Built from the registry when omitted. */
	strategy?: OptionsStrategy;
	strategyConfig?: StrategyConfig;
	sink?: ResultsSink;
	reporter?: ErrorReporter;
	logger?: ModuleLogger;
	clock?: () => Date;
}

/** What a failed run had accumulated when it stopped. */
export interface PartialBacktestState {
	date: TradingDate | null;
	capital: number;
	equityCurve: EquityPoint[];
	closedTrades: ClosedTrade[];
	openPositions: Position[];
}
