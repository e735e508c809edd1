import type {
	ClosedTrade,
	EquityPoint,
	TradingDate,
} from "@optionlab/core";

export interface PerformanceInput {
	initialCapital: number;
	finalCapital: number;
	equityCurve: EquityPoint[];
	closedTrades: ClosedTrade[];
}

export interface PerformanceMetrics {
	totalReturnPct: number;
	annualizedReturnPct: number;
	sharpeRatio: number;
	sortinoRatio: number;
	/** Always <= 0. */
	maxDrawdownPct: number;
	maxDrawdownDurationDays: number;
	totalTrades: number;
	winningTrades: number;
	losingTrades: number;
	/** Percent of trades with positive P/L. */
	winRate: number;
	avgProfitPct: number;
	avgProfitAmount: number;
	grossProfit: number;
	/** Absolute value of the summed non-positive P/L. */
	grossLoss: number;
	profitFactor: number;
	profitFactorCapped: boolean;
	maxConsecutiveWins: number;
	maxConsecutiveLosses: number;
	bestTradePct: number;
	worstTradePct: number;
	avgTradeDurationDays: number;
}

export interface DrawdownSpan {
	peakDate: TradingDate;
	troughDate: TradingDate;
	recoveryDate: TradingDate | null;
	depthPct: number;
	durationDays: number;
}

export interface EquityCurveStats {
	points: number;
	startDate: TradingDate | null;
	endDate: TradingDate | null;
	peakEquity: number;
	lowestEquity: number;
	meanDailyReturnPct: number;
	dailyVolatilityPct: number;
}

export interface StreakDiagnostics {
	longestWinStreak: number;
	longestLossStreak: number;
	currentWinStreak: number;
	currentLossStreak: number;
}

export interface GroupInsight {
	count: number;
	netProfit: number;
	winRate: number;
	avgProfitPct: number;
	avgDurationDays: number;
}

export interface DurationClusterInsight {
	rangeLabel: string;
	count: number;
	avgReturnPct: number;
}

export interface DiagnosticsReport {
	streaks: StreakDiagnostics;
	byExitReason: Record<string, GroupInsight>;
	bySymbol: Record<string, GroupInsight>;
	/** Keyed by option type. */
	byOptionType: Record<string, GroupInsight>;
	durationClusters: DurationClusterInsight[];
	staleExits: number;
}

export interface PerformanceReport {
	metrics: PerformanceMetrics;
	drawdowns: DrawdownSpan[];
	equity: EquityCurveStats;
	diagnostics: DiagnosticsReport;
}
