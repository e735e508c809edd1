import {
	DAYS_PER_YEAR,
	TRADING_DAYS_PER_YEAR,
	daysBetween,
	type ClosedTrade,
	type EquityPoint,
	type TradingDate,
} from "@optionlab/core";
import { buildDiagnosticsReport } from "./diagnostics";
import type {
	DrawdownSpan,
	EquityCurveStats,
	PerformanceInput,
	PerformanceMetrics,
	PerformanceReport,
} from "./metricsSchema";

/** Reported profit factor when there are winners and no losers. */
export const PROFIT_FACTOR_CAP = 999;

const ANNUALIZATION = Math.sqrt(TRADING_DAYS_PER_YEAR);

export const calculatePerformance = (
	input: PerformanceInput
): PerformanceReport => {
	const drawdowns = findDrawdownSpans(input.equityCurve);
	return {
		metrics: calculatePerformanceMetrics(input, drawdowns),
		drawdowns,
		equity: summarizeEquityCurve(input.equityCurve),
		diagnostics: buildDiagnosticsReport(input.closedTrades),
	};
};

export const calculatePerformanceMetrics = (
	input: PerformanceInput,
	drawdowns: DrawdownSpan[] = findDrawdownSpans(input.equityCurve)
): PerformanceMetrics => {
	const { initialCapital, finalCapital, equityCurve, closedTrades } = input;
	const totalReturn =
		initialCapital > 0 ? (finalCapital - initialCapital) / initialCapital : 0;
	const dailyReturns = computeDailyReturns(equityCurve);

	return {
		totalReturnPct: totalReturn * 100,
		annualizedReturnPct: annualizeReturn(
			totalReturn,
			curveDurationYears(equityCurve)
		),
		sharpeRatio: computeSharpe(dailyReturns),
		sortinoRatio: computeSortino(dailyReturns),
		maxDrawdownPct: drawdowns.reduce(
			(worst, span) => Math.min(worst, span.depthPct),
			0
		),
		maxDrawdownDurationDays: drawdowns.reduce(
			(longest, span) => Math.max(longest, span.durationDays),
			0
		),
		...computeTradeMetrics(closedTrades),
	};
};

export const computeDailyReturns = (curve: EquityPoint[]): number[] => {
	const returns: number[] = [];
	for (let i = 1; i < curve.length; i += 1) {
		const previous = curve[i - 1].totalEquity;
		if (previous > 0) {
			returns.push((curve[i].totalEquity - previous) / previous);
		}
	}
	return returns;
};

export const computeSharpe = (returns: number[]): number => {
	if (returns.length < 2) {
		return 0;
	}
	const std = standardDeviation(returns);
	if (!Number.isFinite(std) || std === 0) {
		return 0;
	}
	return (ANNUALIZATION * mean(returns)) / std;
};

export const computeSortino = (returns: number[]): number => {
	if (returns.length < 2) {
		return 0;
	}
	const downside = returns.filter((value) => value < 0);
	if (downside.length < 2) {
		return 0;
	}
	const downsideStd = standardDeviation(downside);
	if (!Number.isFinite(downsideStd) || downsideStd === 0) {
		return 0;
	}
	return (ANNUALIZATION * mean(returns)) / downsideStd;
};

/**
 * Walks the curve against its running maximum. A span opens on the first
 * point under water and closes on the first point back at or above the peak;
 * a span still open at the end closes on the last date without a recovery.
 */
export const findDrawdownSpans = (curve: EquityPoint[]): DrawdownSpan[] => {
	const spans: DrawdownSpan[] = [];
	if (!curve.length) {
		return spans;
	}

	let runningMax = curve[0].totalEquity;
	let peakDate = curve[0].date;
	let open: { start: TradingDate; trough: TradingDate; depthPct: number } | null =
		null;

	for (const point of curve) {
		if (point.totalEquity >= runningMax) {
			if (open) {
				spans.push({
					peakDate,
					troughDate: open.trough,
					recoveryDate: point.date,
					depthPct: open.depthPct,
					durationDays: daysBetween(open.start, point.date),
				});
				open = null;
			}
			runningMax = point.totalEquity;
			peakDate = point.date;
			continue;
		}

		const depthPct =
			runningMax > 0
				? ((point.totalEquity - runningMax) / runningMax) * 100
				: 0;
		if (!open) {
			open = { start: point.date, trough: point.date, depthPct };
		} else if (depthPct < open.depthPct) {
			open.trough = point.date;
			open.depthPct = depthPct;
		}
	}

	if (open) {
		const lastDate = curve[curve.length - 1].date;
		spans.push({
			peakDate,
			troughDate: open.trough,
			recoveryDate: null,
			depthPct: open.depthPct,
			durationDays: daysBetween(open.start, lastDate),
		});
	}

	return spans;
};

export const summarizeEquityCurve = (curve: EquityPoint[]): EquityCurveStats => {
	const returns = computeDailyReturns(curve);
	const values = curve.map((point) => point.totalEquity);
	return {
		points: curve.length,
		startDate: curve.length ? curve[0].date : null,
		endDate: curve.length ? curve[curve.length - 1].date : null,
		peakEquity: values.length ? Math.max(...values) : 0,
		lowestEquity: values.length ? Math.min(...values) : 0,
		meanDailyReturnPct: returns.length ? mean(returns) * 100 : 0,
		dailyVolatilityPct: returns.length > 1 ? standardDeviation(returns) * 100 : 0,
	};
};

const computeTradeMetrics = (
	trades: ClosedTrade[]
): Omit<
	PerformanceMetrics,
	| "totalReturnPct"
	| "annualizedReturnPct"
	| "sharpeRatio"
	| "sortinoRatio"
	| "maxDrawdownPct"
	| "maxDrawdownDurationDays"
> => {
	if (!trades.length) {
		return {
			totalTrades: 0,
			winningTrades: 0,
			losingTrades: 0,
			winRate: 0,
			avgProfitPct: 0,
			avgProfitAmount: 0,
			grossProfit: 0,
			grossLoss: 0,
			profitFactor: 0,
			profitFactorCapped: false,
			maxConsecutiveWins: 0,
			maxConsecutiveLosses: 0,
			bestTradePct: 0,
			worstTradePct: 0,
			avgTradeDurationDays: 0,
		};
	}

	let grossProfit = 0;
	let grossLoss = 0;
	let winningTrades = 0;
	let maxConsecutiveWins = 0;
	let maxConsecutiveLosses = 0;
	let winStreak = 0;
	let lossStreak = 0;

	for (const trade of trades) {
		if (trade.profitLoss > 0) {
			winningTrades += 1;
			grossProfit += trade.profitLoss;
			winStreak += 1;
			lossStreak = 0;
			maxConsecutiveWins = Math.max(maxConsecutiveWins, winStreak);
		} else {
			grossLoss += Math.abs(trade.profitLoss);
			lossStreak += 1;
			winStreak = 0;
			maxConsecutiveLosses = Math.max(maxConsecutiveLosses, lossStreak);
		}
	}

	const { profitFactor, profitFactorCapped } = resolveProfitFactor(
		grossProfit,
		grossLoss
	);
	const pcts = trades.map((trade) => trade.profitLossPct);

	return {
		totalTrades: trades.length,
		winningTrades,
		losingTrades: trades.length - winningTrades,
		winRate: (winningTrades / trades.length) * 100,
		avgProfitPct: mean(pcts),
		avgProfitAmount: mean(trades.map((trade) => trade.profitLoss)),
		grossProfit,
		grossLoss,
		profitFactor,
		profitFactorCapped,
		maxConsecutiveWins,
		maxConsecutiveLosses,
		bestTradePct: Math.max(...pcts),
		worstTradePct: Math.min(...pcts),
		avgTradeDurationDays: mean(
			trades.map((trade) => daysBetween(trade.entryDate, trade.exitDate))
		),
	};
};

export const resolveProfitFactor = (
	grossProfit: number,
	grossLoss: number
): { profitFactor: number; profitFactorCapped: boolean } => {
	if (grossLoss > 0) {
		return { profitFactor: grossProfit / grossLoss, profitFactorCapped: false };
	}
	if (grossProfit > 0) {
		return { profitFactor: PROFIT_FACTOR_CAP, profitFactorCapped: true };
	}
	return { profitFactor: 0, profitFactorCapped: false };
};

const curveDurationYears = (curve: EquityPoint[]): number => {
	if (curve.length < 2) {
		return 0;
	}
	return daysBetween(curve[0].date, curve[curve.length - 1].date) / DAYS_PER_YEAR;
};

const annualizeReturn = (totalReturn: number, years: number): number => {
	if (years <= 0) {
		return 0;
	}
	const growth = 1 + totalReturn;
	if (growth <= 0) {
		return -100;
	}
	return (Math.pow(growth, 1 / years) - 1) * 100;
};

const mean = (values: number[]): number =>
	values.length
		? values.reduce((sum, value) => sum + value, 0) / values.length
		: 0;

/** Sample standard deviation (n - 1). */
const standardDeviation = (values: number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const avg = mean(values);
	const variance =
		values.reduce((sum, value) => sum + (value - avg) ** 2, 0) /
		(values.length - 1);
	return Math.sqrt(variance);
};
