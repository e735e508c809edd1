import { daysBetween, type ClosedTrade } from "@optionlab/core";
import type {
	DiagnosticsReport,
	DurationClusterInsight,
	GroupInsight,
	StreakDiagnostics,
} from "./metricsSchema";

export const buildDiagnosticsReport = (
	trades: ClosedTrade[]
): DiagnosticsReport => {
	return {
		streaks: buildStreakDiagnostics(trades),
		byExitReason: groupTrades(trades, (trade) => trade.exitReason),
		bySymbol: groupTrades(trades, (trade) => trade.symbol),
		byOptionType: groupTrades(trades, (trade) => trade.optionType),
		durationClusters: buildDurationClusters(trades),
		staleExits: trades.filter((trade) => trade.priceSource === "stale").length,
	};
};

const holdingDays = (trade: ClosedTrade): number =>
	daysBetween(trade.entryDate, trade.exitDate);

// Break-even trades count as losses, matching the headline metrics.
const buildStreakDiagnostics = (trades: ClosedTrade[]): StreakDiagnostics => {
	let longestWinStreak = 0;
	let longestLossStreak = 0;
	let currentWinStreak = 0;
	let currentLossStreak = 0;

	for (const trade of trades) {
		if (trade.profitLoss > 0) {
			currentWinStreak += 1;
			currentLossStreak = 0;
			longestWinStreak = Math.max(longestWinStreak, currentWinStreak);
		} else {
			currentLossStreak += 1;
			currentWinStreak = 0;
			longestLossStreak = Math.max(longestLossStreak, currentLossStreak);
		}
	}

	return {
		longestWinStreak,
		longestLossStreak,
		currentWinStreak,
		currentLossStreak,
	};
};

export const groupTrades = (
	trades: ClosedTrade[],
	keyOf: (trade: ClosedTrade) => string
): Record<string, GroupInsight> => {
	const groups: Record<string, GroupInsight> = {};
	for (const trade of trades) {
		const key = keyOf(trade);
		const group = groups[key] ?? {
			count: 0,
			netProfit: 0,
			winRate: 0,
			avgProfitPct: 0,
			avgDurationDays: 0,
		};
		group.count += 1;
		group.netProfit += trade.profitLoss;
		group.winRate += trade.profitLoss > 0 ? 1 : 0;
		group.avgProfitPct += trade.profitLossPct;
		group.avgDurationDays += holdingDays(trade);
		groups[key] = group;
	}

	Object.values(groups).forEach((group) => {
		group.winRate = (group.winRate / group.count) * 100;
		group.avgProfitPct = group.avgProfitPct / group.count;
		group.avgDurationDays = group.avgDurationDays / group.count;
	});

	return groups;
};

const buildDurationClusters = (
	trades: ClosedTrade[]
): DurationClusterInsight[] => {
	const buckets: DurationClusterInsight[] = [
		{ rangeLabel: "0-1d", count: 0, avgReturnPct: 0 },
		{ rangeLabel: "2-5d", count: 0, avgReturnPct: 0 },
		{ rangeLabel: "6-20d", count: 0, avgReturnPct: 0 },
		{ rangeLabel: ">20d", count: 0, avgReturnPct: 0 },
	];

	for (const trade of trades) {
		const days = holdingDays(trade);
		const bucketIndex = days <= 1 ? 0 : days <= 5 ? 1 : days <= 20 ? 2 : 3;
		const bucket = buckets[bucketIndex];
		bucket.count += 1;
		bucket.avgReturnPct += trade.profitLossPct;
	}

	return buckets.map((bucket) => ({
		...bucket,
		avgReturnPct: bucket.count ? bucket.avgReturnPct / bucket.count : 0,
	}));
};
