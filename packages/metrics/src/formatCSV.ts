import type { ClosedTrade, EquityPoint } from "@optionlab/core";
import { groupTrades } from "./diagnostics";
import type { PerformanceReport } from "./metricsSchema";

export type CsvMode = "summary" | "trades" | "equity" | "grouped";
export type CsvGroupKey = "symbol" | "exitReason" | "optionType";

export const CSV_MODES: readonly CsvMode[] = [
	"summary",
	"trades",
	"equity",
	"grouped",
];

/** The slice of a finished run the CSV export reads. */
export interface CsvSource {
	runId?: string;
	strategyId: string;
	startDate: string;
	endDate: string;
	report: PerformanceReport;
	closedTrades: ClosedTrade[];
	equityCurve: EquityPoint[];
}

export interface FormatCsvOptions {
	mode?: CsvMode;
	groupBy?: CsvGroupKey;
	includeHeader?: boolean;
}

export const isCsvMode = (value: string): value is CsvMode =>
	CSV_MODES.some((mode) => mode === value);

export const formatMetricsCsv = (
	source: CsvSource,
	options: FormatCsvOptions = {}
): string => {
	const includeHeader = options.includeHeader ?? true;
	switch (options.mode ?? "trades") {
		case "summary":
			return toCsv([buildSummaryRow(source)], includeHeader);
		case "equity":
			return toCsv(buildEquityRows(source.equityCurve), includeHeader);
		case "grouped":
			return toCsv(
				buildGroupedRows(source, options.groupBy ?? "symbol"),
				includeHeader
			);
		case "trades":
		default:
			return toCsv(buildTradeRows(source.closedTrades), includeHeader);
	}
};

const buildSummaryRow = (source: CsvSource): Record<string, unknown> => {
	const { metrics } = source.report;
	return {
		runId: source.runId,
		strategyId: source.strategyId,
		start: source.startDate,
		end: source.endDate,
		...metrics,
	};
};

const buildTradeRows = (trades: ClosedTrade[]): Record<string, unknown>[] =>
	trades.map((trade) => ({
		id: trade.id,
		symbol: trade.symbol,
		optionType: trade.optionType,
		strike: trade.strike,
		expiration: trade.expiration,
		entryDate: trade.entryDate,
		exitDate: trade.exitDate,
		contracts: trade.contracts,
		entryPrice: trade.entryPrice,
		exitPrice: trade.exitPrice,
		costBasis: trade.costBasis,
		proceeds: trade.proceeds,
		profitLoss: trade.profitLoss,
		profitLossPct: trade.profitLossPct,
		exitReason: trade.exitReason,
		priceSource: trade.priceSource,
	}));

const buildEquityRows = (curve: EquityPoint[]): Record<string, unknown>[] =>
	curve.map((point) => ({
		date: point.date,
		cash: point.cash,
		positionsValue: point.positionsValue,
		totalEquity: point.totalEquity,
	}));

const buildGroupedRows = (
	source: CsvSource,
	groupBy: CsvGroupKey
): Record<string, unknown>[] => {
	const groups = groupTrades(source.closedTrades, (trade) => trade[groupBy]);
	return Object.entries(groups).map(([key, group]) => ({
		strategyId: source.strategyId,
		group: key,
		groupMode: groupBy,
		tradeCount: group.count,
		winRate: group.winRate,
		netProfit: group.netProfit,
		avgProfitPct: group.avgProfitPct,
		avgDurationDays: group.avgDurationDays,
	}));
};

const toCsv = (
	rows: Record<string, unknown>[],
	includeHeader: boolean
): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
