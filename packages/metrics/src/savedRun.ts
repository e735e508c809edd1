import type { ClosedTrade, EquityPoint } from "@optionlab/core";

/** The fields of a persisted run the metrics runner needs. */
export interface SavedRun {
	runId: string | null;
	strategyId: string;
	startDate: string;
	endDate: string;
	initialCapital: number;
	finalCapital: number;
	equityCurve: EquityPoint[];
	closedTrades: ClosedTrade[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);

const isString = (value: unknown): value is string => typeof value === "string";

export const isEquityPoint = (value: unknown): value is EquityPoint =>
	isRecord(value) &&
	isString(value.date) &&
	isFiniteNumber(value.cash) &&
	isFiniteNumber(value.positionsValue) &&
	isFiniteNumber(value.totalEquity);

export const isClosedTrade = (value: unknown): value is ClosedTrade =>
	isRecord(value) &&
	value.status === "CLOSED" &&
	isString(value.id) &&
	isString(value.symbol) &&
	(value.optionType === "call" || value.optionType === "put") &&
	isFiniteNumber(value.strike) &&
	isString(value.expiration) &&
	isString(value.entryDate) &&
	isString(value.exitDate) &&
	isFiniteNumber(value.entryPrice) &&
	isFiniteNumber(value.exitPrice) &&
	isFiniteNumber(value.contracts) &&
	isFiniteNumber(value.costBasis) &&
	isFiniteNumber(value.proceeds) &&
	isFiniteNumber(value.profitLoss) &&
	isFiniteNumber(value.profitLossPct) &&
	isString(value.exitReason) &&
	(value.priceSource === "market" || value.priceSource === "stale");

const readArray = <T>(
	raw: Record<string, unknown>,
	key: string,
	guard: (value: unknown) => value is T
): T[] => {
	const value = raw[key];
	if (!Array.isArray(value)) {
		throw new Error(`Saved run is missing ${key}`);
	}
	const items: T[] = [];
	value.forEach((entry: unknown, index) => {
		if (!guard(entry)) {
			throw new Error(`Saved run ${key}[${index}] is malformed`);
		}
		items.push(entry);
	});
	return items;
};

const readNumber = (raw: Record<string, unknown>, key: string): number => {
	const value = raw[key];
	if (!isFiniteNumber(value)) {
		throw new Error(`Saved run field ${key} must be a finite number`);
	}
	return value;
};

const readString = (raw: Record<string, unknown>, key: string): string => {
	const value = raw[key];
	if (!isString(value)) {
		throw new Error(`Saved run field ${key} must be a string`);
	}
	return value;
};

export const parseSavedRun = (payload: unknown): SavedRun => {
	if (!isRecord(payload)) {
		throw new Error("Saved run must be a JSON object");
	}
	return {
		runId: isString(payload.runId) ? payload.runId : null,
		strategyId: readString(payload, "strategyId"),
		startDate: readString(payload, "startDate"),
		endDate: readString(payload, "endDate"),
		initialCapital: readNumber(payload, "initialCapital"),
		finalCapital: readNumber(payload, "finalCapital"),
		equityCurve: readArray(payload, "equityCurve", isEquityPoint),
		closedTrades: readArray(payload, "closedTrades", isClosedTrade),
	};
};
