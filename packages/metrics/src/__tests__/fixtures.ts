import type { ClosedTrade, EquityPoint } from "@optionlab/core";

let sequence = 0;

export const makeTrade = (
	profitLoss: number,
	overrides: Partial<ClosedTrade> = {}
): ClosedTrade => {
	sequence += 1;
	const costBasis = 1000;
	return {
		id: `pos_${sequence}`,
		status: "CLOSED",
		symbol: "SPY",
		optionType: "call",
		strike: 100,
		expiration: "2024-02-16",
		entryDate: "2024-01-02",
		entryPrice: 2,
		contracts: 5,
		costBasis,
		exitDate: "2024-01-05",
		exitPrice: 2,
		exitReason: "profit_target",
		priceSource: "market",
		proceeds: costBasis + profitLoss,
		profitLoss,
		profitLossPct: (profitLoss / costBasis) * 100,
		...overrides,
	};
};

export const makeCurve = (points: Array<[string, number]>): EquityPoint[] =>
	points.map(([date, totalEquity]) => ({
		date,
		cash: totalEquity,
		positionsValue: 0,
		totalEquity,
	}));
