import { describe, expect, it } from "vitest";
import {
	affordableContracts,
	budgetContracts,
	entryFillPrice,
	exitFillPrice,
	positionCost,
	saleProceeds,
} from "./fills";

describe("fill modelling", () => {
	it("moves call fills against the buyer and the seller", () => {
		expect(entryFillPrice(2, "call", 0.01)).toBeCloseTo(2.02, 10);
		expect(exitFillPrice(3, "call", 0.01)).toBeCloseTo(2.97, 10);
	});

	it("applies the put direction as configured", () => {
		expect(entryFillPrice(2, "put", 0.01)).toBeCloseTo(1.98, 10);
		expect(exitFillPrice(3, "put", 0.01)).toBeCloseTo(3.03, 10);
	});

	it("adds commission to cost and subtracts it from proceeds", () => {
		expect(positionCost(2.02, 10, 0.65)).toBeCloseTo(2026.5, 8);
		expect(saleProceeds(2.97, 10, 0.65)).toBeCloseTo(2963.5, 8);
	});

	it("sizes by budget and by what is affordable", () => {
		expect(budgetContracts(100_000, 0.02, 2)).toBe(10);
		expect(budgetContracts(100, 0.1, 2)).toBe(0);
		expect(affordableContracts(1_000, 2.02, 0.65)).toBe(4);
		expect(affordableContracts(0, 2.02, 0.65)).toBe(0);
	});
});
