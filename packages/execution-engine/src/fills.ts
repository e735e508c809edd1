import { CONTRACT_MULTIPLIER, type OptionType } from "@optionlab/core";

/**
 * Slippage-adjusted price paid when buying to open. Calls pay up; puts fill
 * below the reference price.
 */
export const entryFillPrice = (
	price: number,
	optionType: OptionType,
	slippagePct: number
): number => (optionType === "call" ? price * (1 + slippagePct) : price * (1 - slippagePct));

/** Slippage-adjusted price received when selling to close. */
export const exitFillPrice = (
	price: number,
	optionType: OptionType,
	slippagePct: number
): number => (optionType === "call" ? price * (1 - slippagePct) : price * (1 + slippagePct));

export const positionCost = (
	fillPrice: number,
	contracts: number,
	commissionPerContract: number
): number => fillPrice * CONTRACT_MULTIPLIER * contracts + commissionPerContract * contracts;

export const saleProceeds = (
	fillPrice: number,
	contracts: number,
	commissionPerContract: number
): number => fillPrice * CONTRACT_MULTIPLIER * contracts - commissionPerContract * contracts;

/** Contracts the position budget buys at the signal's reference price. */
export const budgetContracts = (
	capital: number,
	positionSizePct: number,
	price: number
): number => {
	if (capital <= 0 || price <= 0) {
		return 0;
	}
	return Math.max(Math.floor((capital * positionSizePct) / (price * CONTRACT_MULTIPLIER)), 0);
};

/** Largest whole contract count whose fill plus commission fits in `capital`. */
export const affordableContracts = (
	capital: number,
	fillPrice: number,
	commissionPerContract: number
): number => {
	const perContract = fillPrice * CONTRACT_MULTIPLIER + commissionPerContract;
	if (capital <= 0 || perContract <= 0) {
		return 0;
	}
	return Math.max(Math.floor(capital / perContract), 0);
};
