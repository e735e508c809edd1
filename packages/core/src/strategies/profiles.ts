import type { StrategyId } from "./ids";
import { getStrategyDefinition } from "./registry";

export const resolveStrategyProfileName = (
	strategyId: StrategyId,
	overrideProfile?: string
): string => {
	if (overrideProfile) {
		return overrideProfile;
	}
	return getStrategyDefinition(strategyId).defaultProfile;
};
