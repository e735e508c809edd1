export const STRATEGY_IDS = ["liquidity_momentum", "unusual_volume"] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export const isStrategyId = (value: unknown): value is StrategyId => {
	return (
		typeof value === "string" &&
		(STRATEGY_IDS as readonly string[]).includes(value)
	);
};
