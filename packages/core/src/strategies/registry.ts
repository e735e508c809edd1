import liquidityMomentumModule from "./liquidity-momentum";
import unusualVolumeModule from "./unusual-volume";
import { type StrategyId, isStrategyId } from "./ids";
import type {
	OptionsStrategy,
	StrategyConfig,
	StrategyDependencies,
	StrategyManifest,
} from "./types";

export interface StrategyRegistryEntry {
	id: StrategyId;
	manifest: StrategyManifest;
	/** Profile name under config/strategies used when none is given. */
	defaultProfile: string;
	createStrategy: (
		config: StrategyConfig,
		deps: StrategyDependencies
	) => OptionsStrategy;
}

const REGISTERED_ENTRIES: readonly StrategyRegistryEntry[] = [
	liquidityMomentumModule,
	unusualVolumeModule,
];

let registryMapCache: Map<StrategyId, StrategyRegistryEntry> | null = null;

const getRegistryMap = (): Map<StrategyId, StrategyRegistryEntry> => {
	if (!registryMapCache) {
		validateUniqueStrategyIds(REGISTERED_ENTRIES);
		registryMapCache = new Map(
			REGISTERED_ENTRIES.map((entry) => [entry.id, entry])
		);
	}
	return registryMapCache;
};

export const getStrategyDefinition = (id: string): StrategyRegistryEntry => {
	const definition = isStrategyId(id) ? getRegistryMap().get(id) : undefined;
	if (!definition) {
		throw new Error(`Unknown strategy id: ${id}`);
	}
	return definition;
};

export const listStrategyDefinitions = (): StrategyRegistryEntry[] => {
	return [...getRegistryMap().values()];
};

export const getRegisteredStrategyIds = (): StrategyId[] => {
	return listStrategyDefinitions().map((entry) => entry.id);
};

export const isRegisteredStrategyId = (value: unknown): value is StrategyId => {
	return (
		typeof value === "string" &&
		getRegisteredStrategyIds().some((id) => id === value)
	);
};

export const createStrategy = (
	config: StrategyConfig,
	deps: StrategyDependencies = {}
): OptionsStrategy => getStrategyDefinition(config.id).createStrategy(config, deps);

export function validateUniqueStrategyIds(
	entries: readonly StrategyRegistryEntry[]
): void {
	const seen = new Set<StrategyId>();
	for (const entry of entries) {
		if (seen.has(entry.id)) {
			throw new Error(
				`Duplicate strategy id detected: ${entry.id}. Strategy ids must be unique.`
			);
		}
		seen.add(entry.id);
	}
}
