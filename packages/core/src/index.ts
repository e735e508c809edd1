/**
 * Core package centralizes the domain model, error taxonomy, logging,
 * configuration and the strategy contract. Every other package in the
 * monorepo builds on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./quotes";
export * from "./config";
export * from "./marketData/MarketDataProvider";
export * from "./utils/logger";
export * from "./strategies/ids";
export * from "./strategies/types";
export * from "./strategies/registry";
export * from "./strategies/profiles";
