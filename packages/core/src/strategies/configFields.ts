import { ConfigurationError } from "../errors";
import { isOptionType } from "../quotes";
import type { OptionType } from "../types";

export interface NumberFieldRules {
	min?: number;
	max?: number;
	integer?: boolean;
}

/**
 * Reads an optional numeric strategy field, falling back to `fallback` when
 * the key is absent. Present values must be finite and inside the bounds.
 */
export const readNumberField = (
	raw: Record<string, unknown>,
	key: string,
	fallback: number,
	rules: NumberFieldRules = {}
): number => {
	const value = raw[key];
	if (value === undefined || value === null) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigurationError(`Strategy field ${key} must be a finite number`, {
			key,
			value,
		});
	}
	if (rules.integer && !Number.isInteger(value)) {
		throw new ConfigurationError(`Strategy field ${key} must be an integer`, {
			key,
			value,
		});
	}
	if (rules.min !== undefined && value < rules.min) {
		throw new ConfigurationError(`Strategy field ${key} must be >= ${rules.min}`, {
			key,
			value,
		});
	}
	if (rules.max !== undefined && value > rules.max) {
		throw new ConfigurationError(`Strategy field ${key} must be <= ${rules.max}`, {
			key,
			value,
		});
	}
	return value;
};

export const readOptionTypesField = (
	raw: Record<string, unknown>,
	key: string,
	fallback: OptionType[]
): OptionType[] => {
	const value = raw[key];
	if (value === undefined || value === null) {
		return [...fallback];
	}
	if (!Array.isArray(value) || value.length === 0) {
		throw new ConfigurationError(
			`Strategy field ${key} must be a non-empty list of "call"/"put"`,
			{ key, value }
		);
	}
	const types: OptionType[] = [];
	for (const entry of value) {
		if (!isOptionType(entry)) {
			throw new ConfigurationError(`Unknown option type in ${key}: ${String(entry)}`, {
				key,
				value,
			});
		}
		if (!types.includes(entry)) {
			types.push(entry);
		}
	}
	return types;
};

export const readNameField = (
	raw: Record<string, unknown>,
	fallback: string
): string => {
	const value = raw.name;
	return typeof value === "string" && value.trim().length > 0 ? value : fallback;
};
