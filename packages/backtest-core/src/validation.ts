import {
	ConfigurationError,
	compareTradingDates,
	describeError,
	parseTradingDate,
} from "@optionlab/core";
import { validateSimulationSettings } from "@optionlab/execution-engine";
import type { BacktestConfig } from "./backtestTypes";

const isPositiveInteger = (value: number): boolean =>
	Number.isInteger(value) && value >= 1;

const checkDate = (field: string, value: string): void => {
	try {
		parseTradingDate(value);
	} catch (error) {
		throw new ConfigurationError(`${field} is not a valid date: ${describeError(error)}`, {
			field,
			value,
		});
	}
};

/** Throws ConfigurationError before any run state exists. */
export const validateBacktestConfig = (config: BacktestConfig): void => {
	if (!config.symbols.length) {
		throw new ConfigurationError("symbols must not be empty");
	}
	const blank = config.symbols.find((symbol) => !symbol.trim());
	if (blank !== undefined) {
		throw new ConfigurationError("symbols must not contain blank entries");
	}
	checkDate("startDate", config.startDate);
	checkDate("endDate", config.endDate);
	if (compareTradingDates(config.startDate, config.endDate) > 0) {
		throw new ConfigurationError("startDate must not be after endDate", {
			startDate: config.startDate,
			endDate: config.endDate,
		});
	}
	validateSimulationSettings(config.settings);
	if (config.fetchTimeoutMs !== undefined && !isPositiveInteger(config.fetchTimeoutMs)) {
		throw new ConfigurationError("fetchTimeoutMs must be a positive integer", {
			value: config.fetchTimeoutMs,
		});
	}
	if (config.maxSignalsPerDay !== undefined && !isPositiveInteger(config.maxSignalsPerDay)) {
		throw new ConfigurationError("maxSignalsPerDay must be a positive integer", {
			value: config.maxSignalsPerDay,
		});
	}
	if (
		config.progressEveryDays !== undefined &&
		!isPositiveInteger(config.progressEveryDays)
	) {
		throw new ConfigurationError("progressEveryDays must be a positive integer", {
			value: config.progressEveryDays,
		});
	}
};
