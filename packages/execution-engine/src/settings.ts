import { ConfigurationError, type SimulationSettings } from "@optionlab/core";

const isFiniteNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);

/** Throws ConfigurationError on the first invalid simulation setting. */
export const validateSimulationSettings = (settings: SimulationSettings): void => {
	const fail = (field: keyof SimulationSettings, rule: string): never => {
		throw new ConfigurationError(`${field} ${rule}`, {
			field,
			value: settings[field],
		});
	};
	if (!isFiniteNumber(settings.initialCapital) || settings.initialCapital <= 0) {
		fail("initialCapital", "must be greater than 0");
	}
	if (!Number.isInteger(settings.maxPositions) || settings.maxPositions < 1) {
		fail("maxPositions", "must be an integer of at least 1");
	}
	if (
		!isFiniteNumber(settings.positionSizePct) ||
		settings.positionSizePct <= 0 ||
		settings.positionSizePct > 1
	) {
		fail("positionSizePct", "must be in (0, 1]");
	}
	if (!isFiniteNumber(settings.commissionPerContract) || settings.commissionPerContract < 0) {
		fail("commissionPerContract", "must be 0 or greater");
	}
	if (
		!isFiniteNumber(settings.slippagePct) ||
		settings.slippagePct < 0 ||
		settings.slippagePct >= 1
	) {
		fail("slippagePct", "must be in [0, 1)");
	}
};
