import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigurationError } from "./errors";
import { type StrategyId, isStrategyId } from "./strategies/ids";
import { resolveStrategyProfileName } from "./strategies/profiles";
import { getStrategyDefinition } from "./strategies/registry";
import type { StrategyConfig } from "./strategies/types";
import { type TradingDate, toTradingDate } from "./time";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("optionlab.config.meta");

const isConfigSource = (value: unknown): value is ConfigSourceType =>
	value === "file" || value === "embedded" || value === "merged";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const descriptor = Object.getOwnPropertyDescriptor(config, CONFIG_META_SYMBOL);
	const meta: unknown = descriptor?.value;
	if (!isRecord(meta) || !isConfigSource(meta.source)) {
		return null;
	}
	return {
		source: meta.source,
		path: typeof meta.path === "string" ? meta.path : undefined,
		profile: typeof meta.profile === "string" ? meta.profile : undefined,
	};
};

const applyConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	const nextMeta: ConfigMetadata = {
		...existing,
		...metadata,
	};
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: nextMeta,
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => applyConfigMetadata(config, metadata);

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export const BACKTEST_DEFAULTS = {
	initialCapital: 100_000,
	maxPositions: 5,
	positionSizePct: 0.1,
	commissionPerContract: 0.65,
	slippagePct: 0.01,
} as const;

export interface EnvConfig {
	/** Root of `<SYMBOL>/<YYYY-MM-DD>.json` chain snapshots. */
	dataDir: string;
	outputDir: string;
	fetchTimeoutMs: number;
}

export interface BacktestProfile {
	symbols: string[];
	startDate?: TradingDate;
	endDate?: TradingDate;
	strategyId?: StrategyId;
	strategyProfile?: string;
	initialCapital: number;
	maxPositions: number;
	positionSizePct: number;
	commissionPerContract: number;
	slippagePct: number;
	fetchTimeoutMs?: number;
	maxSignalsPerDay?: number;
}

export interface OptionlabConfig {
	env: EnvConfig;
	backtest: BacktestProfile;
	strategy: StrategyConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	backtestProfile?: string;
	strategyProfile?: string;
}

const hasWorkspacesManifest = (dir: string): boolean => {
	const manifestPath = path.join(dir, "package.json");
	if (!fs.existsSync(manifestPath)) {
		return false;
	}
	try {
		const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
		return isRecord(manifest) && manifest.workspaces !== undefined;
	} catch {
		return false;
	}
};

const isWorkspaceRoot = (dir: string): boolean =>
	hasWorkspacesManifest(dir) || fs.existsSync(path.join(dir, ".git"));

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parsePositiveIntEnv = (key: string, fallback: number): number => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigurationError(`${key} must be a positive integer`, {
			key,
			value: raw,
		});
	}
	return value;
};

const readJsonFile = (filePath: string): Record<string, unknown> => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigurationError(`Config file not found: ${filePath}`, {
			path: filePath,
		});
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ConfigurationError(`Config file is not valid JSON: ${filePath}`, {
			path: filePath,
			error: error instanceof Error ? error.message : String(error),
		});
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError(`Config file must hold a JSON object: ${filePath}`, {
			path: filePath,
		});
	}
	return parsed;
};

const ensureNumber = (value: unknown, field: string, fallback?: number): number => {
	if (value === undefined && fallback !== undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigurationError(`Required numeric field missing in ${field}`, {
			field,
			value,
		});
	}
	return value;
};

const optionalNumber = (value: unknown, field: string): number | undefined =>
	value === undefined ? undefined : ensureNumber(value, field);

const optionalString = (value: unknown, field: string): string | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || !value.trim()) {
		throw new ConfigurationError(`${field} must be a non-empty string`, {
			field,
			value,
		});
	}
	return value.trim();
};

const optionalDate = (value: unknown, field: string): TradingDate | undefined => {
	const raw = optionalString(value, field);
	if (raw === undefined) {
		return undefined;
	}
	try {
		return toTradingDate(raw);
	} catch (error) {
		throw new ConfigurationError(`${field} is not a valid date: ${raw}`, {
			field,
			value: raw,
			error: error instanceof Error ? error.message : String(error),
		});
	}
};

export const parseSymbolList = (value: unknown, field = "symbols"): string[] => {
	const tokens: unknown[] | null =
		typeof value === "string"
			? value.split(",")
			: Array.isArray(value)
				? value
				: null;
	if (!tokens) {
		throw new ConfigurationError(`${field} must be a list of symbols`, {
			field,
			value,
		});
	}
	const symbols: string[] = [];
	for (const token of tokens) {
		if (typeof token !== "string") {
			throw new ConfigurationError(`${field} entries must be strings`, {
				field,
				value,
			});
		}
		const symbol = token.trim().toUpperCase();
		if (symbol && !symbols.includes(symbol)) {
			symbols.push(symbol);
		}
	}
	return symbols;
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	const root = findWorkspaceRoot();
	return {
		dataDir: path.resolve(
			root,
			readOptionalEnvVar("OPTIONLAB_DATA_DIR") ?? path.join("data", "snapshots")
		),
		outputDir: path.resolve(
			root,
			readOptionalEnvVar("OPTIONLAB_OUTPUT_DIR") ?? path.join("output", "backtests")
		),
		fetchTimeoutMs: parsePositiveIntEnv(
			"OPTIONLAB_FETCH_TIMEOUT_MS",
			DEFAULT_FETCH_TIMEOUT_MS
		),
	};
};

export const loadBacktestProfile = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): BacktestProfile => {
	const profilePath = path.join(configDir, "backtest", `${profile}.json`);
	const file = readJsonFile(profilePath);
	let strategyId: StrategyId | undefined;
	if (file.strategyId !== undefined) {
		if (!isStrategyId(file.strategyId)) {
			throw new ConfigurationError(
				`Unknown strategy id: ${String(file.strategyId)}`,
				{ path: profilePath }
			);
		}
		strategyId = file.strategyId;
	}
	return withConfigMetadata(
		{
			symbols:
				file.symbols === undefined ? [] : parseSymbolList(file.symbols, "backtest.symbols"),
			startDate: optionalDate(file.startDate, "backtest.startDate"),
			endDate: optionalDate(file.endDate, "backtest.endDate"),
			strategyId,
			strategyProfile: optionalString(file.strategyProfile, "backtest.strategyProfile"),
			initialCapital: ensureNumber(
				file.initialCapital,
				"backtest.initialCapital",
				BACKTEST_DEFAULTS.initialCapital
			),
			maxPositions: ensureNumber(
				file.maxPositions,
				"backtest.maxPositions",
				BACKTEST_DEFAULTS.maxPositions
			),
			positionSizePct: ensureNumber(
				file.positionSizePct,
				"backtest.positionSizePct",
				BACKTEST_DEFAULTS.positionSizePct
			),
			commissionPerContract: ensureNumber(
				file.commissionPerContract,
				"backtest.commissionPerContract",
				BACKTEST_DEFAULTS.commissionPerContract
			),
			slippagePct: ensureNumber(
				file.slippagePct,
				"backtest.slippagePct",
				BACKTEST_DEFAULTS.slippagePct
			),
			fetchTimeoutMs: optionalNumber(file.fetchTimeoutMs, "backtest.fetchTimeoutMs"),
			maxSignalsPerDay: optionalNumber(
				file.maxSignalsPerDay,
				"backtest.maxSignalsPerDay"
			),
		},
		{
			source: "file",
			path: profilePath,
			profile,
		}
	);
};

export const resolveStrategyConfigPath = (
	configDir: string,
	strategyProfile: string
): string => {
	const profileName = strategyProfile.endsWith(".json")
		? strategyProfile
		: `${strategyProfile}.json`;
	const candidates = [
		path.join(configDir, "strategies", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigurationError(
		`Strategy config not found. Looked for ${candidates.join(", ")}`,
		{ profile: strategyProfile }
	);
};

export const loadStrategyConfig = (
	configDir = getDefaultConfigDir(),
	strategyProfile = "liquidity-momentum"
): StrategyConfig => {
	const strategyPath = resolveStrategyConfigPath(configDir, strategyProfile);
	const file = readJsonFile(strategyPath);
	const strategyId = file.id;
	if (typeof strategyId !== "string" || !strategyId) {
		throw new ConfigurationError(
			`Strategy config at ${strategyPath} must include an "id" property.`,
			{ path: strategyPath }
		);
	}
	const definition = getStrategyDefinition(strategyId);
	return withConfigMetadata(
		{
			...file,
			id: definition.id,
		},
		{
			source: "file",
			path: strategyPath,
			profile: strategyProfile,
		}
	);
};

export const loadOptionlabConfig = (
	options: ConfigLoadOptions = {}
): OptionlabConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const envPath = options.envPath ?? path.join(workspaceRoot, ".env");
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const env = loadEnvConfig(envPath);
	const backtest = loadBacktestProfile(configDir, options.backtestProfile);
	const strategyProfile =
		options.strategyProfile ??
		backtest.strategyProfile ??
		(backtest.strategyId
			? resolveStrategyProfileName(backtest.strategyId)
			: undefined);
	return {
		env,
		backtest,
		strategy: loadStrategyConfig(configDir, strategyProfile),
	};
};
