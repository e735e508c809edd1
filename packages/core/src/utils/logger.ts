export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitizePayload(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitizePayload = (payload: BaseLogPayload): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clone: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(payload)) {
		clone[key] = sanitizeValue(value, seen);
	}
	return clone;
};

/** Makes a log payload JSON-safe: errors, dates, bigints and cycles. */
export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object> = new WeakSet<object>()
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "position_opened":
		case "position_closed":
			printPositionEvent(rest);
			break;
		case "backtest_summary":
			printBacktestSummary(rest);
			break;
		default:
			break;
	}
}

const fmtNumber = (value: unknown, digits = 2): string =>
	typeof value === "number" ? value.toFixed(digits) : "-";

const printPositionEvent = (rest: Record<string, unknown>): void => {
	const {
		date,
		symbol,
		optionType,
		strike,
		expiration,
		contracts,
		fillPrice,
		reason,
		profitLoss,
		profitLossPct,
	} = rest;
	console.table([
		{
			date,
			contract: `${String(symbol)} ${String(optionType)} ${fmtNumber(strike)} ${String(expiration)}`,
			contracts,
			fill: fmtNumber(fillPrice),
			reason: reason ?? "-",
			pnl: fmtNumber(profitLoss),
			pnlPct: fmtNumber(profitLossPct),
		},
	]);
};

const printBacktestSummary = (rest: Record<string, unknown>): void => {
	const {
		strategyId,
		tradingDays,
		totalTrades,
		initialCapital,
		finalCapital,
		totalReturnPct,
		maxDrawdownPct,
	} = rest;
	console.table([
		{
			strategyId,
			tradingDays,
			totalTrades,
			initialCapital: fmtNumber(initialCapital),
			finalCapital: fmtNumber(finalCapital),
			returnPct: fmtNumber(totalReturnPct),
			maxDrawdownPct: fmtNumber(maxDrawdownPct),
		},
	]);
};
