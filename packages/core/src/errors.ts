import type { TradingDate } from "./time";
import { createLogger, type ModuleLogger } from "./utils/logger";

export type BacktestErrorCode =
	| "DATA_UNAVAILABLE"
	| "INSUFFICIENT_CAPITAL"
	| "MISSING_MARKET_QUOTE"
	| "CONFIGURATION"
	| "LEDGER_INVARIANT"
	| "ORCHESTRATION_FAILURE";

export class BacktestError extends Error {
	readonly code: BacktestErrorCode;
	readonly fatal: boolean;
	readonly context: Record<string, unknown>;

	constructor(
		code: BacktestErrorCode,
		message: string,
		options: {
			fatal?: boolean;
			context?: Record<string, unknown>;
			cause?: unknown;
		} = {}
	) {
		super(message, { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.fatal = options.fatal ?? false;
		this.context = options.context ?? {};
	}
}

export class DataUnavailableError extends BacktestError {
	constructor(
		readonly symbol: string,
		readonly date: TradingDate,
		detail: string,
		cause?: unknown
	) {
		super("DATA_UNAVAILABLE", `No market data for ${symbol} on ${date}: ${detail}`, {
			context: { symbol, date, detail },
			cause,
		});
	}
}

export class InsufficientCapitalError extends BacktestError {
	constructor(
		readonly symbol: string,
		readonly date: TradingDate,
		context: Record<string, unknown> = {}
	) {
		super("INSUFFICIENT_CAPITAL", `Insufficient capital to open ${symbol} on ${date}`, {
			context: { symbol, date, ...context },
		});
	}
}

export class MissingMarketQuoteError extends BacktestError {
	constructor(
		readonly positionId: string,
		readonly date: TradingDate,
		context: Record<string, unknown> = {}
	) {
		super(
			"MISSING_MARKET_QUOTE",
			`No quote for position ${positionId} on ${date}; using last known price`,
			{ context: { positionId, date, ...context } }
		);
	}
}

export class ConfigurationError extends BacktestError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super("CONFIGURATION", message, { fatal: true, context });
	}
}

export class LedgerInvariantError extends BacktestError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super("LEDGER_INVARIANT", message, { fatal: true, context });
	}
}

/**
 * Fatal run abort. `partial` keeps whatever the run accumulated before the
 * failure so callers can inspect it.
 */
export class OrchestrationFailure<TPartial = unknown> extends BacktestError {
	constructor(
		message: string,
		readonly partial: TPartial,
		options: { date?: TradingDate; cause?: unknown } = {}
	) {
		super("ORCHESTRATION_FAILURE", message, {
			fatal: true,
			context: { date: options.date ?? null },
			cause: options.cause,
		});
	}
}

export const isBacktestError = (value: unknown): value is BacktestError =>
	value instanceof BacktestError;

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);

export interface ErrorRecord {
	id: string;
	code: BacktestErrorCode;
	name: string;
	message: string;
	fatal: boolean;
	context: Record<string, unknown>;
	reportedAt: string;
}

export interface ErrorSummary {
	totalErrors: number;
	byCode: Partial<Record<BacktestErrorCode, number>>;
	retained: number;
}

/**
 * Run-scoped sink for non-fatal conditions. Passed into the run explicitly so
 * nothing leaks between runs.
 */
export interface ErrorReporter {
	report(error: BacktestError, context?: Record<string, unknown>): string;
	records(): ErrorRecord[];
	summary(): ErrorSummary;
}

export interface InMemoryErrorReporterOptions {
	maxRecords?: number;
	logger?: ModuleLogger;
	now?: () => Date;
}

const DEFAULT_MAX_RECORDS = 1_000;

export class InMemoryErrorReporter implements ErrorReporter {
	private readonly maxRecords: number;
	private readonly logger: ModuleLogger;
	private readonly now: () => Date;
	private readonly counts = new Map<BacktestErrorCode, number>();
	private readonly retained: ErrorRecord[] = [];
	private sequence = 0;

	constructor(options: InMemoryErrorReporterOptions = {}) {
		this.maxRecords = Math.max(options.maxRecords ?? DEFAULT_MAX_RECORDS, 1);
		this.logger = options.logger ?? createLogger("error-reporter");
		this.now = options.now ?? (() => new Date());
	}

	report(error: BacktestError, context: Record<string, unknown> = {}): string {
		this.sequence += 1;
		const id = `${error.code.toLowerCase()}_${this.sequence}`;
		const record: ErrorRecord = {
			id,
			code: error.code,
			name: error.name,
			message: error.message,
			fatal: error.fatal,
			context: { ...error.context, ...context },
			reportedAt: this.now().toISOString(),
		};
		this.counts.set(error.code, (this.counts.get(error.code) ?? 0) + 1);
		this.retained.push(record);
		if (this.retained.length > this.maxRecords) {
			this.retained.splice(0, this.retained.length - this.maxRecords);
		}
		this.logger.log(error.fatal ? "error" : "warn", "error_reported", {
			errorId: id,
			code: error.code,
			message: error.message,
			context: record.context,
		});
		return id;
	}

	records(): ErrorRecord[] {
		return this.retained.map((record) => ({ ...record }));
	}

	summary(): ErrorSummary {
		const byCode: Partial<Record<BacktestErrorCode, number>> = {};
		let totalErrors = 0;
		for (const [code, count] of this.counts) {
			byCode[code] = count;
			totalErrors += count;
		}
		return { totalErrors, byCode, retained: this.retained.length };
	}
}
