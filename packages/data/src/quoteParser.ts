import {
	type OptionGreeks,
	type OptionQuote,
	isOptionType,
	toTradingDate,
} from "@optionlab/core";
import type { ParsedChain } from "./types";

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/** First present key wins; vendor payloads use snake_case. */
const pick = (raw: RawRecord, ...keys: string[]): unknown => {
	for (const key of keys) {
		if (raw[key] !== undefined && raw[key] !== null) {
			return raw[key];
		}
	}
	return undefined;
};

const toNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && value.trim()) {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

const normalizeOptionType = (value: unknown): unknown => {
	if (typeof value !== "string") {
		return value;
	}
	const lower = value.trim().toLowerCase();
	if (lower === "c") return "call";
	if (lower === "p") return "put";
	return lower;
};

const parseGreeks = (raw: RawRecord): OptionGreeks | undefined => {
	const source = isRecord(raw.greeks) ? raw.greeks : raw;
	const greeks: OptionGreeks = {};
	for (const key of ["delta", "gamma", "theta", "vega"] as const) {
		const value = toNumber(source[key]);
		if (value !== null) {
			greeks[key] = value;
		}
	}
	return Object.keys(greeks).length ? greeks : undefined;
};

export type QuoteParseResult =
	| { ok: true; quote: OptionQuote }
	| { ok: false; reason: string };

export const parseOptionQuote = (
	raw: unknown,
	fallbackUnderlying = 0
): QuoteParseResult => {
	if (!isRecord(raw)) {
		return { ok: false, reason: "row is not an object" };
	}
	const optionType = normalizeOptionType(pick(raw, "optionType", "option_type", "right"));
	if (!isOptionType(optionType)) {
		return { ok: false, reason: "invalid option type" };
	}
	const strike = toNumber(pick(raw, "strike"));
	if (strike === null || strike <= 0) {
		return { ok: false, reason: "invalid strike" };
	}
	const rawExpiration = pick(raw, "expiration", "expiry");
	if (typeof rawExpiration !== "string") {
		return { ok: false, reason: "missing expiration" };
	}
	let expiration: string;
	try {
		expiration = toTradingDate(rawExpiration);
	} catch {
		return { ok: false, reason: "invalid expiration" };
	}

	const numeric = {
		bid: toNumber(pick(raw, "bid")) ?? 0,
		ask: toNumber(pick(raw, "ask")) ?? 0,
		last: toNumber(pick(raw, "last", "lastPrice", "last_price")) ?? 0,
		volume: toNumber(pick(raw, "volume")) ?? 0,
		openInterest: toNumber(pick(raw, "openInterest", "open_interest")) ?? 0,
	};
	if (Object.values(numeric).some((value) => value < 0)) {
		return { ok: false, reason: "negative price or size" };
	}

	const quote: OptionQuote = {
		strike,
		optionType,
		expiration,
		...numeric,
		underlyingPrice:
			toNumber(pick(raw, "underlyingPrice", "underlying_price")) ?? fallbackUnderlying,
	};
	const iv = toNumber(pick(raw, "impliedVolatility", "implied_volatility", "iv"));
	if (iv !== null && iv >= 0) {
		quote.impliedVolatility = iv;
	}
	const greeks = parseGreeks(raw);
	if (greeks) {
		quote.greeks = greeks;
	}
	return { ok: true, quote };
};

/**
 * Accepts either a bare array of rows or `{ date, underlyingPrice, quotes }`.
 * Malformed rows are dropped and listed in `rejected`.
 */
export const parseChainPayload = (payload: unknown): ParsedChain => {
	let rows: unknown[];
	let date: string | undefined;
	let underlying = 0;
	if (Array.isArray(payload)) {
		rows = payload;
	} else if (isRecord(payload) && Array.isArray(payload.quotes)) {
		rows = payload.quotes;
		date = typeof payload.date === "string" ? payload.date : undefined;
		underlying = toNumber(pick(payload, "underlyingPrice", "underlying_price")) ?? 0;
	} else {
		throw new Error("Chain payload must be an array or an object with a quotes array");
	}

	const quotes: OptionQuote[] = [];
	const rejected: ParsedChain["rejected"] = [];
	rows.forEach((row, index) => {
		const result = parseOptionQuote(row, underlying);
		if (result.ok) {
			quotes.push(result.quote);
		} else {
			rejected.push({ index, reason: result.reason });
		}
	});
	return { date, quotes, rejected };
};
