/**
 * Pure calendar utilities for deterministic daily simulation.
 * All functions operate on UTC calendar dates (no timezone conversion).
 */

import { DAY_MS } from "./constants";

/** ISO calendar date `YYYY-MM-DD`, interpreted in UTC. */
export type TradingDate = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse an ISO date into UTC epoch milliseconds at midnight.
 * @throws Error if the value is not a real `YYYY-MM-DD` calendar date
 */
export const parseTradingDate = (value: string): number => {
	if (!value || typeof value !== "string") {
		throw new Error(`Invalid trading date: expected string, got ${typeof value}`);
	}
	const match = value.trim().match(ISO_DATE_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid trading date format: "${value}". Expected format like "2024-01-31"`
		);
	}
	const year = parseInt(match[1], 10);
	const month = parseInt(match[2], 10);
	const day = parseInt(match[3], 10);
	const ts = Date.UTC(year, month - 1, day);
	const roundTrip = new Date(ts);
	if (
		roundTrip.getUTCFullYear() !== year ||
		roundTrip.getUTCMonth() !== month - 1 ||
		roundTrip.getUTCDate() !== day
	) {
		throw new Error(`Invalid calendar date: "${value}"`);
	}
	return ts;
};

export const formatTradingDate = (ts: number): TradingDate => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	return new Date(ts).toISOString().slice(0, 10);
};

/**
 * Normalize any ISO date or datetime string to its UTC calendar date.
 * @example toTradingDate("2024-03-05T18:30:00Z") => "2024-03-05"
 */
export const toTradingDate = (value: string): TradingDate => {
	const trimmed = value.trim();
	if (ISO_DATE_PATTERN.test(trimmed)) {
		parseTradingDate(trimmed);
		return trimmed;
	}
	const ts = Date.parse(trimmed);
	if (Number.isNaN(ts)) {
		throw new Error(`Invalid date: "${value}"`);
	}
	return formatTradingDate(ts);
};

export const addDays = (date: TradingDate, days: number): TradingDate =>
	formatTradingDate(parseTradingDate(date) + days * DAY_MS);

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export const daysBetween = (from: TradingDate, to: TradingDate): number =>
	Math.round((parseTradingDate(to) - parseTradingDate(from)) / DAY_MS);

/** Monday = 0 ... Sunday = 6. */
export const weekdayIndex = (date: TradingDate): number => {
	const jsDay = new Date(parseTradingDate(date)).getUTCDay();
	return (jsDay + 6) % 7;
};

export const isTradingDay = (date: TradingDate): boolean =>
	weekdayIndex(date) < 5;

/**
 * Every Monday-Friday date in the inclusive range. No holiday calendar.
 * @returns Ascending dates; empty when `start` is after `end`
 */
export const buildTradingCalendar = (
	start: TradingDate,
	end: TradingDate
): TradingDate[] => {
	const startTs = parseTradingDate(start);
	const endTs = parseTradingDate(end);
	const dates: TradingDate[] = [];
	for (let ts = startTs; ts <= endTs; ts += DAY_MS) {
		const date = formatTradingDate(ts);
		if (isTradingDay(date)) {
			dates.push(date);
		}
	}
	return dates;
};

export const compareTradingDates = (a: TradingDate, b: TradingDate): number =>
	parseTradingDate(a) - parseTradingDate(b);
