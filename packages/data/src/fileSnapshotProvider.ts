import fs from "node:fs/promises";
import path from "node:path";
import {
	type DailyChain,
	type MarketDataProvider,
	type OptionQuote,
	type TradingDate,
	compareTradingDates,
	createLogger,
	toTradingDate,
} from "@optionlab/core";
import { parseChainPayload } from "./quoteParser";
import type { DataProviderLogger, FileSnapshotProviderConfig } from "./types";

const DATE_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.json$/;

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Reads daily chain snapshots from `<rootDir>/<SYMBOL>/<YYYY-MM-DD>.json`.
 * A missing file means no data for that day; unreadable files throw.
 */
export class FileSnapshotProvider implements MarketDataProvider {
	private readonly rootDir: string;
	private readonly logger: DataProviderLogger;

	constructor(config: FileSnapshotProviderConfig) {
		if (!config.rootDir) {
			throw new Error("FileSnapshotProvider rootDir is required");
		}
		this.rootDir = path.resolve(config.rootDir);
		this.logger = config.logger ?? createLogger("file-snapshot-provider");
	}

	async getOptionChain(symbol: string, date: TradingDate): Promise<OptionQuote[]> {
		const filePath = this.snapshotPath(symbol, date);
		let contents: string;
		try {
			contents = await fs.readFile(filePath, "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				this.logger.debug?.("snapshot_missing", { symbol, date, filePath });
				return [];
			}
			throw error;
		}
		return this.parseSnapshot(contents, filePath, symbol, date);
	}

	async getHistoricalChains(
		symbol: string,
		from: TradingDate,
		to: TradingDate
	): Promise<DailyChain[]> {
		const dates = await this.listSnapshotDates(symbol);
		const inRange = dates.filter(
			(date) => compareTradingDates(date, from) >= 0 && compareTradingDates(date, to) <= 0
		);
		const chains: DailyChain[] = [];
		for (const date of inRange) {
			chains.push({ date, quotes: await this.getOptionChain(symbol, date) });
		}
		return chains;
	}

	/** Snapshot dates available for a symbol, oldest first. */
	async listSnapshotDates(symbol: string): Promise<TradingDate[]> {
		let entries: string[];
		try {
			entries = await fs.readdir(path.join(this.rootDir, symbol.toUpperCase()));
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw error;
		}
		const dates: TradingDate[] = [];
		for (const entry of entries) {
			const match = DATE_FILE_PATTERN.exec(entry);
			if (!match) {
				continue;
			}
			try {
				dates.push(toTradingDate(match[1]));
			} catch {
				this.logger.warn?.("snapshot_file_ignored", { symbol, entry });
			}
		}
		return dates.sort(compareTradingDates);
	}

	private snapshotPath(symbol: string, date: TradingDate): string {
		return path.join(this.rootDir, symbol.toUpperCase(), `${date}.json`);
	}

	private parseSnapshot(
		contents: string,
		filePath: string,
		symbol: string,
		date: TradingDate
	): OptionQuote[] {
		let payload: unknown;
		try {
			payload = JSON.parse(contents);
		} catch (error) {
			throw new Error(`Snapshot ${filePath} is not valid JSON`, { cause: error });
		}
		const parsed = parseChainPayload(payload);
		if (parsed.date && parsed.date !== date) {
			this.logger.warn?.("snapshot_date_mismatch", {
				symbol,
				date,
				fileDate: parsed.date,
			});
		}
		if (parsed.rejected.length) {
			this.logger.warn?.("snapshot_rows_dropped", {
				symbol,
				date,
				dropped: parsed.rejected.length,
				kept: parsed.quotes.length,
				reasons: parsed.rejected.slice(0, 5),
			});
		}
		return parsed.quotes;
	}
}
