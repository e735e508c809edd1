import {
	type ClosedTrade,
	CONTRACT_MULTIPLIER,
	EXIT_REASON_EXPIRATION,
	type EquityPoint,
	type ErrorReporter,
	type ExitReason,
	InsufficientCapitalError,
	LedgerInvariantError,
	type MarketSnapshot,
	MissingMarketQuoteError,
	type ModuleLogger,
	type OptionQuote,
	type OptionSignal,
	type OptionsStrategy,
	type Position,
	type SimulationSettings,
	type TradingDate,
	compareTradingDates,
	createLogger,
	findContractQuote,
	isOptionType,
	quoteMarkPrice,
	toTradingDate,
} from "@optionlab/core";
import {
	affordableContracts,
	budgetContracts,
	entryFillPrice,
	exitFillPrice,
	positionCost,
	saleProceeds,
} from "./fills";
import { validateSimulationSettings } from "./settings";

export type EntryRejectionReason = "invalid_signal" | "insufficient_capital";

export type OpenPositionResult =
	| { status: "opened"; position: Position }
	| { status: "rejected"; reason: EntryRejectionReason; detail: string };

export interface PositionLedgerOptions {
	settings: SimulationSettings;
	reporter?: ErrorReporter;
	logger?: ModuleLogger;
	/** Prefix for generated position ids, e.g. `pos_1`. */
	idPrefix?: string;
	/** Absolute tolerance for the capital conservation check. */
	tolerance?: number;
}

const BASE_TOLERANCE = 1e-6;

const clonePosition = (position: Position): Position => ({ ...position });

/**
 * Owns capital, open positions and the closed-trade list for one run.
 *
 * Capital only moves through fills: opening deducts the cost basis, closing
 * credits the proceeds. After every mutation
 * `capital + Σ open costBasis − Σ realized P/L` equals the initial capital.
 */
export class PositionLedger {
	private readonly settings: SimulationSettings;
	private readonly reporter?: ErrorReporter;
	private readonly logger: ModuleLogger;
	private readonly idPrefix: string;
	private readonly tolerance: number;
	private readonly open = new Map<string, Position>();
	private readonly closed: ClosedTrade[] = [];
	private capital: number;
	private realizedProfitLoss = 0;
	private sequence = 0;

	constructor(options: PositionLedgerOptions) {
		validateSimulationSettings(options.settings);
		this.settings = { ...options.settings };
		this.reporter = options.reporter;
		this.logger = options.logger ?? createLogger("position-ledger");
		this.idPrefix = options.idPrefix ?? "pos";
		this.tolerance =
			options.tolerance ?? BASE_TOLERANCE * Math.max(1, options.settings.initialCapital);
		this.capital = options.settings.initialCapital;
	}

	get currentCapital(): number {
		return this.capital;
	}

	get initialCapital(): number {
		return this.settings.initialCapital;
	}

	get openCount(): number {
		return this.open.size;
	}

	openPositions(): Position[] {
		return [...this.open.values()].map(clonePosition);
	}

	closedTrades(): ClosedTrade[] {
		return this.closed.map((trade) => ({ ...trade }));
	}

	openPosition(signal: OptionSignal, date: TradingDate): OpenPositionResult {
		const invalid = this.describeInvalidSignal(signal);
		if (invalid) {
			this.logger.warn("entry_rejected", {
				date,
				reason: "invalid_signal",
				detail: invalid,
				signal,
			});
			return { status: "rejected", reason: "invalid_signal", detail: invalid };
		}

		const { slippagePct, commissionPerContract, positionSizePct } = this.settings;
		let contracts = budgetContracts(this.capital, positionSizePct, signal.price);
		if (contracts < 1) {
			return this.rejectForCapital(signal, date, "position budget below one contract", {
				budget: this.capital * positionSizePct,
				price: signal.price,
			});
		}

		const fillPrice = entryFillPrice(signal.price, signal.optionType, slippagePct);
		let cost = positionCost(fillPrice, contracts, commissionPerContract);
		if (cost > this.capital) {
			contracts = affordableContracts(this.capital, fillPrice, commissionPerContract);
			if (contracts < 1) {
				return this.rejectForCapital(signal, date, "capital below one contract after costs", {
					capital: this.capital,
					fillPrice,
				});
			}
			cost = positionCost(fillPrice, contracts, commissionPerContract);
		}

		this.sequence += 1;
		const position: Position = {
			id: `${this.idPrefix}_${this.sequence}`,
			status: "OPEN",
			symbol: signal.symbol,
			optionType: signal.optionType,
			strike: signal.strike,
			expiration: signal.expiration,
			entryDate: date,
			entryPrice: fillPrice,
			contracts,
			costBasis: cost,
			currentPrice: fillPrice,
			lastMarkDate: date,
		};
		this.open.set(position.id, position);
		this.capital -= cost;
		this.assertCapitalConserved();
		if (this.capital < -this.tolerance) {
			throw new LedgerInvariantError("Entry drove capital negative", {
				positionId: position.id,
				capital: this.capital,
				cost,
			});
		}

		this.logger.info("position_opened", {
			date,
			positionId: position.id,
			symbol: position.symbol,
			optionType: position.optionType,
			strike: position.strike,
			expiration: position.expiration,
			contracts,
			fillPrice,
			costBasis: cost,
			capital: this.capital,
			reason: signal.reason,
		});
		return { status: "opened", position: clonePosition(position) };
	}

	/**
	 * Closes an open position against the day's snapshot. Without a usable
	 * quote the exit uses the last known mark and is flagged `stale`.
	 */
	closePosition(
		positionId: string,
		snapshot: MarketSnapshot,
		date: TradingDate,
		reason: ExitReason
	): ClosedTrade {
		const position = this.open.get(positionId);
		if (!position) {
			const alreadyClosed = this.closed.some((trade) => trade.id === positionId);
			throw new LedgerInvariantError(
				alreadyClosed
					? `Position ${positionId} is already closed`
					: `Unknown position ${positionId}`,
				{ positionId, date }
			);
		}

		const quote = findContractQuote(snapshot, position);
		const marketPrice = quote ? quoteMarkPrice(quote) : null;
		const referencePrice = marketPrice ?? position.currentPrice;
		if (marketPrice === null) {
			this.reporter?.report(
				new MissingMarketQuoteError(position.id, date, {
					symbol: position.symbol,
					fallbackPrice: position.currentPrice,
					detail: quote ? "quote has no usable price" : "contract not quoted",
					closing: true,
				})
			);
		}

		const { slippagePct, commissionPerContract } = this.settings;
		const exitPrice = exitFillPrice(referencePrice, position.optionType, slippagePct);
		const proceeds = saleProceeds(exitPrice, position.contracts, commissionPerContract);
		const profitLoss = proceeds - position.costBasis;
		const profitLossPct = position.costBasis > 0 ? (profitLoss / position.costBasis) * 100 : 0;

		const trade: ClosedTrade = {
			id: position.id,
			status: "CLOSED",
			symbol: position.symbol,
			optionType: position.optionType,
			strike: position.strike,
			expiration: position.expiration,
			entryDate: position.entryDate,
			entryPrice: position.entryPrice,
			contracts: position.contracts,
			costBasis: position.costBasis,
			exitDate: date,
			exitPrice,
			exitReason: reason,
			priceSource: marketPrice === null ? "stale" : "market",
			proceeds,
			profitLoss,
			profitLossPct,
		};

		this.open.delete(position.id);
		this.closed.push(trade);
		this.capital += proceeds;
		this.realizedProfitLoss += profitLoss;
		this.assertCapitalConserved();

		this.logger.info("position_closed", {
			date,
			positionId: trade.id,
			symbol: trade.symbol,
			optionType: trade.optionType,
			strike: trade.strike,
			expiration: trade.expiration,
			contracts: trade.contracts,
			fillPrice: exitPrice,
			reason,
			priceSource: trade.priceSource,
			profitLoss,
			profitLossPct,
			capital: this.capital,
		});
		return { ...trade };
	}

	/**
	 * Runs the exit pass for one day, in order: mark to the day's quote, ask
	 * the strategy, then force expiry once `expiration <= date`. Positions
	 * whose contract is not quoted are carried forward untouched.
	 */
	async evaluateExits(
		snapshot: MarketSnapshot,
		date: TradingDate,
		strategy: Pick<OptionsStrategy, "checkExitCriteria">
	): Promise<ClosedTrade[]> {
		const closedToday: ClosedTrade[] = [];
		for (const position of [...this.open.values()]) {
			const quote = findContractQuote(snapshot, position);
			if (!quote) {
				this.reporter?.report(
					new MissingMarketQuoteError(position.id, date, {
						symbol: position.symbol,
						carriedPrice: position.currentPrice,
						expired: compareTradingDates(position.expiration, date) <= 0,
					})
				);
				continue;
			}

			const marked = this.applyMark(position, quote, date);
			const strategyReason = await strategy.checkExitCriteria(
				clonePosition(position),
				{ ...quote },
				date
			);
			const reason =
				strategyReason ||
				(compareTradingDates(position.expiration, date) <= 0 ? EXIT_REASON_EXPIRATION : null);

			if (reason) {
				closedToday.push(this.closePosition(position.id, snapshot, date, reason));
			} else if (!marked) {
				this.reporter?.report(
					new MissingMarketQuoteError(position.id, date, {
						symbol: position.symbol,
						carriedPrice: position.currentPrice,
						detail: "quote has no usable price",
					})
				);
			}
		}
		return closedToday;
	}

	/** Updates every open position that has a priced quote; returns how many moved. */
	markToMarket(snapshot: MarketSnapshot, date: TradingDate): number {
		let marked = 0;
		for (const position of this.open.values()) {
			const quote = findContractQuote(snapshot, position);
			if (quote && this.applyMark(position, quote, date)) {
				marked += 1;
			}
		}
		return marked;
	}

	positionsValue(): number {
		let total = 0;
		for (const position of this.open.values()) {
			total += position.currentPrice * CONTRACT_MULTIPLIER * position.contracts;
		}
		return total;
	}

	snapshotEquity(date: TradingDate): EquityPoint {
		const positionsValue = this.positionsValue();
		return {
			date,
			cash: this.capital,
			positionsValue,
			totalEquity: this.capital + positionsValue,
		};
	}

	/**
	 * Capital may dip below zero after a close whose commission exceeds the
	 * exit proceeds; only entries are barred from doing that.
	 * @throws LedgerInvariantError when capital leaked
	 */
	assertCapitalConserved(): void {
		let openCost = 0;
		for (const position of this.open.values()) {
			openCost += position.costBasis;
		}
		const accounted = this.capital + openCost - this.realizedProfitLoss;
		const drift = accounted - this.settings.initialCapital;
		if (Math.abs(drift) > this.tolerance) {
			throw new LedgerInvariantError("Capital conservation violated", {
				capital: this.capital,
				openCost,
				realizedProfitLoss: this.realizedProfitLoss,
				initialCapital: this.settings.initialCapital,
				drift,
			});
		}
	}

	private applyMark(position: Position, quote: OptionQuote, date: TradingDate): boolean {
		const mark = quoteMarkPrice(quote);
		if (mark === null) {
			return false;
		}
		position.currentPrice = mark;
		position.lastMarkDate = date;
		return true;
	}

	private rejectForCapital(
		signal: OptionSignal,
		date: TradingDate,
		detail: string,
		context: Record<string, unknown>
	): OpenPositionResult {
		this.reporter?.report(
			new InsufficientCapitalError(signal.symbol, date, {
				optionType: signal.optionType,
				strike: signal.strike,
				expiration: signal.expiration,
				detail,
				...context,
			})
		);
		this.logger.info("entry_rejected", {
			date,
			reason: "insufficient_capital",
			detail,
			symbol: signal.symbol,
			strike: signal.strike,
		});
		return { status: "rejected", reason: "insufficient_capital", detail };
	}

	private describeInvalidSignal(signal: OptionSignal): string | null {
		if (typeof signal.symbol !== "string" || !signal.symbol.trim()) {
			return "missing symbol";
		}
		if (!isOptionType(signal.optionType)) {
			return "invalid option type";
		}
		if (!Number.isFinite(signal.strike) || signal.strike <= 0) {
			return "invalid strike";
		}
		if (typeof signal.expiration !== "string") {
			return "missing expiration";
		}
		try {
			if (toTradingDate(signal.expiration) !== signal.expiration) {
				return "expiration must be YYYY-MM-DD";
			}
		} catch {
			return "invalid expiration";
		}
		if (!Number.isFinite(signal.price) || signal.price <= 0) {
			return "price must be a positive number";
		}
		return null;
	}
}
