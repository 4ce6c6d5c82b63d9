/**
 * In-process collaborator doubles for engine tests.
 */

import type { FillRecord } from "../fills/types.js";
import { Decimal } from "../shared/decimal.js";
import { FillSide } from "../shared/direction.js";
import { CollaboratorUnavailableError } from "../shared/errors.js";
import type { Ticker } from "../shared/identifiers.js";
import { orderRef, ticker } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { BrokerFillQuery, MarketDataProvider } from "./types.js";

export class FakeMarketData implements MarketDataProvider {
	readonly calls: string[] = [];
	private readonly quotes = new Map<string, { price: Decimal; n: Decimal }>();
	private readonly down = new Set<string>();

	constructor(quotes: Record<string, { price: string; n: string }> = {}) {
		for (const [symbol, q] of Object.entries(quotes)) this.setQuote(symbol, q.price, q.n);
	}

	setQuote(symbol: string, price: string, n: string): this {
		this.quotes.set(symbol, { price: Decimal.from(price), n: Decimal.from(n) });
		return this;
	}

	fail(symbol: string): this {
		this.down.add(symbol);
		return this;
	}

	async getLatestPrice(symbol: Ticker): Promise<Result<Decimal, CollaboratorUnavailableError>> {
		this.calls.push(`price:${symbol}`);
		const quote = this.lookup(symbol);
		return quote.ok ? ok(quote.value.price) : quote;
	}

	async getAtrN(symbol: Ticker): Promise<Result<Decimal, CollaboratorUnavailableError>> {
		this.calls.push(`n:${symbol}`);
		const quote = this.lookup(symbol);
		return quote.ok ? ok(quote.value.n) : quote;
	}

	private lookup(
		symbol: string,
	): Result<{ price: Decimal; n: Decimal }, CollaboratorUnavailableError> {
		const quote = this.quotes.get(symbol);
		if (this.down.has(symbol) || quote === undefined) {
			return err(new CollaboratorUnavailableError(`market data down for ${symbol}`, "market-data"));
		}
		return ok(quote);
	}
}

export class FakeFillQuery implements BrokerFillQuery {
	readonly calls: { symbol: string; sinceMs: number }[] = [];
	private readonly fills: FillRecord[] = [];
	private readonly down = new Set<string>();

	add(fill: FillRecord): this {
		this.fills.push(fill);
		return this;
	}

	fail(symbol: string): this {
		this.down.add(symbol);
		return this;
	}

	async getRecentFills(
		symbol: Ticker,
		sinceMs: number,
	): Promise<Result<readonly FillRecord[], CollaboratorUnavailableError>> {
		this.calls.push({ symbol, sinceMs });
		if (this.down.has(symbol)) {
			return err(new CollaboratorUnavailableError(`fills down for ${symbol}`, "broker-fills"));
		}
		return ok(this.fills.filter((f) => f.symbol === symbol));
	}
}

export function brokerFill(
	ref: string,
	price: string,
	executedAtMs: number | null,
	options: { symbol?: string; side?: FillSide; quantity?: string } = {},
): FillRecord {
	return {
		symbol: ticker(options.symbol ?? "AAPL"),
		side: options.side ?? FillSide.Buy,
		quantity: Decimal.from(options.quantity ?? "10"),
		price: Decimal.from(price),
		executedAtMs,
		orderRef: orderRef(ref),
	};
}
