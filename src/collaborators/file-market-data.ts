/**
 * Market data read from a quotes file produced by the upstream indicator job:
 *
 *   { "AAPL": { "price": "187.20", "n": "3.4" }, "ES": { "price": 4512.25, "n": 48 } }
 *
 * The file is read once per instance. A missing or invalid file makes every
 * symbol unavailable; a missing symbol makes only that symbol unavailable.
 */

import { readFile } from "node:fs/promises";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { formatIssue, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { CollaboratorUnavailableError } from "../shared/errors.js";
import type { Ticker } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { MarketDataProvider } from "./types.js";

const COLLABORATOR = "market-data";

const positiveDecimal = z
	.union([z.string(), z.number()])
	.transform((v) => String(v).trim())
	.refine((v) => Decimal.isDecimalString(v) && Decimal.from(v).isPositive(), {
		message: "must be a positive decimal",
	})
	.transform((v) => Decimal.from(v));

const quotesSchema = z.record(z.object({ price: positiveDecimal, n: positiveDecimal }));

export interface Quote {
	readonly price: Decimal;
	readonly n: Decimal;
}

type Quotes = ReadonlyMap<string, Quote>;

export class FileMarketData implements MarketDataProvider {
	private readonly path: string;
	private readonly logger: Logger;
	private quotes: Promise<Result<Quotes, CollaboratorUnavailableError>> | null = null;

	constructor(config: { path: string; logger?: Logger }) {
		this.path = config.path;
		this.logger = (config.logger ?? silentLogger()).child({ component: COLLABORATOR });
	}

	async getLatestPrice(symbol: Ticker): Promise<Result<Decimal, CollaboratorUnavailableError>> {
		const quote = await this.quoteFor(symbol);
		return quote.ok ? ok(quote.value.price) : quote;
	}

	async getAtrN(symbol: Ticker): Promise<Result<Decimal, CollaboratorUnavailableError>> {
		const quote = await this.quoteFor(symbol);
		return quote.ok ? ok(quote.value.n) : quote;
	}

	private async quoteFor(symbol: Ticker): Promise<Result<Quote, CollaboratorUnavailableError>> {
		if (this.quotes === null) this.quotes = this.load();
		const quotes = await this.quotes;
		if (!quotes.ok) return quotes;
		const quote = quotes.value.get(symbol);
		if (quote === undefined) {
			return err(
				new CollaboratorUnavailableError(`No quote for ${symbol}`, COLLABORATOR, {
					symbol,
					path: this.path,
				}),
			);
		}
		return ok(quote);
	}

	private async load(): Promise<Result<Quotes, CollaboratorUnavailableError>> {
		let data: unknown;
		try {
			data = JSON.parse(await readFile(this.path, "utf-8"));
		} catch (e: unknown) {
			this.logger.warn({ error: e, path: this.path }, "quotes file unreadable");
			return err(
				new CollaboratorUnavailableError(`Cannot read quotes file ${this.path}`, COLLABORATOR, {
					path: this.path,
					cause: e,
				}),
			);
		}

		const parsed = validate(quotesSchema, data);
		if (!parsed.ok) {
			const issues = parsed.error.issues.map(formatIssue);
			this.logger.warn({ path: this.path, issues }, "quotes file invalid");
			return err(
				new CollaboratorUnavailableError(`Quotes file ${this.path} is invalid`, COLLABORATOR, {
					path: this.path,
					issues,
				}),
			);
		}

		const quotes = new Map<string, Quote>();
		for (const [symbol, quote] of Object.entries(parsed.value)) {
			quotes.set(symbol.trim().toUpperCase(), quote);
		}
		this.logger.debug({ path: this.path, symbols: quotes.size }, "quotes loaded");
		return ok(quotes);
	}
}
