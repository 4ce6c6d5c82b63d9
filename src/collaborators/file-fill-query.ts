/**
 * Broker fills read from a JSONL export, one execution per line:
 *
 *   {"symbol":"AAPL","side":"buy","quantity":"10","price":"101.02","executedAt":"2024-03-01T14:31:07Z","orderRef":"B-1182"}
 *
 * `executedAt` may be missing, null or garbled; such records are kept with no
 * execution time. Lines that fail validation otherwise are logged and skipped.
 */

import { readFile } from "node:fs/promises";
import type { FillRecord } from "../fills/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { formatIssue, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { FillSide } from "../shared/direction.js";
import { CollaboratorUnavailableError, isNodeError } from "../shared/errors.js";
import type { Ticker } from "../shared/identifiers.js";
import { orderRef, ticker } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { parseIso } from "../shared/time.js";
import type { BrokerFillQuery } from "./types.js";

const COLLABORATOR = "broker-fills";

const decimal = z
	.union([z.string(), z.number()])
	.transform((v) => String(v).trim())
	.refine((v) => Decimal.isDecimalString(v), { message: "must be a decimal" })
	.transform((v) => Decimal.from(v));

const fillLineSchema = z.object({
	symbol: z.string().trim().min(1).transform(ticker),
	side: z.enum([FillSide.Buy, FillSide.Sell]),
	quantity: decimal,
	price: decimal,
	executedAt: z
		.unknown()
		.optional()
		.transform((v) => (typeof v === "string" ? parseIso(v) : null)),
	orderRef: z.union([z.string().trim().min(1), z.number()]).transform((v) => orderRef(String(v))),
});

export class FileFillQuery implements BrokerFillQuery {
	private readonly path: string;
	private readonly logger: Logger;
	private fills: Promise<Result<readonly FillRecord[], CollaboratorUnavailableError>> | null = null;

	constructor(config: { path: string; logger?: Logger }) {
		this.path = config.path;
		this.logger = (config.logger ?? silentLogger()).child({ component: COLLABORATOR });
	}

	async getRecentFills(
		symbol: Ticker,
		sinceMs: number,
	): Promise<Result<readonly FillRecord[], CollaboratorUnavailableError>> {
		if (this.fills === null) this.fills = this.load();
		const fills = await this.fills;
		if (!fills.ok) return fills;
		return ok(
			fills.value.filter(
				(f) => f.symbol === symbol && (f.executedAtMs === null || f.executedAtMs >= sinceMs),
			),
		);
	}

	private async load(): Promise<Result<readonly FillRecord[], CollaboratorUnavailableError>> {
		let text: string;
		try {
			text = await readFile(this.path, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				this.logger.info({ path: this.path }, "no fills export yet");
				return ok([]);
			}
			return err(
				new CollaboratorUnavailableError(`Cannot read fills file ${this.path}`, COLLABORATOR, {
					path: this.path,
					cause: e,
				}),
			);
		}

		const fills: FillRecord[] = [];
		const lines = text.split("\n");
		for (const [i, raw] of lines.entries()) {
			const line = raw.trim();
			if (line === "") continue;
			const record = parseLine(line);
			if (record.ok) {
				fills.push(record.value);
			} else {
				this.logger.warn(
					{ path: this.path, lineNumber: i + 1, problems: record.error },
					"skipping invalid fill record",
				);
			}
		}
		this.logger.debug({ path: this.path, fills: fills.length }, "fills loaded");
		return ok(fills);
	}
}

function parseLine(line: string): Result<FillRecord, readonly string[]> {
	let data: unknown;
	try {
		data = JSON.parse(line);
	} catch {
		return err(["not valid JSON"]);
	}
	const parsed = validate(fillLineSchema, data);
	if (!parsed.ok) return err(parsed.error.issues.map(formatIssue));
	const { executedAt, ...rest } = parsed.value;
	return ok({ ...rest, executedAtMs: executedAt });
}
