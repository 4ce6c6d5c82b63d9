/**
 * External collaborators the engine consults each run.
 *
 * Both are assumed rate-limited and unreliable: every call reports
 * unavailability as a value so the caller can skip the symbol.
 */

import type { FillRecord } from "../fills/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { CollaboratorUnavailableError } from "../shared/errors.js";
import type { Ticker } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export interface MarketDataProvider {
	getLatestPrice(symbol: Ticker): Promise<Result<Decimal, CollaboratorUnavailableError>>;
	/** Current N (ATR) for the symbol */
	getAtrN(symbol: Ticker): Promise<Result<Decimal, CollaboratorUnavailableError>>;
}

export interface BrokerFillQuery {
	/** Fills for `symbol` since `sinceMs`; records without an execution time are always included */
	getRecentFills(
		symbol: Ticker,
		sinceMs: number,
	): Promise<Result<readonly FillRecord[], CollaboratorUnavailableError>>;
}
