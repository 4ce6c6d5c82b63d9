/**
 * Per-symbol collaborator backoff carried in the snapshot between runs.
 *
 * After the n-th consecutive failure a symbol is skipped until
 * `now + min(base × 2^(n−1), max)`. A successful fetch clears the entry.
 */

import type { BackoffConfig } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import type { BackoffState } from "../position/types.js";

export type BackoffTable = Readonly<Record<string, BackoffState>>;

export function backoffDelayMs(failures: number, config: BackoffConfig): number {
	const exponent = Math.max(0, failures - 1);
	return Math.min(config.baseMs * 2 ** exponent, config.maxMs);
}

export class SymbolBackoff {
	readonly config: BackoffConfig;

	constructor(config: Partial<BackoffConfig> = {}) {
		this.config = {
			baseMs: config.baseMs ?? DEFAULT_ENGINE_CONFIG.backoff.baseMs,
			maxMs: config.maxMs ?? DEFAULT_ENGINE_CONFIG.backoff.maxMs,
		};
	}

	/** The backoff entry still in force for `symbol`, or null if it may be queried. */
	active(table: BackoffTable, symbol: string, nowMs: number): BackoffState | null {
		const state = table[symbol];
		if (state === undefined || state.retryAfterMs <= nowMs) return null;
		return state;
	}

	recordFailure(table: BackoffTable, symbol: string, error: string, nowMs: number): BackoffTable {
		const failures = (table[symbol]?.failures ?? 0) + 1;
		return {
			...table,
			[symbol]: {
				failures,
				retryAfterMs: nowMs + backoffDelayMs(failures, this.config),
				lastError: error,
			},
		};
	}

	recordSuccess(table: BackoffTable, symbol: string): BackoffTable {
		if (table[symbol] === undefined) return table;
		const next = { ...table };
		delete next[symbol];
		return next;
	}
}
