import type { FillMatchConfig } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { Decimal, relativeDeviationPct } from "../shared/decimal.js";
import type { TimeWindow } from "../position/types.js";
import { MatchConfidence } from "../position/types.js";
import type { FillRecord, MatchResult, MatchTarget } from "./types.js";

export type FillMatcherConfig = Pick<FillMatchConfig, "timeToleranceMs" | "maxPriceDeviationPct">;

function validTime(ms: number | null): ms is number {
	return ms !== null && Number.isFinite(ms);
}

function validWindow(window: TimeWindow | null): window is TimeWindow {
	return (
		window !== null &&
		Number.isFinite(window.startMs) &&
		Number.isFinite(window.endMs) &&
		window.startMs <= window.endMs
	);
}

/** Newest first; equal times keep broker order. */
function byRecency(fills: readonly FillRecord[]): FillRecord[] {
	return fills
		.map((fill, order) => ({ fill, order }))
		.sort((a, b) => {
			const ta = a.fill.executedAtMs ?? Number.NEGATIVE_INFINITY;
			const tb = b.fill.executedAtMs ?? Number.NEGATIVE_INFINITY;
			return tb - ta || a.order - b.order;
		})
		.map((x) => x.fill);
}

/**
 * Reconciles broker fills with the entries and exits the engine is waiting on.
 *
 * Narrowing runs symbol/side → time window → price proximity. Equal
 * execution times are settled by price and then broker order; only a price
 * tie with no usable times is reported as ambiguous.
 */
export class FillMatcher {
	readonly config: FillMatcherConfig;

	constructor(config: Partial<FillMatcherConfig> = {}) {
		this.config = {
			timeToleranceMs: config.timeToleranceMs ?? DEFAULT_ENGINE_CONFIG.fills.timeToleranceMs,
			maxPriceDeviationPct:
				config.maxPriceDeviationPct ?? DEFAULT_ENGINE_CONFIG.fills.maxPriceDeviationPct,
		};
	}

	/** `consumed` holds order refs already settled against other entries or exits. */
	match(
		target: MatchTarget,
		fills: readonly FillRecord[],
		consumed: ReadonlySet<string> = new Set(),
	): MatchResult {
		const candidates = fills.filter(
			(f) =>
				f.symbol === target.symbol &&
				f.side === target.side &&
				!consumed.has(f.orderRef) &&
				!(
					target.notBeforeMs !== undefined &&
					validTime(f.executedAtMs) &&
					f.executedAtMs < target.notBeforeMs
				),
		);

		const only = candidates[0];
		if (only === undefined) {
			return { type: "no_candidate", reason: `no ${target.side} fill for ${target.symbol}` };
		}
		if (candidates.length === 1) {
			return { type: "matched", fill: only, confidence: MatchConfidence.Exact };
		}

		if (validWindow(target.window) && candidates.some((f) => validTime(f.executedAtMs))) {
			return this.matchByTime(target, target.window, candidates);
		}
		return this.matchByPrice(target, candidates);
	}

	private matchByTime(
		target: MatchTarget,
		window: TimeWindow,
		candidates: readonly FillRecord[],
	): MatchResult {
		const from = window.startMs - this.config.timeToleranceMs;
		const to = window.endMs + this.config.timeToleranceMs;
		const inRange = candidates.filter(
			(f) => validTime(f.executedAtMs) && f.executedAtMs >= from && f.executedAtMs <= to,
		);
		const newest = byRecency(inRange)[0];
		if (newest === undefined) {
			return { type: "no_candidate", reason: "no fill inside the time window" };
		}

		const sameTime = inRange.filter((f) => f.executedAtMs === newest.executedAtMs);
		const chosen = closestPrice(target.intendedPrice, sameTime)[0] ?? newest;
		return { type: "matched", fill: chosen, confidence: MatchConfidence.TimeFiltered };
	}

	private matchByPrice(target: MatchTarget, candidates: readonly FillRecord[]): MatchResult {
		const limit = Decimal.from(this.config.maxPriceDeviationPct);
		const near = candidates.filter((f) => {
			const deviation = relativeDeviationPct(f.price, target.intendedPrice);
			return deviation !== null && deviation.lte(limit);
		});

		const tied = closestPrice(target.intendedPrice, near);
		const first = tied[0];
		if (first === undefined) {
			return {
				type: "no_candidate",
				reason: `no fill within ${this.config.maxPriceDeviationPct}% of ${target.intendedPrice.toString()}`,
			};
		}
		if (tied.length === 1) {
			return { type: "matched", fill: first, confidence: MatchConfidence.PriceOnly };
		}
		if (tied.every((f) => validTime(f.executedAtMs))) {
			const newest = byRecency(tied)[0] ?? first;
			return { type: "matched", fill: newest, confidence: MatchConfidence.PriceOnly };
		}
		return { type: "ambiguous", candidates: tied };
	}
}

/** The fills sharing the smallest distance to `price`, in broker order. */
function closestPrice(price: Decimal, fills: readonly FillRecord[]): FillRecord[] {
	let best: Decimal | null = null;
	let tied: FillRecord[] = [];
	for (const fill of fills) {
		const distance = fill.price.sub(price).abs();
		if (best === null || distance.lt(best)) {
			best = distance;
			tied = [fill];
		} else if (distance.eq(best)) {
			tied.push(fill);
		}
	}
	return tied;
}
