/**
 * Pyramid Manager: proposes and commits additional units.
 *
 * A unit is proposed once price has moved `intervalN × N` in the position's
 * favor from the newest filled unit. The stop that comes with it sits
 * `stopDistanceN × N` behind the new unit and is only ever tightened.
 * Proposing never mutates; `commit` runs after the Risk Manager approves.
 */

import type { PyramidConfig } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import {
	adverseOffset,
	favorableOffset,
	reachedFavorably,
	tightenStop,
} from "../shared/direction.js";
import { InvalidTransitionError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import { isHolding, transition } from "../position/lifecycle.js";
import { hasOpenEntry, lastFilledEntry, reservedUnits } from "../position/position.js";
import type { Entry, Position } from "../position/types.js";
import { PositionStatus } from "../position/types.js";
import type { PyramidCandidate, PyramidDecision, UnitQuantitySource } from "./types.js";
import { HoldReason } from "./types.js";

export interface PyramidManagerConfig extends PyramidConfig {
	/** Window given to each committed unit to find its fill */
	readonly entryWindowMs: number;
}

export interface PyramidManagerDeps {
	readonly config?: Partial<PyramidManagerConfig>;
	/** Unit sizing; without it a new unit repeats the newest filled quantity */
	readonly sizer?: UnitQuantitySource;
}

export class PyramidManager {
	readonly config: PyramidManagerConfig;
	private readonly sizer: UnitQuantitySource | null;

	constructor(deps: PyramidManagerDeps = {}) {
		const defaults = DEFAULT_ENGINE_CONFIG.pyramid;
		const c = deps.config ?? {};
		this.config = {
			maxUnits: c.maxUnits ?? defaults.maxUnits,
			intervalN: c.intervalN ?? defaults.intervalN,
			stopDistanceN: c.stopDistanceN ?? defaults.stopDistanceN,
			entryWindowMs: c.entryWindowMs ?? DEFAULT_ENGINE_CONFIG.fills.entryWindowMs,
		};
		this.sizer = deps.sizer ?? null;
	}

	evaluate(position: Position, currentPrice: Decimal, atrN: Decimal): PyramidDecision {
		if (!isHolding(position.status)) {
			return hold(HoldReason.NotHolding, `status is ${position.status}`);
		}
		if (hasOpenEntry(position)) {
			return hold(HoldReason.OpenEntry, "an entry is still waiting for its fill");
		}
		const last = lastFilledEntry(position);
		if (last === null || last.fill === null) {
			return hold(HoldReason.NoFilledUnit, "no filled unit to pyramid from");
		}
		if (!atrN.isPositive()) {
			return hold(HoldReason.InvalidN, `N must be positive, got ${atrN.toString()}`);
		}

		const interval = atrN.mul(Decimal.from(this.config.intervalN));
		const trigger = favorableOffset(position.direction, last.fill.price, interval);
		if (!reachedFavorably(position.direction, currentPrice, trigger)) {
			return hold(
				HoldReason.InsufficientMove,
				`price ${currentPrice.toString()} has not reached ${trigger.toString()}`,
			);
		}
		// Only a move that would add a unit reports the ceiling.
		const maxUnits = this.unitCeiling(position);
		const reserved = reservedUnits(position);
		if (reserved >= maxUnits) {
			return hold(HoldReason.MaxUnits, `${reserved} of ${maxUnits} units in use`);
		}

		const quantity =
			this.sizer !== null ? this.sizer.unitQuantity(position.symbol, atrN) : last.fill.quantity;
		if (!quantity.isPositive()) {
			return hold(HoldReason.ZeroSize, "unit size rounds to zero");
		}

		const stopDistance = atrN.mul(Decimal.from(this.config.stopDistanceN));
		const candidate: PyramidCandidate = {
			positionId: position.id,
			unitIndex: position.entries.length,
			intendedPrice: currentPrice,
			quantity,
			nAtEntry: atrN,
			trigger,
			stopLoss: tightenStop(
				position.direction,
				position.stopLoss,
				adverseOffset(position.direction, currentPrice, stopDistance),
			),
		};
		return { type: "propose", candidate };
	}

	/** Units this position may hold: its own ceiling, capped by the configured one. */
	unitCeiling(position: Position): number {
		return Math.min(position.maxUnits, this.config.maxUnits);
	}

	/** Append the approved unit as a pending entry and apply its stop. */
	commit(
		position: Position,
		candidate: PyramidCandidate,
		nowMs: number,
	): Result<Position, InvalidTransitionError> {
		if (candidate.positionId !== position.id || candidate.unitIndex !== position.entries.length) {
			return err(
				new InvalidTransitionError("Pyramid candidate no longer matches its position", {
					positionId: position.id,
					candidateFor: candidate.positionId,
					unitIndex: candidate.unitIndex,
					entries: position.entries.length,
				}),
			);
		}

		const entry: Entry = {
			unitIndex: candidate.unitIndex,
			intendedPrice: candidate.intendedPrice,
			window: { startMs: nowMs, endMs: nowMs + this.config.entryWindowMs },
			quantity: candidate.quantity,
			nAtEntry: candidate.nAtEntry,
			fill: null,
			confidence: null,
			createdAtMs: nowMs,
		};
		return transition(position, PositionStatus.Pyramiding, nowMs, {
			entries: [...position.entries, entry],
			stopLoss: tightenStop(position.direction, position.stopLoss, candidate.stopLoss),
		});
	}
}

function hold(reason: HoldReason, detail: string): PyramidDecision {
	return { type: "hold", reason, detail };
}
