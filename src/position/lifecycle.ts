/**
 * Position lifecycle: validated status transitions.
 *
 *   pending_entry ──fill──► open ──pyramid──► pyramiding ⟲
 *        │                    │                   │
 *        └─► discarded        └──────exit─────────┴──► closing ──fill──► closed
 *
 * Every status change in the engine goes through `transition()`.
 */

import { InvalidTransitionError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { type Position, PositionStatus } from "./types.js";

const ALLOWED: Readonly<Record<PositionStatus, readonly PositionStatus[]>> = {
	[PositionStatus.PendingEntry]: [PositionStatus.Open, PositionStatus.Discarded],
	[PositionStatus.Open]: [PositionStatus.Pyramiding, PositionStatus.Closing],
	[PositionStatus.Pyramiding]: [PositionStatus.Pyramiding, PositionStatus.Closing],
	[PositionStatus.Closing]: [PositionStatus.Closed],
	[PositionStatus.Closed]: [],
	[PositionStatus.Discarded]: [],
};

export function canTransition(from: PositionStatus, to: PositionStatus): boolean {
	return ALLOWED[from].includes(to);
}

export function isTerminal(status: PositionStatus): boolean {
	return status === PositionStatus.Closed || status === PositionStatus.Discarded;
}

/** Statuses in which the position holds filled units and may add more. */
export function isHolding(status: PositionStatus): boolean {
	return status === PositionStatus.Open || status === PositionStatus.Pyramiding;
}

/**
 * Move a position to `to`, stamping `updatedAtMs` (and `closedAtMs` on terminal
 * statuses). Field changes that accompany the move are applied by the caller
 * through `patch`, so the status check and the write happen together.
 */
export function transition(
	position: Position,
	to: PositionStatus,
	nowMs: number,
	patch: Partial<Omit<Position, "id" | "status" | "updatedAtMs">> = {},
): Result<Position, InvalidTransitionError> {
	if (!canTransition(position.status, to)) {
		return err(
			new InvalidTransitionError(`Cannot move position from ${position.status} to ${to}`, {
				positionId: position.id,
				from: position.status,
				to,
			}),
		);
	}
	return ok({
		...position,
		...patch,
		status: to,
		updatedAtMs: nowMs,
		closedAtMs: isTerminal(to) ? nowMs : position.closedAtMs,
	});
}
