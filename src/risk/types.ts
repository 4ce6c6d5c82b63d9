/**
 * Portfolio risk type definitions.
 *
 * Limits are evaluated against a derived exposure, never the live snapshot.
 * A violation is a value: the rejected unit is skipped and the run goes on.
 */

import type { Decimal } from "../shared/decimal.js";
import type { Direction } from "../shared/direction.js";
import type { PositionId, Ticker } from "../shared/identifiers.js";

export const LimitKind = {
	PerSymbol: "per_symbol",
	PerGroup: "per_group",
	PerDirection: "per_direction",
	NExposure: "n_exposure",
} as const;

export type LimitKind = (typeof LimitKind)[keyof typeof LimitKind];

/** A unit someone wants to add: a pyramid candidate or the opening unit of a new position. */
export interface ProspectiveUnit {
	/** Null for the opening unit of a position that does not exist yet */
	readonly positionId: PositionId | null;
	readonly symbol: Ticker;
	readonly direction: Direction;
	readonly group: string;
	readonly nAtEntry: Decimal;
}

/** Units reserved per bucket (filled or awaiting a fill) and Σ N over them. */
export interface Exposure {
	readonly bySymbol: ReadonlyMap<string, number>;
	readonly byGroup: ReadonlyMap<string, number>;
	readonly byDirection: Readonly<Record<Direction, number>>;
	readonly totalN: Decimal;
}

export interface LimitViolation {
	readonly kind: LimitKind;
	/** Symbol, group, direction or "portfolio" */
	readonly scope: string;
	/** Usage before the unit */
	readonly current: number;
	/** Usage if the unit were added */
	readonly projected: number;
	readonly limit: number;
	readonly reason: string;
}

export interface RiskApproval {
	readonly unit: ProspectiveUnit;
	readonly projected: Exposure;
}

export type LimitVerdict =
	| { readonly type: "allow" }
	| { readonly type: "block"; readonly violation: LimitViolation };

/** One ceiling. Checks run in a fixed order; the first block wins. */
export interface LimitCheck {
	readonly kind: LimitKind;
	readonly limit: number;
	check(current: Exposure, projected: Exposure, unit: ProspectiveUnit): LimitVerdict;
	/** Every bucket this ceiling applies to, for reporting */
	usage(exposure: Exposure): readonly { readonly scope: string; readonly used: number }[];
}

export interface UtilisationLine {
	readonly kind: LimitKind;
	readonly scope: string;
	readonly used: number;
	readonly limit: number;
	/** used / limit */
	readonly ratio: number;
}

export interface ExposureReport {
	readonly exposure: Exposure;
	readonly lines: readonly UtilisationLine[];
	/** Lines at or above the warning ratio */
	readonly nearLimit: readonly UtilisationLine[];
}

export function allow(): LimitVerdict {
	return { type: "allow" };
}

export function block(violation: LimitViolation): LimitVerdict {
	return { type: "block", violation };
}
