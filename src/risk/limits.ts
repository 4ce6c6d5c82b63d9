/**
 * The four nested portfolio ceilings, checked in this order:
 * per symbol → per correlation group → per direction → aggregate N.
 */

import { Decimal } from "../shared/decimal.js";
import { Direction } from "../shared/direction.js";
import type { Exposure, LimitCheck, LimitVerdict, ProspectiveUnit } from "./types.js";
import { LimitKind, allow, block } from "./types.js";

function entries(map: ReadonlyMap<string, number>): { scope: string; used: number }[] {
	return [...map.entries()]
		.filter(([, used]) => used > 0)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([scope, used]) => ({ scope, used }));
}

/** Max units held in one symbol, across systems and directions. */
export class PerSymbolLimit implements LimitCheck {
	readonly kind = LimitKind.PerSymbol;
	readonly limit: number;

	private constructor(limit: number) {
		this.limit = limit;
	}

	static create(limit: number): PerSymbolLimit {
		return new PerSymbolLimit(limit);
	}

	check(current: Exposure, projected: Exposure, unit: ProspectiveUnit): LimitVerdict {
		const after = projected.bySymbol.get(unit.symbol) ?? 0;
		if (after <= this.limit) return allow();
		const before = current.bySymbol.get(unit.symbol) ?? 0;
		return block({
			kind: this.kind,
			scope: unit.symbol,
			current: before,
			projected: after,
			limit: this.limit,
			reason: `${unit.symbol} would hold ${after} units (limit ${this.limit})`,
		});
	}

	usage(exposure: Exposure) {
		return entries(exposure.bySymbol);
	}
}

/** Max units across one correlation group. */
export class PerGroupLimit implements LimitCheck {
	readonly kind = LimitKind.PerGroup;
	readonly limit: number;

	private constructor(limit: number) {
		this.limit = limit;
	}

	static create(limit: number): PerGroupLimit {
		return new PerGroupLimit(limit);
	}

	check(current: Exposure, projected: Exposure, unit: ProspectiveUnit): LimitVerdict {
		const after = projected.byGroup.get(unit.group) ?? 0;
		if (after <= this.limit) return allow();
		return block({
			kind: this.kind,
			scope: unit.group,
			current: current.byGroup.get(unit.group) ?? 0,
			projected: after,
			limit: this.limit,
			reason: `group ${unit.group} would hold ${after} units (limit ${this.limit})`,
		});
	}

	usage(exposure: Exposure) {
		return entries(exposure.byGroup);
	}
}

/** Max units across all positions in one direction. */
export class PerDirectionLimit implements LimitCheck {
	readonly kind = LimitKind.PerDirection;
	readonly limit: number;

	private constructor(limit: number) {
		this.limit = limit;
	}

	static create(limit: number): PerDirectionLimit {
		return new PerDirectionLimit(limit);
	}

	check(current: Exposure, projected: Exposure, unit: ProspectiveUnit): LimitVerdict {
		const after = projected.byDirection[unit.direction];
		if (after <= this.limit) return allow();
		return block({
			kind: this.kind,
			scope: unit.direction,
			current: current.byDirection[unit.direction],
			projected: after,
			limit: this.limit,
			reason: `${unit.direction} side would hold ${after} units (limit ${this.limit})`,
		});
	}

	usage(exposure: Exposure) {
		return [Direction.Long, Direction.Short].map((scope) => ({
			scope,
			used: exposure.byDirection[scope],
		}));
	}
}

/** Max Σ N at entry over every reserved unit in the portfolio. */
export class NExposureLimit implements LimitCheck {
	readonly kind = LimitKind.NExposure;
	readonly limit: number;

	private constructor(limit: number) {
		this.limit = limit;
	}

	static create(limit: number): NExposureLimit {
		return new NExposureLimit(limit);
	}

	check(current: Exposure, projected: Exposure): LimitVerdict {
		if (projected.totalN.lte(Decimal.from(this.limit))) return allow();
		return block({
			kind: this.kind,
			scope: "portfolio",
			current: current.totalN.toNumber(),
			projected: projected.totalN.toNumber(),
			limit: this.limit,
			reason: `N exposure would reach ${projected.totalN.toString()} (limit ${this.limit})`,
		});
	}

	usage(exposure: Exposure) {
		return [{ scope: "portfolio", used: exposure.totalN.toNumber() }];
	}
}
