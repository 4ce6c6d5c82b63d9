import { isTerminal } from "../position/lifecycle.js";
import { nExposure, reservedUnits } from "../position/position.js";
import type { Position } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import { Direction } from "../shared/direction.js";
import type { Exposure, ProspectiveUnit } from "./types.js";

function bump(map: Map<string, number>, key: string, by: number): void {
	map.set(key, (map.get(key) ?? 0) + by);
}

/** Exposure of every non-terminal position. Pending and unmatched entries count as reserved. */
export function deriveExposure(positions: readonly Position[]): Exposure {
	const bySymbol = new Map<string, number>();
	const byGroup = new Map<string, number>();
	const byDirection = { [Direction.Long]: 0, [Direction.Short]: 0 };
	let totalN = Decimal.zero();

	for (const position of positions) {
		if (isTerminal(position.status)) continue;
		const units = reservedUnits(position);
		bump(bySymbol, position.symbol, units);
		bump(byGroup, position.group, units);
		byDirection[position.direction] += units;
		totalN = totalN.add(nExposure(position));
	}

	return { bySymbol, byGroup, byDirection, totalN };
}

/** A copy of `exposure` with one more unit in each of the unit's buckets. */
export function withUnit(exposure: Exposure, unit: ProspectiveUnit): Exposure {
	const bySymbol = new Map(exposure.bySymbol);
	const byGroup = new Map(exposure.byGroup);
	bump(bySymbol, unit.symbol, 1);
	bump(byGroup, unit.group, 1);
	return {
		bySymbol,
		byGroup,
		byDirection: {
			...exposure.byDirection,
			[unit.direction]: exposure.byDirection[unit.direction] + 1,
		},
		totalN: exposure.totalN.add(unit.nAtEntry),
	};
}
