import type { RiskLimitConfig } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { type Result, err, ok } from "../shared/result.js";
import type { PortfolioSnapshot } from "../position/types.js";
import { deriveExposure, withUnit } from "./exposure.js";
import { NExposureLimit, PerDirectionLimit, PerGroupLimit, PerSymbolLimit } from "./limits.js";
import type {
	ExposureReport,
	LimitCheck,
	LimitKind,
	LimitViolation,
	ProspectiveUnit,
	RiskApproval,
	UtilisationLine,
} from "./types.js";

export interface RiskManagerConfig {
	readonly limits: RiskLimitConfig;
	/** Symbol (upper case) → correlation group */
	readonly correlationGroups: Readonly<Record<string, string>>;
	readonly defaultGroup: string;
}

/**
 * Single authority consulted before any unit-adding mutation.
 *
 * Every call re-derives exposure from the snapshot it is given, so a caller
 * that keeps an evolving working snapshot always validates against the
 * latest state.
 *
 * @example
 * ```ts
 * const risk = new RiskManager({ limits: config.risk, correlationGroups, defaultGroup });
 * const verdict = risk.validate(snapshot, unit);
 * if (!verdict.ok) notify(verdict.error.reason);
 * ```
 */
export class RiskManager {
	readonly config: RiskManagerConfig;
	private readonly checks: readonly LimitCheck[];

	constructor(config: Partial<RiskManagerConfig> = {}) {
		this.config = {
			limits: config.limits ?? DEFAULT_ENGINE_CONFIG.risk,
			correlationGroups: config.correlationGroups ?? DEFAULT_ENGINE_CONFIG.correlationGroups,
			defaultGroup: config.defaultGroup ?? DEFAULT_ENGINE_CONFIG.defaultGroup,
		};
		const limits = this.config.limits;
		this.checks = [
			PerSymbolLimit.create(limits.maxUnitsPerSymbol),
			PerGroupLimit.create(limits.maxUnitsPerGroup),
			PerDirectionLimit.create(limits.maxUnitsPerDirection),
			NExposureLimit.create(limits.maxTotalNExposure),
		];
	}

	/** Correlation group of a symbol; unlisted symbols fall in the default group. */
	groupOf(symbol: string): string {
		return this.config.correlationGroups[symbol.toUpperCase()] ?? this.config.defaultGroup;
	}

	/** Ceilings in evaluation order. */
	limitKinds(): readonly LimitKind[] {
		return this.checks.map((c) => c.kind);
	}

	/** The first ceiling the unit would break, checked against exposure after adding it. */
	validate(
		snapshot: PortfolioSnapshot,
		unit: ProspectiveUnit,
	): Result<RiskApproval, LimitViolation> {
		const current = deriveExposure(snapshot.positions);
		const projected = withUnit(current, unit);
		for (const check of this.checks) {
			const verdict = check.check(current, projected, unit);
			if (verdict.type === "block") return err(verdict.violation);
		}
		return ok({ unit, projected });
	}

	/** Utilisation of every ceiling, with the lines at or past the warning ratio. */
	summarize(snapshot: PortfolioSnapshot): ExposureReport {
		const exposure = deriveExposure(snapshot.positions);
		const lines: UtilisationLine[] = this.checks.flatMap((check) =>
			check.usage(exposure).map(({ scope, used }) => ({
				kind: check.kind,
				scope,
				used,
				limit: check.limit,
				ratio: check.limit > 0 ? used / check.limit : 1,
			})),
		);
		const warnRatio = this.config.limits.warnRatio;
		return { exposure, lines, nearLimit: lines.filter((l) => l.ratio >= warnRatio) };
	}
}
