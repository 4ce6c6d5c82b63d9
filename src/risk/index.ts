/**
 * Portfolio risk: nested unit ceilings and exposure reporting.
 *
 * Core exports:
 * - {@link RiskManager}: Validates prospective units, summarizes utilisation
 * - {@link deriveExposure}: Pure exposure view of a set of positions
 * - Ceilings: PerSymbolLimit, PerGroupLimit, PerDirectionLimit, NExposureLimit
 *
 * @module
 */
export { deriveExposure, withUnit } from "./exposure.js";
export { NExposureLimit, PerDirectionLimit, PerGroupLimit, PerSymbolLimit } from "./limits.js";
export { RiskManager, type RiskManagerConfig } from "./risk-manager.js";
export {
	LimitKind,
	allow,
	block,
	type Exposure,
	type ExposureReport,
	type LimitCheck,
	type LimitVerdict,
	type LimitViolation,
	type ProspectiveUnit,
	type RiskApproval,
	type UtilisationLine,
} from "./types.js";
