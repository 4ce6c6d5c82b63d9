export { PyramidManager, type PyramidManagerConfig, type PyramidManagerDeps } from "./pyramid-manager.js";
export {
	HoldReason,
	type PyramidCandidate,
	type PyramidDecision,
	type UnitQuantitySource,
} from "./types.js";
