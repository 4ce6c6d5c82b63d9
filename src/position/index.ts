export {
	ExitReason,
	MatchConfidence,
	PositionStatus,
	SNAPSHOT_VERSION,
	emptySnapshot,
	type BackoffState,
	type Entry,
	type ExitOrder,
	type MatchedFill,
	type PortfolioSnapshot,
	type Position,
	type TimeWindow,
	type TurtleSystem,
} from "./types.js";
export { canTransition, isHolding, isTerminal, transition } from "./lifecycle.js";
export {
	averageEntryPrice,
	awaitingEntry,
	entryState,
	filledEntries,
	filledQuantity,
	hasOpenEntry,
	lastFilledEntry,
	markToMarket,
	nExposure,
	pnlAt,
	replaceEntry,
	reservedUnits,
	unitCount,
	type EntryState,
} from "./position.js";
