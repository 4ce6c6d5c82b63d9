/**
 * Run orchestration: the scheduled check, signal operations and the guarded
 * session both run inside.
 *
 * @module
 */
export { SymbolBackoff, backoffDelayMs, type BackoffTable } from "./backoff.js";
export {
	CheckOrchestrator,
	RunStatus,
	type CheckOrchestratorDeps,
	type PositionReport,
	type RunReport,
	type SymbolReport,
} from "./check-orchestrator.js";
export {
	GuardedSession,
	type GuardedSessionDeps,
	type SessionError,
	type SessionOutcome,
	type SessionWork,
} from "./session.js";
export {
	beginExit,
	registerEntry,
	requestExit,
	resolveEntry,
	withPosition,
	type EntrySignal,
	type ResolveAction,
	type SignalContext,
	type SignalOutcome,
	type SignalRejection,
} from "./signals.js";
