/**
 * CheckOrchestrator: one scheduled check of the whole portfolio.
 *
 * Inside a GuardedSession, symbol by symbol:
 *   backoff check → price, N and fills → settle entries and exits →
 *   mark to market → stop check → pyramid proposal → risk validation → commit
 *
 * Positions are processed one at a time against a single working snapshot,
 * so every risk check sees the units approved earlier in the same run. A
 * failure scoped to a symbol or a position skips it with its pre-run state
 * and is reported; only a corrupt snapshot or a guard failure ends the run.
 */

import type { BrokerFillQuery, MarketDataProvider } from "../collaborators/types.js";
import { callWithTimeout } from "../collaborators/timeout.js";
import { FillMatcher } from "../fills/fill-matcher.js";
import type { FillRecord, MatchTarget } from "../fills/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { LockBusy, RunLock, StaleLockReclaimed } from "../lock/types.js";
import type { DispatchSummary, NotificationOutbox } from "../notify/outbox.js";
import { LoggerNotifier } from "../notify/notifiers.js";
import type { Notifier } from "../notify/types.js";
import { NotificationKind } from "../notify/types.js";
import type { PositionStore } from "../persistence/types.js";
import { isHolding, isTerminal, transition } from "../position/lifecycle.js";
import {
	awaitingEntry,
	markToMarket,
	pnlAt,
	replaceEntry,
	reservedUnits,
	unitCount,
} from "../position/position.js";
import type { Entry, ExitOrder, PortfolioSnapshot, Position, TimeWindow } from "../position/types.js";
import { ExitReason, MatchConfidence, PositionStatus } from "../position/types.js";
import { PyramidManager } from "../pyramid/pyramid-manager.js";
import type { UnitQuantitySource } from "../pyramid/types.js";
import { HoldReason } from "../pyramid/types.js";
import { RiskManager } from "../risk/risk-manager.js";
import type { LimitViolation } from "../risk/types.js";
import { LimitKind } from "../risk/types.js";
import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { adverseOffset, entrySide, exitSide, stopBreached } from "../shared/direction.js";
import {
	AmbiguousMatchError,
	type CollaboratorUnavailableError,
	type InvalidTransitionError,
} from "../shared/errors.js";
import type { PositionId, Ticker } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, toIso } from "../shared/time.js";
import { type BackoffTable, SymbolBackoff } from "./backoff.js";
import { GuardedSession, type SessionError } from "./session.js";
import { beginExit, withPosition } from "./signals.js";

// ── Report ───────────────────────────────────────────────────────────

export const RunStatus = {
	Completed: "completed",
	/** Another run held the guard; nothing was read or written */
	Busy: "busy",
	/** Every symbol's data fetch failed; only the backoff table was saved */
	CollaboratorsUnavailable: "collaborators_unavailable",
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export interface SymbolReport {
	readonly symbol: string;
	readonly status: "processed" | "backoff" | "unavailable";
	readonly detail: string | null;
}

export interface PositionReport {
	readonly positionId: PositionId;
	readonly symbol: string;
	readonly from: Position["status"];
	readonly to: Position["status"];
	readonly actions: readonly string[];
	/** Why the position kept its pre-run state, if it did */
	readonly skipped: string | null;
}

export interface RunReport {
	readonly status: RunStatus;
	readonly startedAtMs: number;
	readonly finishedAtMs: number;
	readonly saved: boolean;
	readonly symbols: readonly SymbolReport[];
	readonly positions: readonly PositionReport[];
	readonly violations: readonly LimitViolation[];
	readonly archived: readonly PositionId[];
	readonly reclaimed: StaleLockReclaimed | null;
	readonly busy: LockBusy | null;
	readonly notifications: DispatchSummary;
}

// ── Dependencies ─────────────────────────────────────────────────────

export interface CheckOrchestratorDeps {
	readonly config: EngineConfig;
	readonly store: PositionStore;
	readonly lock: RunLock;
	readonly marketData: MarketDataProvider;
	readonly fills: BrokerFillQuery;
	/** Defaults to a LoggerNotifier on `logger` */
	readonly notifier?: Notifier;
	/** Sizes pyramid units; without it a unit repeats the newest filled quantity */
	readonly sizer?: UnitQuantitySource;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly ownerId?: string;
}

interface MarketView {
	readonly price: Decimal;
	readonly n: Decimal;
	readonly fills: readonly FillRecord[];
}

interface Note {
	readonly kind: NotificationKind;
	readonly title: string;
	readonly payload: Record<string, unknown>;
}

type StepError = AmbiguousMatchError | InvalidTransitionError;

function settledRefs(positions: readonly Position[]): string[] {
	return positions.flatMap((p) => [
		...p.entries.flatMap((e) => (e.fill !== null ? [e.fill.orderRef] : [])),
		...(p.exit !== null && p.exit.fill !== null ? [p.exit.fill.orderRef] : []),
	]);
}

/** Mutable bookkeeping for one run. */
class WorkingState {
	positions: Position[];
	backoff: BackoffTable;
	readonly consumed: Set<string>;
	readonly symbols: SymbolReport[] = [];
	readonly reports: PositionReport[] = [];
	readonly violations: LimitViolation[] = [];
	private readonly base: PortfolioSnapshot;

	/** `archived` fills stay consumed after their positions leave the snapshot. */
	constructor(base: PortfolioSnapshot, archived: readonly Position[]) {
		this.base = base;
		this.positions = [...base.positions];
		this.backoff = base.backoff;
		this.consumed = new Set([...settledRefs(archived), ...settledRefs(base.positions)]);
	}

	replace(position: Position): void {
		this.positions = this.positions.map((p) => (p.id === position.id ? position : p));
	}

	snapshot(): PortfolioSnapshot {
		return { ...this.base, positions: this.positions, backoff: this.backoff };
	}
}

// ── Orchestrator ─────────────────────────────────────────────────────

export class CheckOrchestrator {
	private readonly config: EngineConfig;
	private readonly store: PositionStore;
	private readonly marketData: MarketDataProvider;
	private readonly brokerFills: BrokerFillQuery;
	private readonly session: GuardedSession;
	private readonly matcher: FillMatcher;
	private readonly pyramid: PyramidManager;
	private readonly risk: RiskManager;
	private readonly backoff: SymbolBackoff;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly ownerId: string;

	constructor(deps: CheckOrchestratorDeps) {
		const { config } = deps;
		this.config = config;
		this.store = deps.store;
		this.marketData = deps.marketData;
		this.brokerFills = deps.fills;
		this.clock = deps.clock ?? SystemClock;
		const logger = deps.logger ?? silentLogger();
		this.logger = logger.child({ component: "orchestrator" });
		this.ownerId = deps.ownerId ?? `check:${process.pid}`;
		this.session = new GuardedSession({
			store: deps.store,
			lock: deps.lock,
			notifier: deps.notifier ?? new LoggerNotifier(logger),
			lockStaleMs: config.lockStaleMs,
			clock: this.clock,
			logger,
		});
		this.matcher = new FillMatcher(config.fills);
		this.pyramid = new PyramidManager({
			config: { ...config.pyramid, entryWindowMs: config.fills.entryWindowMs },
			...(deps.sizer !== undefined && { sizer: deps.sizer }),
		});
		this.risk = new RiskManager({
			limits: config.risk,
			correlationGroups: config.correlationGroups,
			defaultGroup: config.defaultGroup,
		});
		this.backoff = new SymbolBackoff(config.backoff);
	}

	async run(): Promise<Result<RunReport, SessionError>> {
		const startedAtMs = this.clock.now();
		this.logger.info({ owner: this.ownerId }, "check started");

		const outcome = await this.session.run(this.ownerId, (snapshot, outbox) =>
			this.checkPortfolio(snapshot, outbox),
		);
		if (!outcome.ok) return outcome;

		const finishedAtMs = this.clock.now();
		const session = outcome.value;
		if (session.type === "busy") {
			return ok({
				status: RunStatus.Busy,
				startedAtMs,
				finishedAtMs,
				saved: false,
				symbols: [],
				positions: [],
				violations: [],
				archived: [],
				reclaimed: null,
				busy: session.busy,
				notifications: { delivered: 0, failed: 0 },
			});
		}

		const report: RunReport = {
			...session.value,
			startedAtMs,
			finishedAtMs,
			saved: session.saved,
			archived: session.archived,
			reclaimed: session.reclaimed,
			busy: null,
			notifications: session.notifications,
		};
		this.logger.info(
			{
				status: report.status,
				symbols: report.symbols.length,
				positions: report.positions.length,
				violations: report.violations.length,
				archived: report.archived.length,
				durationMs: finishedAtMs - startedAtMs,
			},
			"check finished",
		);
		return ok(report);
	}

	private async checkPortfolio(
		snapshot: PortfolioSnapshot,
		outbox: NotificationOutbox,
	): Promise<{
		snapshot: PortfolioSnapshot | null;
		value: Pick<RunReport, "status" | "symbols" | "positions" | "violations">;
	}> {
		const archive = await this.store.readArchive();
		if (!archive.ok) {
			// Without the archive, fills of closed positions could settle new ones.
			throw archive.error;
		}
		const state = new WorkingState(snapshot, archive.value.positions);
		const nowMs = this.clock.now();
		let attempted = 0;
		let unavailable = 0;

		for (const symbol of symbolsOf(snapshot.positions)) {
			const log = this.logger.child({ symbol });
			const positions = state.positions.filter((p) => p.symbol === symbol);

			const waiting = this.backoff.active(state.backoff, symbol, nowMs);
			if (waiting !== null) {
				const detail = `backing off until ${toIso(waiting.retryAfterMs)} after ${waiting.failures} failure(s)`;
				log.info({ retryAfter: toIso(waiting.retryAfterMs) }, "symbol skipped: backoff");
				outbox.add(NotificationKind.Error, "symbol skipped: collaborator backoff", {
					symbol,
					payload: { retryAfter: toIso(waiting.retryAfterMs), lastError: waiting.lastError },
				});
				state.symbols.push({ symbol, status: "backoff", detail });
				for (const p of positions) state.reports.push(skippedReport(p, detail));
				continue;
			}

			attempted++;
			const market = await this.fetchMarket(symbol, this.fillsSince(positions, nowMs));
			if (!market.ok) {
				unavailable++;
				const detail = market.error.message;
				state.backoff = this.backoff.recordFailure(state.backoff, symbol, detail, nowMs);
				log.warn({ error: market.error }, "symbol skipped: collaborator unavailable");
				outbox.add(NotificationKind.Error, "symbol skipped: collaborator unavailable", {
					symbol,
					payload: { collaborator: market.error.collaborator, error: detail },
				});
				state.symbols.push({ symbol, status: "unavailable", detail });
				for (const p of positions) state.reports.push(skippedReport(p, detail));
				continue;
			}

			state.backoff = this.backoff.recordSuccess(state.backoff, symbol);
			state.symbols.push({ symbol, status: "processed", detail: null });
			for (const position of positions) {
				this.processPosition(position, market.value, state, outbox, nowMs);
			}
		}

		if (attempted > 0 && unavailable === attempted) {
			this.logger.error(
				{ symbols: attempted },
				"every collaborator call failed; positions left as they were",
			);
			outbox.add(NotificationKind.Error, "check aborted: all collaborators unavailable", {
				payload: { symbols: attempted },
			});
			// No symbol was processed, so only the backoff table differs from the load.
			return {
				snapshot: { ...snapshot, backoff: state.backoff },
				value: {
					status: RunStatus.CollaboratorsUnavailable,
					symbols: state.symbols,
					positions: state.reports,
					violations: state.violations,
				},
			};
		}

		const working = state.snapshot();
		for (const line of this.risk.summarize(working).nearLimit) {
			outbox.add(NotificationKind.Risk, "exposure near limit", {
				payload: { kind: line.kind, scope: line.scope, used: line.used, limit: line.limit },
			});
		}

		return {
			snapshot: working,
			value: {
				status: RunStatus.Completed,
				symbols: state.symbols,
				positions: state.reports,
				violations: state.violations,
			},
		};
	}

	/** Fills are requested back to the oldest open order, and never less than the lookback. */
	private fillsSince(positions: readonly Position[], nowMs: number): number {
		const tolerance = this.config.fills.timeToleranceMs;
		let since = nowMs - this.config.fills.lookbackMs;
		for (const p of positions) {
			const waiting = awaitingEntry(p);
			if (waiting !== null) since = Math.min(since, waiting.createdAtMs - tolerance);
			if (p.exit !== null && p.exit.fill === null) {
				since = Math.min(since, p.exit.requestedAtMs - tolerance);
			}
		}
		return since;
	}

	private async fetchMarket(
		symbol: Ticker,
		sinceMs: number,
	): Promise<Result<MarketView, CollaboratorUnavailableError>> {
		const timeoutMs = this.config.collaboratorTimeoutMs;
		const price = await callWithTimeout("market-data", `price for ${symbol}`, timeoutMs, () =>
			this.marketData.getLatestPrice(symbol),
		);
		if (!price.ok) return price;
		const n = await callWithTimeout("market-data", `N for ${symbol}`, timeoutMs, () =>
			this.marketData.getAtrN(symbol),
		);
		if (!n.ok) return n;
		const fills = await callWithTimeout("broker-fills", `fills for ${symbol}`, timeoutMs, () =>
			this.brokerFills.getRecentFills(symbol, sinceMs),
		);
		if (!fills.ok) return fills;
		return ok({ price: price.value, n: n.value, fills: fills.value });
	}

	private processPosition(
		original: Position,
		market: MarketView,
		state: WorkingState,
		outbox: NotificationOutbox,
		nowMs: number,
	): void {
		const log = this.logger.child({ symbol: original.symbol, positionId: original.id });
		const notes: Note[] = [];
		const actions: string[] = [];
		const violations: LimitViolation[] = [];
		const consumed = new Set(state.consumed);

		let result: Result<Position, StepError>;
		try {
			result = this.step(original, market, state, { notes, actions, violations, consumed }, nowMs);
		} catch (e: unknown) {
			const message = e instanceof Error ? e.message : String(e);
			log.error({ error: e }, "position skipped: unexpected failure");
			outbox.add(NotificationKind.Error, "position skipped: unexpected failure", {
				symbol: original.symbol,
				positionId: original.id,
				payload: { error: message },
			});
			state.reports.push(skippedReport(original, message));
			return;
		}

		if (!result.ok) {
			log.warn({ error: result.error }, "position skipped");
			outbox.add(NotificationKind.Error, "position skipped: needs manual review", {
				symbol: original.symbol,
				positionId: original.id,
				payload: result.error.toJSON(),
			});
			state.reports.push(skippedReport(original, result.error.message));
			return;
		}

		const next = result.value;
		state.replace(next);
		for (const ref of consumed) state.consumed.add(ref);
		state.violations.push(...violations);
		for (const note of notes) {
			outbox.add(note.kind, note.title, {
				symbol: next.symbol,
				positionId: next.id,
				payload: note.payload,
			});
		}
		if (next.status !== original.status) {
			log.info({ from: original.status, to: next.status }, "position status changed");
		}
		state.reports.push({
			positionId: next.id,
			symbol: next.symbol,
			from: original.status,
			to: next.status,
			actions,
			skipped: null,
		});
	}

	private step(
		original: Position,
		market: MarketView,
		state: WorkingState,
		out: {
			notes: Note[];
			actions: string[];
			violations: LimitViolation[];
			consumed: Set<string>;
		},
		nowMs: number,
	): Result<Position, StepError> {
		let position = original;

		const waiting = awaitingEntry(position);
		if (waiting !== null) {
			const settled = this.settleEntry(position, waiting, market.fills, out, nowMs);
			if (!settled.ok) return settled;
			position = settled.value;
		}

		const exit = position.exit;
		if (position.status === PositionStatus.Closing && exit !== null && exit.fill === null) {
			const settled = this.settleExit(position, exit, market.fills, out, nowMs);
			if (!settled.ok) return settled;
			position = settled.value;
		}

		if (isTerminal(position.status)) return ok(position);
		if (unitCount(position) > 0) position = markToMarket(position, market.price, nowMs);
		if (!isHolding(position.status)) return ok(position);

		if (stopBreached(position.direction, market.price, position.stopLoss)) {
			const dropped = position.entries.filter((e) => e.fill === null).length;
			const closing = beginExit(
				position,
				ExitReason.StopLoss,
				market.price,
				nowMs,
				this.config.fills.entryWindowMs,
			);
			if (!closing.ok) return closing;
			out.actions.push(`stop ${position.stopLoss.toString()} hit at ${market.price.toString()}`);
			out.notes.push({
				kind: NotificationKind.Trade,
				title: "stop hit: exit requested",
				payload: {
					stopLoss: position.stopLoss.toString(),
					price: market.price.toString(),
					droppedPendingUnits: dropped,
				},
			});
			return ok(closing.value);
		}

		return this.tryPyramid(position, market, state, out, nowMs);
	}

	private settleEntry(
		position: Position,
		entry: Entry,
		fills: readonly FillRecord[],
		out: { notes: Note[]; actions: string[]; consumed: Set<string> },
		nowMs: number,
	): Result<Position, StepError> {
		const target: MatchTarget = {
			symbol: position.symbol,
			side: entrySide(position.direction),
			intendedPrice: entry.intendedPrice,
			window: entry.window,
			notBeforeMs: entry.createdAtMs - this.config.fills.timeToleranceMs,
		};
		const match = this.matcher.match(target, fills, out.consumed);

		switch (match.type) {
			case "matched": {
				const { fill } = match;
				out.consumed.add(fill.orderRef);
				const filled = replaceEntry(position, {
					...entry,
					fill: {
						price: fill.price,
						quantity: fill.quantity,
						executedAtMs: fill.executedAtMs,
						orderRef: fill.orderRef,
					},
					confidence: match.confidence,
				});
				const payload = {
					unitIndex: entry.unitIndex,
					price: fill.price.toString(),
					quantity: fill.quantity.toString(),
					orderRef: fill.orderRef,
					confidence: match.confidence,
				};
				out.actions.push(`unit ${entry.unitIndex} filled at ${fill.price.toString()}`);

				if (position.status !== PositionStatus.PendingEntry) {
					out.notes.push({ kind: NotificationKind.Trade, title: "pyramid unit filled", payload });
					return ok({ ...filled, updatedAtMs: nowMs });
				}
				const stopDistance = entry.nAtEntry.mul(Decimal.from(this.config.pyramid.stopDistanceN));
				const stopLoss = adverseOffset(position.direction, fill.price, stopDistance);
				out.notes.push({
					kind: NotificationKind.Trade,
					title: "position opened",
					payload: { ...payload, stopLoss: stopLoss.toString() },
				});
				return transition(filled, PositionStatus.Open, nowMs, {
					entryPrice: fill.price,
					stopLoss,
					openedAtMs: fill.executedAtMs ?? nowMs,
				});
			}
			case "ambiguous":
				return err(
					new AmbiguousMatchError(
						`${match.candidates.length} fills match unit ${entry.unitIndex} of ${position.id} equally well`,
						match.candidates.map((c) => c.orderRef),
						{ positionId: position.id, unitIndex: entry.unitIndex },
					),
				);
			case "no_candidate": {
				if (!this.windowElapsed(entry.window, nowMs)) return ok(position);
				const unmatched: Entry = { ...entry, confidence: MatchConfidence.Unmatched };
				const payload = { unitIndex: entry.unitIndex, reason: match.reason };
				if (position.status === PositionStatus.PendingEntry) {
					out.actions.push("opening order expired unfilled");
					out.notes.push({
						kind: NotificationKind.Risk,
						title: "entry discarded: opening order never filled",
						payload,
					});
					return transition(position, PositionStatus.Discarded, nowMs, { entries: [unmatched] });
				}
				out.actions.push(`unit ${entry.unitIndex} unmatched`);
				out.notes.push({
					kind: NotificationKind.Risk,
					title: "pyramid unit unmatched: resolve manually",
					payload,
				});
				return ok({ ...replaceEntry(position, unmatched), updatedAtMs: nowMs });
			}
		}
	}

	private settleExit(
		position: Position,
		exit: ExitOrder,
		fills: readonly FillRecord[],
		out: { notes: Note[]; actions: string[]; consumed: Set<string> },
		nowMs: number,
	): Result<Position, StepError> {
		const target: MatchTarget = {
			symbol: position.symbol,
			side: exitSide(position.direction),
			intendedPrice: exit.intendedPrice,
			window: exit.window,
			notBeforeMs: exit.requestedAtMs - this.config.fills.timeToleranceMs,
		};
		const match = this.matcher.match(target, fills, out.consumed);

		switch (match.type) {
			case "matched": {
				const { fill } = match;
				out.consumed.add(fill.orderRef);
				const realizedPnl = pnlAt(position, fill.price);
				out.actions.push(`closed at ${fill.price.toString()}`);
				out.notes.push({
					kind: NotificationKind.Trade,
					title: "position closed",
					payload: {
						reason: exit.reason,
						price: fill.price.toString(),
						orderRef: fill.orderRef,
						realizedPnl: realizedPnl.toString(),
					},
				});
				return transition(position, PositionStatus.Closed, nowMs, {
					exit: {
						...exit,
						fill: {
							price: fill.price,
							quantity: fill.quantity,
							executedAtMs: fill.executedAtMs,
							orderRef: fill.orderRef,
						},
						confidence: match.confidence,
					},
					realizedPnl,
					unrealizedPnl: Decimal.zero(),
					lastPrice: fill.price,
				});
			}
			case "ambiguous":
				return err(
					new AmbiguousMatchError(
						`${match.candidates.length} fills match the exit of ${position.id} equally well`,
						match.candidates.map((c) => c.orderRef),
						{ positionId: position.id },
					),
				);
			case "no_candidate":
				if (this.windowElapsed(exit.window, nowMs)) {
					out.notes.push({
						kind: NotificationKind.Error,
						title: "exit order still unfilled after its window",
						payload: { reason: exit.reason, requestedAt: toIso(exit.requestedAtMs) },
					});
				}
				return ok(position);
		}
	}

	private tryPyramid(
		position: Position,
		market: MarketView,
		state: WorkingState,
		out: { notes: Note[]; actions: string[]; violations: LimitViolation[] },
		nowMs: number,
	): Result<Position, StepError> {
		const decision = this.pyramid.evaluate(position, market.price, market.n);
		if (decision.type === "hold" && decision.reason === HoldReason.MaxUnits) {
			const held = reservedUnits(position);
			const limit = this.pyramid.unitCeiling(position);
			this.rejectUnit(
				position.entries.length,
				{
					kind: LimitKind.PerSymbol,
					scope: position.symbol,
					current: held,
					projected: held + 1,
					limit,
					reason: `${position.id} already holds ${held} of ${limit} units`,
				},
				out,
			);
			return ok(position);
		}
		if (decision.type === "hold") {
			this.logger.debug(
				{ positionId: position.id, reason: decision.reason, detail: decision.detail },
				"no pyramid unit",
			);
			return ok(position);
		}

		const { candidate } = decision;
		const verdict = this.risk.validate(withPosition(state.snapshot(), position), {
			positionId: position.id,
			symbol: position.symbol,
			direction: position.direction,
			group: position.group,
			nAtEntry: candidate.nAtEntry,
		});
		if (!verdict.ok) {
			this.rejectUnit(candidate.unitIndex, verdict.error, out);
			return ok(position);
		}

		const committed = this.pyramid.commit(position, candidate, nowMs);
		if (!committed.ok) return committed;
		out.actions.push(`unit ${candidate.unitIndex} ordered at ${candidate.intendedPrice.toString()}`);
		out.notes.push({
			kind: NotificationKind.Signal,
			title: "pyramid unit ready to place",
			payload: {
				unitIndex: candidate.unitIndex,
				price: candidate.intendedPrice.toString(),
				quantity: candidate.quantity.toString(),
				nAtEntry: candidate.nAtEntry.toString(),
				stopLoss: committed.value.stopLoss.toString(),
			},
		});
		return committed;
	}

	private rejectUnit(
		unitIndex: number,
		violation: LimitViolation,
		out: { notes: Note[]; actions: string[]; violations: LimitViolation[] },
	): void {
		out.violations.push(violation);
		out.actions.push(`unit ${unitIndex} rejected: ${violation.reason}`);
		out.notes.push({
			kind: NotificationKind.Risk,
			title: "pyramid unit rejected by risk limits",
			payload: { unitIndex, ...violation },
		});
	}

	private windowElapsed(window: TimeWindow | null, nowMs: number): boolean {
		return window !== null && nowMs > window.endMs + this.config.fills.timeToleranceMs;
	}
}

function symbolsOf(positions: readonly Position[]): Ticker[] {
	return [...new Set(positions.map((p) => p.symbol))];
}

function skippedReport(position: Position, reason: string): PositionReport {
	return {
		positionId: position.id,
		symbol: position.symbol,
		from: position.status,
		to: position.status,
		actions: [],
		skipped: reason,
	};
}
