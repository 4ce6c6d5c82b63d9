/**
 * `turtle-engine` command line.
 *
 *   check                      scheduled portfolio check (default)
 *   open <symbol> <dir> <price> <n>
 *   exit <positionId> <price>
 *   resolve <positionId> <discard|retry>
 *   status
 *   validate [--fix]
 *
 * Every state-changing command runs inside a GuardedSession. `runCli` never
 * exits the process; it returns the exit code for `main` to set.
 */

import { join, resolve } from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { FileFillQuery } from "../collaborators/file-fill-query.js";
import { FileMarketData } from "../collaborators/file-market-data.js";
import { CheckOrchestrator, RunStatus } from "../engine/check-orchestrator.js";
import { GuardedSession } from "../engine/session.js";
import {
	type EntrySignal,
	type ResolveAction,
	type SignalOutcome,
	type SignalRejection,
	registerEntry,
	requestExit,
	resolveEntry,
} from "../engine/signals.js";
import {
	DEFAULT_REDACT_PATHS,
	type LogLevel,
	type Logger,
	createLogger,
} from "../lib/logger/index.js";
import { FileRunLock } from "../lock/file-run-lock.js";
import { isLockBusy } from "../lock/types.js";
import type { NotificationOutbox } from "../notify/outbox.js";
import { LoggerNotifier } from "../notify/notifiers.js";
import type { Notifier } from "../notify/types.js";
import { NotificationKind } from "../notify/types.js";
import { FilePositionStore } from "../persistence/file-position-store.js";
import { filledQuantity } from "../position/position.js";
import type { PortfolioSnapshot, TurtleSystem } from "../position/types.js";
import { ExitReason } from "../position/types.js";
import { RiskManager } from "../risk/risk-manager.js";
import { type EngineConfig, resolveEngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { Direction } from "../shared/direction.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { TurtleUnitSizer } from "../sizing/unit-sizer.js";
import { ExitCode, describeError, exitCodeFor } from "./exit-codes.js";
import { formatArchive, formatGuard, formatPosition, formatRunReport, formatStatus } from "./format.js";

export const LOCK_FILE = "run.lock";
export const QUOTES_FILE = "quotes.json";
export const FILLS_FILE = "fills.jsonl";

export interface CliIO {
	readonly stdout: (line: string) => void;
	readonly stderr: (line: string) => void;
	readonly env: NodeJS.ProcessEnv;
	readonly cwd: string;
	readonly clock?: Clock;
	/** Log sink; pino writes to stderr when absent */
	readonly logDestination?: { write(msg: string): void };
	readonly pid?: number;
}

type GlobalOptions = {
	config?: string;
	dataDir?: string;
	quotes?: string;
	fills?: string;
	logLevel?: LogLevel;
};

interface Runtime {
	readonly config: EngineConfig;
	readonly logger: Logger;
	readonly clock: Clock;
	readonly store: FilePositionStore;
	readonly lock: FileRunLock;
	readonly notifier: Notifier;
	readonly risk: RiskManager;
	readonly sizer: TurtleUnitSizer;
	readonly quotesPath: string;
	readonly fillsPath: string;
	readonly pid: number;
}

// ── Argument parsers ─────────────────────────────────────────────────

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const DIRECTIONS: readonly Direction[] = [Direction.Long, Direction.Short];
const EXIT_REASONS: readonly ExitReason[] = [ExitReason.ExitSignal, ExitReason.Manual];
const RESOLVE_ACTIONS: readonly ResolveAction[] = ["discard", "retry"];

function oneOf<T extends string>(allowed: readonly T[], what: string): (value: string) => T {
	return (value) => {
		const match = allowed.find((a) => a === value);
		if (match === undefined) {
			throw new InvalidArgumentError(`${what} must be one of ${allowed.join(", ")}`);
		}
		return match;
	};
}

export function parseDecimalArg(value: string): Decimal {
	if (!Decimal.isDecimalString(value.trim())) {
		throw new InvalidArgumentError(`"${value}" is not a decimal`);
	}
	return Decimal.from(value.trim());
}

export function parseSystemArg(value: string): TurtleSystem {
	if (value === "1") return 1;
	if (value === "2") return 2;
	throw new InvalidArgumentError("system must be 1 or 2");
}

// ── Wiring ───────────────────────────────────────────────────────────

function buildRuntime(options: GlobalOptions, io: CliIO): Runtime {
	const resolved = resolveEngineConfig({ configPath: options.config, env: io.env, cwd: io.cwd });
	const config: EngineConfig = {
		...resolved,
		...(options.dataDir !== undefined && { dataDir: resolve(io.cwd, options.dataDir) }),
		...(options.logLevel !== undefined && { logLevel: options.logLevel }),
	};
	const logger = createLogger({
		level: config.logLevel,
		base: { service: "turtle-engine" },
		redactPaths: DEFAULT_REDACT_PATHS,
		...(io.logDestination !== undefined && { destination: io.logDestination }),
	});
	const sizer = TurtleUnitSizer.create(config.sizing);
	if (!sizer.ok) throw sizer.error;

	const clock = io.clock ?? SystemClock;
	return {
		config,
		logger,
		clock,
		store: FilePositionStore.create({
			dataDir: config.dataDir,
			maxBackups: config.maxBackups,
			clock,
			logger,
		}),
		lock: new FileRunLock({ path: join(config.dataDir, LOCK_FILE), clock, logger }),
		notifier: new LoggerNotifier(logger),
		risk: new RiskManager({
			limits: config.risk,
			correlationGroups: config.correlationGroups,
			defaultGroup: config.defaultGroup,
		}),
		sizer: sizer.value,
		quotesPath: resolve(io.cwd, options.quotes ?? join(config.dataDir, QUOTES_FILE)),
		fillsPath: resolve(io.cwd, options.fills ?? join(config.dataDir, FILLS_FILE)),
		pid: io.pid ?? process.pid,
	};
}

// ── Commands ─────────────────────────────────────────────────────────

async function checkCommand(rt: Runtime, io: CliIO): Promise<ExitCode> {
	const orchestrator = new CheckOrchestrator({
		config: rt.config,
		store: rt.store,
		lock: rt.lock,
		marketData: new FileMarketData({ path: rt.quotesPath, logger: rt.logger }),
		fills: new FileFillQuery({ path: rt.fillsPath, logger: rt.logger }),
		notifier: rt.notifier,
		sizer: rt.sizer,
		clock: rt.clock,
		logger: rt.logger,
		ownerId: `check:${rt.pid}`,
	});
	const result = await orchestrator.run();
	if (!result.ok) {
		io.stderr(describeError(result.error));
		return exitCodeFor(result.error);
	}
	for (const line of formatRunReport(result.value)) io.stdout(line);
	return result.value.status === RunStatus.CollaboratorsUnavailable
		? ExitCode.CollaboratorsUnavailable
		: ExitCode.Ok;
}

/**
 * Apply one signal operation under the guard. A rejection leaves the stored
 * snapshot untouched and is reported as a risk notification.
 */
async function signalCommand(
	rt: Runtime,
	io: CliIO,
	command: string,
	apply: (snapshot: PortfolioSnapshot, nowMs: number) => Result<SignalOutcome, SignalRejection>,
	announce: (outcome: SignalOutcome, outbox: NotificationOutbox) => void,
): Promise<ExitCode> {
	const session = new GuardedSession({
		store: rt.store,
		lock: rt.lock,
		notifier: rt.notifier,
		lockStaleMs: rt.config.lockStaleMs,
		clock: rt.clock,
		logger: rt.logger,
	});
	const outcome = await session.run<Result<SignalOutcome, SignalRejection>>(
		`${command}:${rt.pid}`,
		async (snapshot, outbox) => {
			const applied = apply(snapshot, rt.clock.now());
			if (!applied.ok) {
				outbox.add(NotificationKind.Risk, `${command} rejected`, {
					payload: { rejection: applied.error.kind, reason: applied.error.reason },
				});
				return { snapshot: null, value: applied };
			}
			announce(applied.value, outbox);
			return { snapshot: applied.value.snapshot, value: applied };
		},
	);

	if (!outcome.ok) {
		io.stderr(describeError(outcome.error));
		return exitCodeFor(outcome.error);
	}
	if (outcome.value.type === "busy") {
		io.stderr(`${command}: another run holds the guard; try again shortly`);
		return ExitCode.Failure;
	}
	const applied = outcome.value.value;
	if (!applied.ok) {
		io.stderr(`${command} rejected: ${applied.error.reason}`);
		return ExitCode.Failure;
	}
	io.stdout(formatPosition(applied.value.position));
	return ExitCode.Ok;
}

async function statusCommand(rt: Runtime, io: CliIO): Promise<ExitCode> {
	const loaded = await rt.store.load();
	if (!loaded.ok) {
		io.stderr(describeError(loaded.error));
		return exitCodeFor(loaded.error);
	}
	const snapshot = loaded.value;
	for (const line of formatStatus(snapshot, rt.risk.summarize(snapshot), rt.clock.now())) {
		io.stdout(line);
	}
	const guard = await rt.lock.inspect();
	if (!guard.ok) {
		io.stderr(describeError(guard.error));
		return exitCodeFor(guard.error);
	}
	io.stdout(formatGuard(guard.value));
	const archive = await rt.store.readArchive();
	if (!archive.ok) {
		io.stderr(describeError(archive.error));
		return exitCodeFor(archive.error);
	}
	io.stdout(formatArchive(archive.value));
	return ExitCode.Ok;
}

async function validateCommand(rt: Runtime, io: CliIO, fix: boolean): Promise<ExitCode> {
	const loaded = await rt.store.load();
	if (loaded.ok) {
		io.stdout(`snapshot ok: ${loaded.value.positions.length} active position(s)`);
		const archive = await rt.store.readArchive();
		if (!archive.ok) {
			io.stderr(describeError(archive.error));
			return exitCodeFor(archive.error);
		}
		const { positions, corruptLines } = archive.value;
		io.stdout(`archive: ${positions.length} position(s), ${corruptLines.length} unreadable line(s)`);
		for (const line of corruptLines) {
			io.stdout(`  line ${line.lineNumber}: ${line.problems.join("; ")}`);
		}
		return ExitCode.Ok;
	}

	io.stderr(describeError(loaded.error));
	if (!fix) return ExitCode.CorruptState;

	const acquired = await rt.lock.acquire(`validate:${rt.pid}`, rt.config.lockStaleMs);
	if (!acquired.ok) {
		io.stderr(
			isLockBusy(acquired.error)
				? "validate: another run holds the guard; try again shortly"
				: describeError(acquired.error),
		);
		return ExitCode.Failure;
	}
	const restored = await rt.store.restoreLatestBackup();
	const released = await rt.lock.release(acquired.value);
	if (!released.ok) io.stderr(describeError(released.error));
	if (!restored.ok) {
		io.stderr(describeError(restored.error));
		return exitCodeFor(restored.error);
	}
	rt.logger.warn({ source: restored.value.source }, "snapshot restored from backup");
	io.stdout(
		`restored ${restored.value.source}: ${restored.value.snapshot.positions.length} active position(s)`,
	);
	return ExitCode.Ok;
}

// ── Program ──────────────────────────────────────────────────────────

function buildProgram(io: CliIO, finish: (code: ExitCode) => void): Command {
	const program = new Command("turtle-engine");
	program
		.description("Position and portfolio risk engine for Turtle Trading signals")
		.exitOverride()
		.configureOutput({
			writeOut: (s) => io.stdout(s.trimEnd()),
			writeErr: (s) => io.stderr(s.trimEnd()),
		})
		.option("-c, --config <path>", "JSON config file")
		.option("-d, --data-dir <dir>", "directory holding the snapshot, archive and run lock")
		.option("--quotes <path>", `quotes file (default <data-dir>/${QUOTES_FILE})`)
		.option("--fills <path>", `broker fills export (default <data-dir>/${FILLS_FILE})`)
		.option("--log-level <level>", "trace | debug | info | warn | error | fatal", oneOf(LOG_LEVELS, "log level"));

	const runtime = (): Runtime => buildRuntime(program.opts<GlobalOptions>(), io);

	program
		.command("check", { isDefault: true })
		.description("settle fills, mark to market, check stops and propose pyramid units")
		.allowExcessArguments(false)
		.action(async () => {
			finish(await checkCommand(runtime(), io));
		});

	program
		.command("open")
		.description("register a confirmed breakout as a pending entry")
		.argument("<symbol>", "instrument symbol")
		.argument("<direction>", "long | short", oneOf(DIRECTIONS, "direction"))
		.argument("<price>", "breakout price", parseDecimalArg)
		.argument("<n>", "current N (ATR)", parseDecimalArg)
		.option("-s, --system <system>", "Turtle system 1 or 2", parseSystemArg, 1)
		.option("-q, --quantity <quantity>", "unit size instead of the sized one", parseDecimalArg)
		.action(
			async (
				symbol: string,
				direction: Direction,
				price: Decimal,
				n: Decimal,
				options: { system: TurtleSystem; quantity?: Decimal },
			) => {
				const rt = runtime();
				const signal: EntrySignal = {
					symbol,
					system: options.system,
					direction,
					price,
					n,
					quantity: options.quantity,
				};
				const code = await signalCommand(
					rt,
					io,
					"open",
					(snapshot, nowMs) =>
						registerEntry(snapshot, signal, { risk: rt.risk, sizer: rt.sizer, config: rt.config, nowMs }),
					({ position }, outbox) => {
						const entry = position.entries[0];
						outbox.add(NotificationKind.Signal, "entry order ready to place", {
							symbol: position.symbol,
							positionId: position.id,
							payload: {
								direction: position.direction,
								price: entry?.intendedPrice.toString() ?? null,
								quantity: entry?.quantity.toString() ?? null,
								stopLoss: position.stopLoss.toString(),
							},
						});
					},
				);
				finish(code);
			},
		);

	program
		.command("exit")
		.description("request an exit for a holding position")
		.argument("<positionId>", "position to close")
		.argument("<price>", "intended exit price", parseDecimalArg)
		.option("-r, --reason <reason>", "exit_signal | manual", oneOf(EXIT_REASONS, "reason"), ExitReason.Manual)
		.action(async (id: string, price: Decimal, options: { reason: ExitReason }) => {
			const rt = runtime();
			const code = await signalCommand(
				rt,
				io,
				"exit",
				(snapshot, nowMs) => requestExit(snapshot, id, price, options.reason, { config: rt.config, nowMs }),
				({ position }, outbox) => {
					outbox.add(NotificationKind.Signal, "exit order ready to place", {
						symbol: position.symbol,
						positionId: position.id,
						payload: {
							reason: options.reason,
							price: price.toString(),
							quantity: filledQuantity(position).toString(),
						},
					});
				},
			);
			finish(code);
		});

	program
		.command("resolve")
		.description("resolve an entry that never matched a fill")
		.argument("<positionId>", "position holding the unmatched entry")
		.argument("<action>", "discard | retry", oneOf(RESOLVE_ACTIONS, "action"))
		.action(async (id: string, action: ResolveAction) => {
			const rt = runtime();
			const code = await signalCommand(
				rt,
				io,
				"resolve",
				(snapshot, nowMs) => resolveEntry(snapshot, id, action, { config: rt.config, nowMs }),
				({ position }, outbox) => {
					outbox.add(NotificationKind.Trade, `entry resolved: ${action}`, {
						symbol: position.symbol,
						positionId: position.id,
						payload: { action, status: position.status },
					});
				},
			);
			finish(code);
		});

	program
		.command("status")
		.description("print active positions and exposure against every limit")
		.action(async () => {
			finish(await statusCommand(runtime(), io));
		});

	program
		.command("validate")
		.description("check the snapshot and archive; --fix restores the newest good backup")
		.option("--fix", "restore the newest backup that decodes cleanly", false)
		.action(async (options: { fix: boolean }) => {
			finish(await validateCommand(runtime(), io, options.fix));
		});

	return program;
}

/** Parse `argv` (without node and script) and run the command. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<ExitCode> {
	let code: ExitCode = ExitCode.Ok;
	const program = buildProgram(io, (c) => {
		code = c;
	});
	try {
		await program.parseAsync([...argv], { from: "user" });
	} catch (e: unknown) {
		if (e instanceof CommanderError) {
			return e.exitCode === 0 ? ExitCode.Ok : ExitCode.Usage;
		}
		io.stderr(describeError(e));
		return exitCodeFor(e);
	}
	return code;
}
