/**
 * Logger wrapper: structured JSON logging backed by pino.
 *
 * Components take a `Logger` and derive children with bound context
 * (`{ component }`, `{ symbol }`, `{ positionId }`). Configured paths are
 * censored before a line is written.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Fields bound to every line, e.g. `{ service: "turtle-engine" }`. */
	readonly base?: Record<string, unknown>;
}

type LogMethod = {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
};

/** Structured logger interface. */
export interface Logger {
	trace: LogMethod;
	debug: LogMethod;
	info: LogMethod;
	warn: LogMethod;
	error: LogMethod;
	fatal: LogMethod;
	child(bindings: Record<string, unknown>): Logger;
}

/** Default paths censored in every engine log line. */
export const DEFAULT_REDACT_PATHS: readonly string[] = ["*.token", "lock.token", "*.apiKey"];

// ── Factory ─────────────────────────────────────────────────────────

function bind(pinoLogger: pino.Logger, level: LogLevel): LogMethod {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](serializeErrors(msgOrObj), msg ?? "");
		}
	};
}

// pino only serializes an Error under the `err` key; engine code logs it as `error`.
function serializeErrors(obj: Record<string, unknown>): Record<string, unknown> {
	const error = obj["error"];
	if (!(error instanceof Error)) return obj;
	const rest = { ...obj };
	delete rest["error"];
	return { ...rest, err: error };
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		trace: bind(pinoLogger, "trace"),
		debug: bind(pinoLogger, "debug"),
		info: bind(pinoLogger, "info"),
		warn: bind(pinoLogger, "warn"),
		error: bind(pinoLogger, "error"),
		fatal: bind(pinoLogger, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional path redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.child({ component: "orchestrator" }).info({ symbol: "AAPL" }, "price fetched");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (config.base) {
		pinoOptions.base = config.base;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const pinoLogger = config.destination
		? pino(pinoOptions, config.destination)
		: pino(pinoOptions, pino.destination(2));

	return wrapPino(pinoLogger);
}

/** A logger that drops everything. Used where a component is constructed without one. */
export function silentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}
