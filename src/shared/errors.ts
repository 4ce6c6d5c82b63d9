/**
 * EngineError hierarchy: structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). Fatal errors
 * abort a run; retryable ones put the affected symbol into backoff until a
 * later run; non-retryable ones skip the affected position and ask for review.
 */

/** Error severity categories that drive run abort and backoff behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing EngineError subclasses with optional cause chain. */
interface EngineErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all engine operations, with category-based handling. */
export class EngineError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "EngineError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Fatal: the persisted snapshot cannot be parsed or violates its invariants. */
export class CorruptStateError extends EngineError {
	constructor(message: string, context: Record<string, unknown> & EngineErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"CORRUPT_STATE",
			ErrorCategory.Fatal,
			rest,
			"run `turtle-engine validate` and, if a good backup exists, `validate --fix`",
		);
		this.name = "CorruptStateError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: market data or broker fill query failed or timed out for a symbol. */
export class CollaboratorUnavailableError extends EngineError {
	readonly collaborator: string;
	constructor(
		message: string,
		collaborator: string,
		context: Record<string, unknown> & EngineErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "COLLABORATOR_UNAVAILABLE", ErrorCategory.Retryable, {
			collaborator,
			...rest,
		});
		this.name = "CollaboratorUnavailableError";
		this.collaborator = collaborator;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: a bounded collaborator call exceeded its deadline. */
export class TimeoutError extends EngineError {
	constructor(message: string, context: Record<string, unknown> & EngineErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: several fills fit an expected entry equally well; needs manual review. */
export class AmbiguousMatchError extends EngineError {
	readonly candidateRefs: readonly string[];
	constructor(
		message: string,
		candidateRefs: readonly string[],
		context: Record<string, unknown> & EngineErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(
			message,
			"AMBIGUOUS_MATCH",
			ErrorCategory.NonRetryable,
			{ candidateRefs, ...rest },
			"inspect the broker fills and resolve the entry manually",
		);
		this.name = "AmbiguousMatchError";
		this.candidateRefs = candidateRefs;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: a requested state change is not allowed from the position's status. */
export class InvalidTransitionError extends EngineError {
	constructor(message: string, context: Record<string, unknown> & EngineErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_TRANSITION", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidTransitionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: the run lock could not be created, read or removed for reasons other than contention. */
export class LockError extends EngineError {
	constructor(message: string, context: Record<string, unknown> & EngineErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "LOCK_ERROR", ErrorCategory.Fatal, rest);
		this.name = "LockError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends EngineError {
	constructor(message: string, context: Record<string, unknown> & EngineErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends EngineError {
	constructor(message: string, context: Record<string, unknown> & EngineErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Classify an unknown failure thrown by a collaborator into an EngineError.
 * Network-ish and timeout failures become retryable; everything else is a SystemError.
 */
export function classifyError(error: unknown): EngineError {
	if (error instanceof EngineError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = isNodeError(error) ? error.code : undefined;

		if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (
			code === "ECONNREFUSED" ||
			code === "ENOTFOUND" ||
			code === "ECONNRESET" ||
			msg.includes("fetch failed") ||
			msg.includes("rate limit") ||
			msg.includes("429")
		) {
			return new CollaboratorUnavailableError(error.message, "unknown", { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for CorruptStateError. */
export function isCorruptState(e: unknown): e is CorruptStateError {
	return e instanceof CorruptStateError;
}

/** Type guard for errors raised by Node's fs and net APIs. */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && "code" in e;
}
