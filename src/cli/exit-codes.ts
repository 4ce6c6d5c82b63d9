import { EngineError, isCorruptState } from "../shared/errors.js";

/** Process exit codes of `turtle-engine`. */
export const ExitCode = {
	Ok: 0,
	/** The guard could not be taken, a signal was rejected, or anything else fatal */
	Failure: 1,
	CorruptState: 2,
	CollaboratorsUnavailable: 3,
	/** sysexits EX_USAGE */
	Usage: 64,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
	if (isCorruptState(error)) return ExitCode.CorruptState;
	return ExitCode.Failure;
}

/** One line for stderr: the message, then the hint when there is one. */
export function describeError(error: unknown): string {
	if (error instanceof EngineError) {
		return error.hint !== undefined ? `${error.message} (${error.hint})` : error.message;
	}
	return error instanceof Error ? error.message : String(error);
}
