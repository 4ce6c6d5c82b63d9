import { CollaboratorUnavailableError, TimeoutError, classifyError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";

/**
 * Run one collaborator call under a deadline.
 *
 * A timeout or a thrown error becomes that collaborator's
 * CollaboratorUnavailableError, with the classified failure as its cause
 * and its code under `failure`. The late result, if any, is ignored.
 */
export async function callWithTimeout<T>(
	collaborator: string,
	operation: string,
	timeoutMs: number,
	call: () => Promise<Result<T, CollaboratorUnavailableError>>,
): Promise<Result<T, CollaboratorUnavailableError>> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(
			() =>
				reject(
					new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, {
						timeoutMs,
						operation,
					}),
				),
			timeoutMs,
		);
	});

	try {
		return await Promise.race([call(), deadline]);
	} catch (e: unknown) {
		const failure = classifyError(e);
		return err(
			new CollaboratorUnavailableError(
				`${collaborator} unavailable: ${failure.message}`,
				collaborator,
				{ operation, failure: failure.code, cause: failure },
			),
		);
	} finally {
		if (timer !== undefined) clearTimeout(timer);
	}
}
