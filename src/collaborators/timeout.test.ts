import { describe, expect, it } from "vitest";
import { d } from "../position/position-test-helpers.js";
import { CollaboratorUnavailableError, TimeoutError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { callWithTimeout } from "./timeout.js";

describe("callWithTimeout", () => {
	it("passes a result through when the call settles in time", async () => {
		const result = await callWithTimeout("market-data", "getLatestPrice", 1_000, async () =>
			ok(d("101")),
		);

		expect(result.ok && result.value.toString()).toBe("101");
	});

	it("passes an unavailable result through unchanged", async () => {
		const unavailable = new CollaboratorUnavailableError("No quote for AAPL", "market-data");

		const result = await callWithTimeout("market-data", "getLatestPrice", 1_000, async () =>
			err(unavailable),
		);

		expect(result).toEqual({ ok: false, error: unavailable });
	});

	it("turns a timeout into CollaboratorUnavailable", async () => {
		const result = await callWithTimeout(
			"broker-fills",
			"getRecentFills",
			20,
			() => new Promise(() => {}),
		);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				"broker-fills unavailable: getRecentFills timed out after 20ms",
			);
			expect(result.error.collaborator).toBe("broker-fills");
			expect(result.error.isRetryable).toBe(true);
			expect(result.error.cause).toBeInstanceOf(TimeoutError);
			expect(result.error.context["failure"]).toBe("TIMEOUT_ERROR");
		}
	});

	it("turns a thrown error into CollaboratorUnavailable", async () => {
		const result = await callWithTimeout("market-data", "getAtrN", 1_000, async () => {
			throw new Error("socket hang up");
		});

		expect(!result.ok && result.error.message).toBe("market-data unavailable: socket hang up");
		expect(!result.ok && result.error.context["failure"]).toBe("SYSTEM_ERROR");
	});

	it("classifies a refused connection as a collaborator outage", async () => {
		const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8080"), {
			code: "ECONNREFUSED",
		});

		const result = await callWithTimeout("market-data", "getLatestPrice", 1_000, async () => {
			throw refused;
		});

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.context).toEqual({
				collaborator: "market-data",
				operation: "getLatestPrice",
				failure: "COLLABORATOR_UNAVAILABLE",
			});
			expect(result.error.cause).toBeInstanceOf(CollaboratorUnavailableError);
		}
	});
});
