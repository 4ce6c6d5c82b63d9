import { describe, expect, it } from "vitest";
import { EngineError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { ValidationError, formatIssue, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "AAPL");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("AAPL");
			}
		});

		it("returns the output type of transforming schemas", () => {
			const schema = z.union([z.string(), z.number()]).transform((v) => String(v));
			const result = validate(schema, 101.5);

			expect(result.ok && result.value).toBe("101.5");
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error).toBeInstanceOf(EngineError);
				expect(result.error.code).toBe("VALIDATION_FAILED");
				expect(result.error.category).toBe("non_retryable");
			}
		});

		it("reports every nested issue with its path", () => {
			const schema = z.object({
				position: z.object({ symbol: z.string(), system: z.number() }),
			});
			const result = validate(schema, { position: { symbol: 42, system: "one" } });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.issues).toHaveLength(2);
				expect(result.error.issues.map((i) => i.path.join("."))).toEqual([
					"position.symbol",
					"position.system",
				]);
			}
		});
	});

	describe("formatIssue()", () => {
		it("joins the path with dots", () => {
			expect(formatIssue({ path: ["positions", 0, "status"], message: "Invalid" })).toBe(
				"positions.0.status: Invalid",
			);
		});

		it("labels root-level issues", () => {
			expect(formatIssue({ path: [], message: "Expected object" })).toBe(
				"<root>: Expected object",
			);
		});
	});
});
