import { describe, expect, it } from "vitest";
import { canTransition, isHolding, isTerminal, transition } from "./lifecycle.js";
import { T0, buildPosition, d } from "./position-test-helpers.js";
import { PositionStatus } from "./types.js";

describe("position lifecycle", () => {
	it("allows the documented forward path", () => {
		expect(canTransition(PositionStatus.PendingEntry, PositionStatus.Open)).toBe(true);
		expect(canTransition(PositionStatus.Open, PositionStatus.Pyramiding)).toBe(true);
		expect(canTransition(PositionStatus.Pyramiding, PositionStatus.Pyramiding)).toBe(true);
		expect(canTransition(PositionStatus.Pyramiding, PositionStatus.Closing)).toBe(true);
		expect(canTransition(PositionStatus.Closing, PositionStatus.Closed)).toBe(true);
		expect(canTransition(PositionStatus.PendingEntry, PositionStatus.Discarded)).toBe(true);
	});

	it("rejects skipping or reversing states", () => {
		expect(canTransition(PositionStatus.PendingEntry, PositionStatus.Pyramiding)).toBe(false);
		expect(canTransition(PositionStatus.Closing, PositionStatus.Open)).toBe(false);
		expect(canTransition(PositionStatus.Open, PositionStatus.Closed)).toBe(false);
		expect(canTransition(PositionStatus.Closed, PositionStatus.Open)).toBe(false);
	});

	it("classifies terminal and holding statuses", () => {
		expect(isTerminal(PositionStatus.Closed)).toBe(true);
		expect(isTerminal(PositionStatus.Discarded)).toBe(true);
		expect(isTerminal(PositionStatus.Closing)).toBe(false);
		expect(isHolding(PositionStatus.Open)).toBe(true);
		expect(isHolding(PositionStatus.Pyramiding)).toBe(true);
		expect(isHolding(PositionStatus.PendingEntry)).toBe(false);
	});

	describe("transition()", () => {
		it("applies the patch and stamps the update time", () => {
			const position = buildPosition({ fills: [], status: PositionStatus.PendingEntry });

			const result = transition(position, PositionStatus.Open, T0 + 9_000, {
				openedAtMs: T0 + 9_000,
				stopLoss: d("96"),
			});

			expect(result.ok).toBe(true);
			if (result.ok) {
				expect(result.value.status).toBe(PositionStatus.Open);
				expect(result.value.updatedAtMs).toBe(T0 + 9_000);
				expect(result.value.stopLoss.toString()).toBe("96");
				expect(result.value.closedAtMs).toBeNull();
			}
		});

		it("stamps closedAtMs when entering a terminal status", () => {
			const position = buildPosition({ status: PositionStatus.Closing });

			const result = transition(position, PositionStatus.Closed, T0 + 20_000);

			expect(result.ok && result.value.closedAtMs).toBe(T0 + 20_000);
		});

		it("returns InvalidTransitionError without touching the position", () => {
			const position = buildPosition({ status: PositionStatus.Open });

			const result = transition(position, PositionStatus.Closed, T0 + 1);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("INVALID_TRANSITION");
				expect(result.error.context).toMatchObject({ from: "open", to: "closed" });
			}
			expect(position.status).toBe(PositionStatus.Open);
		});
	});
});
