import { describe, expect, it } from "vitest";
import { T0, buildPosition, d, snapshotOf } from "../position/position-test-helpers.js";
import { RiskManager } from "../risk/risk-manager.js";
import { Direction } from "../shared/direction.js";
import { Duration } from "../shared/time.js";
import { TurtleUnitSizer } from "../sizing/unit-sizer.js";
import { TEST_GROUPS, testConfig } from "./engine-test-helpers.js";
import {
	type EntrySignal,
	type SignalContext,
	registerEntry,
	requestExit,
	resolveEntry,
} from "./signals.js";

const NOW = T0 + Duration.hours(3);
const config = testConfig();

function context(overrides: Partial<SignalContext> = {}): SignalContext {
	const sizer = TurtleUnitSizer.create(config.sizing);
	if (!sizer.ok) throw sizer.error;
	return {
		risk: new RiskManager({ correlationGroups: TEST_GROUPS }),
		sizer: sizer.value,
		config,
		nowMs: NOW,
		...overrides,
	};
}

const breakout: EntrySignal = {
	symbol: "aapl",
	system: 1,
	direction: Direction.Long,
	price: d("100"),
	n: d("2"),
};

describe("registerEntry", () => {
	it("creates a pending_entry position sized from equity and N", () => {
		const result = registerEntry(snapshotOf(), breakout, context());

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		const { position, snapshot } = result.value;
		expect(snapshot.positions).toEqual([position]);
		expect(position.id).toMatch(/^AAPL-s1-long-[0-9a-z]+-[0-9a-f]{8}$/);
		expect(position).toMatchObject({
			symbol: "AAPL",
			status: "pending_entry",
			group: "tech",
			maxUnits: 4,
			openedAtMs: null,
			createdAtMs: NOW,
		});
		expect(position.stopLoss.toString()).toBe("96");
		expect(position.entries).toHaveLength(1);
		expect(position.entries[0]).toMatchObject({
			unitIndex: 0,
			window: { startMs: NOW, endMs: NOW + Duration.hours(24) },
			fill: null,
			confidence: null,
		});
		expect(position.entries[0]?.quantity.toString()).toBe("500");
	});

	it("uses an explicit quantity when the signal carries one", () => {
		const result = registerEntry(snapshotOf(), { ...breakout, quantity: d("7") }, context());

		expect(result.ok && result.value.position.entries[0]?.quantity.toString()).toBe("7");
	});

	it("rejects a second signal for the same symbol and system", () => {
		const snapshot = snapshotOf(buildPosition({ fills: ["100"] }));

		const duplicate = registerEntry(snapshot, breakout, context());
		const otherSystem = registerEntry(snapshot, { ...breakout, system: 2 }, context());

		expect(duplicate).toEqual({
			ok: false,
			error: {
				kind: "duplicate",
				existing: "AAPL-s1-long-test",
				reason: "AAPL system 1 already has position AAPL-s1-long-test (open)",
			},
		});
		expect(otherSystem.ok).toBe(true);
	});

	it("rejects an entry the risk limits do not allow", () => {
		const snapshot = snapshotOf(
			buildPosition({ system: 2, fills: ["100", "101", "102", "103"], n: "0.5", group: "tech" }),
		);

		const result = registerEntry(snapshot, breakout, context());

		expect(!result.ok && result.error).toMatchObject({
			kind: "risk_limit",
			reason: "AAPL would hold 5 units (limit 4)",
			violation: { kind: "per_symbol", current: 4, projected: 5 },
		});
	});

	it("rejects a unit that sizes to zero and a non-positive N", () => {
		const zero = registerEntry(
			snapshotOf(),
			breakout,
			context({ sizer: { unitQuantity: () => d("0") } }),
		);
		const noN = registerEntry(snapshotOf(), { ...breakout, n: d("0") }, context());

		expect(!zero.ok && zero.error.kind).toBe("zero_size");
		expect(!noN.ok && noN.error).toEqual({
			kind: "invalid_signal",
			reason: "price and N must be positive (price 100, N 0)",
		});
	});
});

describe("requestExit", () => {
	it("moves a holding position to closing and drops its unfilled unit", () => {
		const snapshot = snapshotOf(buildPosition({ fills: ["100"], open: { price: "101" } }));

		const result = requestExit(snapshot, "AAPL-s1-long-test", d("104"), "exit_signal", context());

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		const { position } = result.value;
		expect(position.status).toBe("closing");
		expect(position.entries).toHaveLength(1);
		expect(position.exit).toMatchObject({
			reason: "exit_signal",
			window: { startMs: NOW, endMs: NOW + Duration.hours(24) },
			requestedAtMs: NOW,
			fill: null,
		});
		expect(position.exit?.intendedPrice.toString()).toBe("104");
	});

	it("refuses positions that hold no units or do not exist", () => {
		const snapshot = snapshotOf(buildPosition({ fills: [], open: { price: "100" } }));

		const pending = requestExit(snapshot, "AAPL-s1-long-test", d("99"), "manual", context());
		const missing = requestExit(snapshot, "nope", d("99"), "manual", context());

		expect(!pending.ok && pending.error).toMatchObject({
			kind: "invalid_transition",
			reason: "Cannot move position from pending_entry to closing",
		});
		expect(!missing.ok && missing.error).toEqual({
			kind: "not_found",
			reason: "no active position nope",
		});
	});
});

describe("resolveEntry", () => {
	const unmatched = () =>
		snapshotOf(buildPosition({ fills: ["100"], open: { price: "101", unmatched: true } }));

	it("retry reopens the unmatched unit's window from now", () => {
		const result = resolveEntry(unmatched(), "AAPL-s1-long-test", "retry", context());

		expect(result.ok && result.value.position.entries[1]).toMatchObject({
			confidence: null,
			window: { startMs: NOW, endMs: NOW + Duration.hours(24) },
		});
	});

	it("discard drops the pyramid unit and keeps the stop", () => {
		const result = resolveEntry(unmatched(), "AAPL-s1-long-test", "discard", context());

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		const { position } = result.value;
		expect(position.entries).toHaveLength(1);
		expect(position.status).toBe("pyramiding");
		expect(position.stopLoss.toString()).toBe("96");
	});

	it("discard on an opening unit discards the whole position", () => {
		const snapshot = snapshotOf(buildPosition({ fills: [], open: { price: "100" } }));

		const result = resolveEntry(snapshot, "AAPL-s1-long-test", "discard", context());

		expect(result.ok && result.value.position).toMatchObject({
			status: "discarded",
			closedAtMs: NOW,
			entries: [{ unitIndex: 0, confidence: "unmatched" }],
		});
	});

	it("reports nothing to resolve when every unit is filled", () => {
		const snapshot = snapshotOf(buildPosition({ fills: ["100"] }));

		const result = resolveEntry(snapshot, "AAPL-s1-long-test", "retry", context());

		expect(!result.ok && result.error.kind).toBe("nothing_to_resolve");
	});
});
