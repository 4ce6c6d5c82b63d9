import { describe, expect, it } from "vitest";
import type { RunReport } from "../engine/check-orchestrator.js";
import { buildPosition, d } from "../position/position-test-helpers.js";
import { positionId } from "../shared/identifiers.js";
import { formatArchive, formatGuard, formatRunReport } from "./format.js";

const report: RunReport = {
	status: "completed",
	startedAtMs: 0,
	finishedAtMs: 10,
	saved: true,
	symbols: [
		{ symbol: "AAPL", status: "processed", detail: null },
		{ symbol: "ES", status: "backoff", detail: "backing off until 2024-03-01T15:00:00.000Z after 2 failure(s)" },
	],
	positions: [
		{
			positionId: positionId("AAPL-s1-long-a"),
			symbol: "AAPL",
			from: "open",
			to: "pyramiding",
			actions: ["unit 1 ordered at 101"],
			skipped: null,
		},
		{
			positionId: positionId("ES-s2-short-b"),
			symbol: "ES",
			from: "open",
			to: "open",
			actions: [],
			skipped: "backing off",
		},
	],
	violations: [
		{ kind: "per_group", scope: "tech", current: 6, projected: 7, limit: 6, reason: "tech would hold 7 units (limit 6)" },
	],
	archived: [positionId("GC-s1-long-c")],
	reclaimed: null,
	busy: null,
	notifications: { delivered: 3, failed: 0 },
};

describe("formatRunReport", () => {
	it("lists everything but processed symbols", () => {
		expect(formatRunReport(report)).toEqual([
			"check completed: 2 symbol(s), 2 position(s), saved",
			"  symbol ES backoff: backing off until 2024-03-01T15:00:00.000Z after 2 failure(s)",
			"  AAPL-s1-long-a open -> pyramiding: unit 1 ordered at 101",
			"  ES-s2-short-b open -> open [skipped: backing off]",
			"  limit per_group tech: tech would hold 7 units (limit 6)",
			"  archived GC-s1-long-c",
		]);
	});

	it("reduces a busy run to one line", () => {
		const busy: RunReport = {
			...report,
			status: "busy",
			busy: {
				kind: "busy",
				reason: "held",
				holder: { owner: "check:77", token: "t", pid: 77, host: "box", acquiredAt: "2024-03-01T14:00:00Z" },
				ageMs: 1_000,
			},
		};

		expect(formatRunReport(busy)).toEqual(["check busy: guard held by check:77"]);
	});
});

describe("formatArchive", () => {
	it("sums realized P&L", () => {
		const won = { ...buildPosition({ fills: ["100"] }), realizedPnl: d("120.5") };
		const lost = { ...buildPosition({ fills: ["100"] }), realizedPnl: d("-46") };
		expect(formatArchive({ positions: [won, lost], corruptLines: [] })).toBe(
			"archive: 2 position(s), realized 74.5",
		);
		expect(formatArchive({ positions: [], corruptLines: [{ lineNumber: 3, raw: "{", problems: ["bad"] }] })).toBe(
			"archive: 0 position(s), realized 0, 1 unreadable line(s)",
		);
	});
});

describe("formatGuard", () => {
	it("names the holder of a held guard", () => {
		const marker = { owner: "check:77", token: "t", pid: 77, host: "box", acquiredAt: "2024-03-01T14:00:00Z" };
		expect(formatGuard({ state: "held", marker, ageMs: 5_000 })).toBe(
			"guard: held by check:77 (pid 77 on box) since 2024-03-01T14:00:00Z",
		);
	});

	it("reports free and unreadable markers", () => {
		expect(formatGuard({ state: "free" })).toBe("guard: free");
		expect(formatGuard({ state: "unreadable", ageMs: 90_500 })).toBe("guard: unreadable marker, 91s old");
	});
});
