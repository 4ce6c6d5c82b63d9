import { describe, expect, it } from "vitest";
import {
	FakeFillQuery,
	FakeMarketData,
	brokerFill,
} from "../collaborators/collaborator-test-helpers.js";
import { RecordingNotifier } from "../notify/notify-test-helpers.js";
import { MemoryPositionStore } from "../persistence/memory-position-store.js";
import { unitCount } from "../position/position.js";
import { T0, buildPosition, snapshotOf } from "../position/position-test-helpers.js";
import type { PortfolioSnapshot, Position } from "../position/types.js";
import type { EngineConfigFile } from "../shared/config.js";
import { Direction, FillSide } from "../shared/direction.js";
import { Duration, FakeClock, toIso } from "../shared/time.js";
import { CheckOrchestrator, type RunReport } from "./check-orchestrator.js";
import { FakeRunLock, testConfig } from "./engine-test-helpers.js";

const NOW = T0 + Duration.hours(2);

function setup(
	positions: Position[],
	options: {
		quotes?: Record<string, { price: string; n: string }>;
		config?: EngineConfigFile;
		now?: number;
		notifier?: RecordingNotifier;
	} = {},
) {
	const clock = new FakeClock(options.now ?? NOW);
	const store = new MemoryPositionStore(snapshotOf(...positions));
	const lock = new FakeRunLock();
	const market = new FakeMarketData(options.quotes ?? { AAPL: { price: "101", n: "2" } });
	const fills = new FakeFillQuery();
	const notifier = options.notifier ?? new RecordingNotifier();
	const orchestrator = new CheckOrchestrator({
		config: testConfig(options.config),
		store,
		lock,
		marketData: market,
		fills,
		notifier,
		clock,
	});
	return { clock, store, lock, market, fills, notifier, orchestrator };
}

async function runOk(orchestrator: CheckOrchestrator): Promise<RunReport> {
	const result = await orchestrator.run();
	if (!result.ok) throw result.error;
	return result.value;
}

async function stored(store: MemoryPositionStore): Promise<PortfolioSnapshot> {
	const loaded = await store.load();
	if (!loaded.ok) throw loaded.error;
	return loaded.value;
}

async function onlyPosition(store: MemoryPositionStore): Promise<Position> {
	const [position] = (await stored(store)).positions;
	if (position === undefined) throw new Error("no stored position");
	return position;
}

describe("CheckOrchestrator", () => {
	describe("pyramiding", () => {
		it("adds unit 2 at 101 with the stop tightened to 97, then settles its fill", async () => {
			const { orchestrator, store, notifier, fills, clock } = setup([
				buildPosition({ fills: ["100"], n: "2", group: "tech" }),
			]);

			const first = await runOk(orchestrator);

			expect(first.status).toBe("completed");
			expect(first.saved).toBe(true);
			expect(first.positions).toEqual([
				{
					positionId: "AAPL-s1-long-test",
					symbol: "AAPL",
					from: "open",
					to: "pyramiding",
					actions: ["unit 1 ordered at 101"],
					skipped: null,
				},
			]);
			expect(notifier.received.map((n) => [n.kind, n.title, n.payload])).toEqual([
				[
					"signal",
					"pyramid unit ready to place",
					{ unitIndex: 1, price: "101", quantity: "10", nAtEntry: "2", stopLoss: "97" },
				],
			]);
			const committed = await onlyPosition(store);
			expect(committed.entries).toHaveLength(2);
			expect(committed.stopLoss.toString()).toBe("97");
			expect(committed.unrealizedPnl.toString()).toBe("10");

			fills.add(brokerFill("ord-AAPL-1", "101", NOW + Duration.minutes(5)));
			clock.advance(Duration.minutes(10));
			const second = await runOk(orchestrator);

			expect(second.positions[0]?.actions).toEqual(["unit 1 filled at 101"]);
			const filled = await onlyPosition(store);
			expect(unitCount(filled)).toBe(2);
			expect(filled.status).toBe("pyramiding");
			expect(filled.stopLoss.toString()).toBe("97");
			expect(filled.entries[1]?.confidence).toBe("exact");
		});

		it("reports a full position on the default ceiling as a per_symbol violation", async () => {
			const { orchestrator, store, notifier } = setup(
				[buildPosition({ fills: ["100", "101", "102", "103"], n: "0.5", group: "tech" })],
				{ quotes: { AAPL: { price: "103.25", n: "0.5" } } },
			);

			const report = await runOk(orchestrator);

			expect(report.violations).toEqual([
				{
					kind: "per_symbol",
					scope: "AAPL",
					current: 4,
					projected: 5,
					limit: 4,
					reason: "AAPL-s1-long-test already holds 4 of 4 units",
				},
			]);
			expect(report.positions[0]?.actions).toEqual([
				"unit 4 rejected: AAPL-s1-long-test already holds 4 of 4 units",
			]);
			expect(notifier.received.map((n) => [n.kind, n.title])).toEqual([
				["risk", "pyramid unit rejected by risk limits"],
				["risk", "exposure near limit"],
			]);
			const position = await onlyPosition(store);
			expect(position.entries).toHaveLength(4);
			expect(position.stopLoss.toString()).toBe("99");
		});

		it("keeps the saved snapshot when every notification fails", async () => {
			const { orchestrator, store } = setup(
				[buildPosition({ fills: ["100"], n: "2", group: "tech" })],
				{ notifier: new RecordingNotifier("broken", "down") },
			);

			const report = await runOk(orchestrator);

			expect(report.saved).toBe(true);
			expect(report.notifications).toEqual({ delivered: 0, failed: 1 });
			const committed = await onlyPosition(store);
			expect(committed.entries).toHaveLength(2);
			expect(committed.stopLoss.toString()).toBe("97");
		});

		it("rejects a fifth unit in one symbol with a per_symbol violation", async () => {
			const { orchestrator, store, notifier } = setup(
				[buildPosition({ fills: ["100", "101", "102", "103"], n: "0.5", maxUnits: 6, group: "tech" })],
				{ quotes: { AAPL: { price: "103.25", n: "0.5" } }, config: { pyramid: { maxUnits: 6 } } },
			);

			const report = await runOk(orchestrator);

			expect(report.violations).toEqual([
				{
					kind: "per_symbol",
					scope: "AAPL",
					current: 4,
					projected: 5,
					limit: 4,
					reason: "AAPL would hold 5 units (limit 4)",
				},
			]);
			expect(report.positions[0]?.actions).toEqual([
				"unit 4 rejected: AAPL would hold 5 units (limit 4)",
			]);
			expect(notifier.received.map((n) => [n.kind, n.title])).toEqual([
				["risk", "pyramid unit rejected by risk limits"],
				["risk", "exposure near limit"],
			]);
			const position = await onlyPosition(store);
			expect(position.entries).toHaveLength(4);
			expect(position.stopLoss.toString()).toBe("99");
		});
	});

	describe("entries and exits", () => {
		it("opens a pending position on its fill and sets the stop from the fill price", async () => {
			const { orchestrator, store, fills, notifier } = setup(
				[buildPosition({ fills: [], open: { price: "100" }, n: "2" })],
				{ quotes: { AAPL: { price: "100.6", n: "2" } }, now: T0 + Duration.minutes(20) },
			);
			fills.add(brokerFill("b-1", "100.5", T0 + Duration.minutes(10)));

			const report = await runOk(orchestrator);

			expect(report.positions[0]).toMatchObject({
				from: "pending_entry",
				to: "open",
				actions: ["unit 0 filled at 100.5"],
			});
			expect(notifier.received[0]).toMatchObject({
				kind: "trade",
				title: "position opened",
				payload: {
					unitIndex: 0,
					price: "100.5",
					quantity: "10",
					orderRef: "b-1",
					confidence: "exact",
					stopLoss: "96.5",
				},
			});
			const position = await onlyPosition(store);
			expect(position.status).toBe("open");
			expect(position.entryPrice.toString()).toBe("100.5");
			expect(position.stopLoss.toString()).toBe("96.5");
			expect(position.openedAtMs).toBe(T0 + Duration.minutes(10));
			expect(position.unrealizedPnl.toString()).toBe("1");
		});

		it("discards and archives a position whose opening order never filled", async () => {
			const { orchestrator, store, notifier } = setup(
				[buildPosition({ fills: [], open: { price: "100" }, n: "2" })],
				{ now: T0 + Duration.hours(1) + Duration.minutes(31) },
			);

			const report = await runOk(orchestrator);

			expect(report.positions[0]?.to).toBe("discarded");
			expect(report.archived).toEqual(["AAPL-s1-long-test"]);
			expect(notifier.received[0]).toMatchObject({
				kind: "risk",
				title: "entry discarded: opening order never filled",
				payload: { unitIndex: 0, reason: "no buy fill for AAPL" },
			});
			expect((await stored(store)).positions).toEqual([]);
			expect(store.archiveSize).toBe(1);
		});

		it("requests an exit when the stop is hit and closes on the exit fill", async () => {
			const { orchestrator, store, fills, clock, market } = setup(
				[buildPosition({ fills: ["100"], n: "2" })],
				{ quotes: { AAPL: { price: "95.5", n: "2" } } },
			);

			const first = await runOk(orchestrator);

			expect(first.positions[0]).toMatchObject({
				to: "closing",
				actions: ["stop 96 hit at 95.5"],
			});
			const closing = await onlyPosition(store);
			expect(closing.exit).toMatchObject({ reason: "stop_loss", requestedAtMs: NOW, fill: null });
			expect(closing.exit?.intendedPrice.toString()).toBe("95.5");

			fills.add(brokerFill("s-1", "95.4", NOW + Duration.minutes(2), { side: FillSide.Sell }));
			market.setQuote("AAPL", "95.4", "2");
			clock.advance(Duration.minutes(5));
			const second = await runOk(orchestrator);

			expect(second.archived).toEqual(["AAPL-s1-long-test"]);
			expect((await stored(store)).positions).toEqual([]);
			const archive = await store.readArchive();
			if (!archive.ok) throw archive.error;
			const [closed] = archive.value.positions;
			expect(closed?.status).toBe("closed");
			expect(closed?.realizedPnl.toString()).toBe("-46");
			expect(closed?.exit?.fill?.orderRef).toBe("s-1");
		});

		it("never settles a new entry with the exit fill of an archived position", async () => {
			const { orchestrator, store, fills, clock, market } = setup(
				[buildPosition({ fills: ["100"], n: "2" })],
				{ quotes: { AAPL: { price: "95.5", n: "2" } } },
			);
			await runOk(orchestrator);
			fills.add(brokerFill("s-1", "95.4", NOW + Duration.minutes(2), { side: FillSide.Sell }));
			clock.advance(Duration.minutes(5));
			expect((await runOk(orchestrator)).archived).toEqual(["AAPL-s1-long-test"]);

			clock.advance(Duration.days(1));
			const now = clock.now();
			const saved = await store.save(
				snapshotOf(
					buildPosition({
						id: "AAPL-s1-short-next",
						direction: Direction.Short,
						fills: [],
						open: { price: "95", window: { startMs: now, endMs: now + Duration.hours(1) } },
					}),
				),
			);
			if (!saved.ok) throw saved.error;
			market.setQuote("AAPL", "95", "2");

			const report = await runOk(orchestrator);

			expect(report.positions[0]).toMatchObject({
				positionId: "AAPL-s1-short-next",
				from: "pending_entry",
				to: "pending_entry",
				actions: [],
			});
			const pending = await onlyPosition(store);
			expect(pending.entries[0]?.fill).toBeNull();
		});

		it("skips a position whose fill is ambiguous and leaves it as it was", async () => {
			const { orchestrator, store, fills, notifier } = setup([
				buildPosition({ fills: [], open: { price: "100", window: null }, n: "2" }),
			]);
			fills.add(brokerFill("x", "100.5", null)).add(brokerFill("y", "99.5", null));

			const report = await runOk(orchestrator);

			expect(report.positions[0]).toMatchObject({
				from: "pending_entry",
				to: "pending_entry",
				skipped: "2 fills match unit 0 of AAPL-s1-long-test equally well",
			});
			expect(notifier.received[0]).toMatchObject({
				kind: "error",
				title: "position skipped: needs manual review",
				positionId: "AAPL-s1-long-test",
			});
			expect((await onlyPosition(store)).status).toBe("pending_entry");
		});
	});

	describe("collaborators", () => {
		const aapl = () => buildPosition({ fills: ["100"], n: "2", group: "tech" });
		const es = () => buildPosition({ symbol: "ES", fills: ["5000"], n: "1", group: "index" });

		it("skips an unavailable symbol, backs it off and carries on with the rest", async () => {
			const { orchestrator, store, market, notifier, clock } = setup([aapl(), es()], {
				quotes: { AAPL: { price: "100.5", n: "2" }, ES: { price: "5001", n: "1" } },
			});
			market.fail("ES");

			const report = await runOk(orchestrator);

			expect(report.status).toBe("completed");
			expect(report.symbols).toEqual([
				{ symbol: "AAPL", status: "processed", detail: null },
				{ symbol: "ES", status: "unavailable", detail: "market data down for ES" },
			]);
			expect(report.positions[1]).toMatchObject({ symbol: "ES", skipped: "market data down for ES" });
			expect(market.calls).toEqual(["price:AAPL", "n:AAPL", "price:ES"]);
			expect(notifier.received.map((n) => [n.kind, n.title, n.symbol])).toEqual([
				["error", "symbol skipped: collaborator unavailable", "ES"],
			]);
			expect((await stored(store)).backoff).toEqual({
				ES: {
					failures: 1,
					retryAfterMs: NOW + Duration.minutes(5),
					lastError: "market data down for ES",
				},
			});

			clock.advance(Duration.minutes(1));
			const next = await runOk(orchestrator);

			expect(next.symbols[1]).toEqual({
				symbol: "ES",
				status: "backoff",
				detail: `backing off until ${toIso(NOW + Duration.minutes(5))} after 1 failure(s)`,
			});
			expect(market.calls.slice(3)).toEqual(["price:AAPL", "n:AAPL"]);
		});

		it("saves only the backoff table when every symbol's fetch fails", async () => {
			const { orchestrator, store, market, notifier, clock } = setup([es()], {
				quotes: { ES: { price: "5001", n: "1" } },
			});
			market.fail("ES");

			const report = await runOk(orchestrator);

			expect(report.status).toBe("collaborators_unavailable");
			expect(report.saved).toBe(true);
			expect(notifier.titles()).toEqual([
				"symbol skipped: collaborator unavailable",
				"check aborted: all collaborators unavailable",
			]);
			const after = await stored(store);
			expect(after.backoff).toEqual({
				ES: {
					failures: 1,
					retryAfterMs: NOW + Duration.minutes(5),
					lastError: "market data down for ES",
				},
			});
			expect(after.positions.map((p) => [p.id, p.status, p.entries.length])).toEqual([
				["ES-s1-long-test", "open", 1],
			]);

			clock.advance(Duration.minutes(1));
			const next = await runOk(orchestrator);

			expect(next.status).toBe("completed");
			expect(next.symbols).toEqual([
				{
					symbol: "ES",
					status: "backoff",
					detail: `backing off until ${toIso(NOW + Duration.minutes(5))} after 1 failure(s)`,
				},
			]);
			expect(market.calls).toEqual(["price:ES"]);
		});
	});

	describe("run-wide outcomes", () => {
		it("aborts on a corrupt snapshot before any collaborator, matcher or risk call", async () => {
			const { orchestrator, store, market, fills, lock, notifier } = setup([]);
			store.setRaw("{ not json");

			const result = await orchestrator.run();

			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("CORRUPT_STATE");
			expect(market.calls).toEqual([]);
			expect(fills.calls).toEqual([]);
			expect(store.saveCount).toBe(0);
			expect(store.raw()).toBe("{ not json");
			expect(lock.releases).toBe(1);
			expect(notifier.titles()).toEqual(["position snapshot is corrupt"]);
		});

		it("reports Busy and touches nothing while another run holds the guard", async () => {
			const { orchestrator, store, market, lock, notifier } = setup([
				buildPosition({ fills: ["100"] }),
			]);
			lock.holder = "another-run";

			const report = await runOk(orchestrator);

			expect(report.status).toBe("busy");
			expect(report.busy).toMatchObject({ kind: "busy", reason: "held" });
			expect(market.calls).toEqual([]);
			expect(store.saveCount).toBe(0);
			expect(notifier.received).toEqual([]);
		});
	});
});
