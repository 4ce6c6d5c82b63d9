import { describe, expect, it } from "vitest";
import { createLogger, silentLogger } from "../lib/logger/index.js";
import { T0 } from "../position/position-test-helpers.js";
import { LoggerNotifier } from "./notifiers.js";
import { RecordingNotifier } from "./notify-test-helpers.js";
import { NotificationOutbox } from "./outbox.js";

function captureLogger(): { logger: ReturnType<typeof createLogger>; lines: Record<string, unknown>[] } {
	const lines: Record<string, unknown>[] = [];
	const logger = createLogger({
		level: "trace",
		destination: { write: (msg: string) => lines.push(JSON.parse(msg)) },
	});
	return { logger, lines };
}

describe("NotificationOutbox", () => {
	it("holds notifications until dispatched, stamped with the clock", async () => {
		const outbox = new NotificationOutbox(() => T0);
		const sink = new RecordingNotifier("sink");

		outbox.add("risk", "unit rejected", { symbol: "AAPL", payload: { kind: "per_symbol" } });
		expect(sink.received).toHaveLength(0);

		const summary = await outbox.dispatch(sink, silentLogger());

		expect(summary).toEqual({ delivered: 1, failed: 0 });
		expect(sink.received).toEqual([
			{
				kind: "risk",
				title: "unit rejected",
				symbol: "AAPL",
				positionId: null,
				payload: { kind: "per_symbol" },
				atMs: T0,
			},
		]);
		expect(await outbox.dispatch(sink, silentLogger())).toEqual({ delivered: 0, failed: 0 });
		expect(sink.received).toHaveLength(1);
	});

	it("counts failed deliveries and logs them without throwing", async () => {
		const { logger, lines } = captureLogger();
		const outbox = new NotificationOutbox(() => T0);
		outbox.add("trade", "entry filled");
		outbox.add("error", "fills unavailable");

		const summary = await outbox.dispatch(new RecordingNotifier("broken", "smtp down"), logger);

		expect(summary).toEqual({ delivered: 0, failed: 2 });
		expect(lines.map((l) => [l["msg"], l["notifier"], l["title"]])).toEqual([
			["notification delivery failed", "broken", "entry filled"],
			["notification delivery failed", "broken", "fills unavailable"],
		]);
	});
});

describe("LoggerNotifier", () => {
	it("logs risk as warn, errors as error and trades as info", async () => {
		const { logger, lines } = captureLogger();
		const notifier = new LoggerNotifier(logger);
		const base = { symbol: "ES", positionId: null, payload: { units: 2 }, atMs: T0 };

		await notifier.notify({ ...base, kind: "risk", title: "near limit" });
		await notifier.notify({ ...base, kind: "error", title: "skipped" });
		await notifier.notify({ ...base, kind: "trade", title: "filled" });

		expect(lines.map((l) => [l["level"], l["msg"], l["notification"]])).toEqual([
			[40, "near limit", "risk"],
			[50, "skipped", "error"],
			[30, "filled", "trade"],
		]);
		expect(lines[0]).toMatchObject({
			component: "notifier",
			symbol: "ES",
			units: 2,
			at: "2023-11-14T22:13:20.000Z",
		});
	});
});
