import { join, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	loadConfigFile,
	mergeConfig,
	parseConfigFile,
	resolveEngineConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

const EXAMPLE = join(__dirname, "..", "..", "config", "engine.example.json");

describe("EngineConfig", () => {
	describe("DEFAULT_ENGINE_CONFIG", () => {
		it("carries the classic Turtle limits", () => {
			expect(DEFAULT_ENGINE_CONFIG.risk).toEqual({
				maxUnitsPerSymbol: 4,
				maxUnitsPerGroup: 6,
				maxUnitsPerDirection: 12,
				maxTotalNExposure: 10,
				warnRatio: 0.8,
			});
			expect(DEFAULT_ENGINE_CONFIG.pyramid).toEqual({ maxUnits: 4, intervalN: 0.5, stopDistanceN: 2 });
		});
	});

	describe("mergeConfig", () => {
		it("overlays nested sections field by field", () => {
			const merged = mergeConfig(DEFAULT_ENGINE_CONFIG, {
				risk: { maxUnitsPerSymbol: 3 },
				sizing: { pointValues: { es: "50" } },
				correlationGroups: { aapl: "tech" },
			});

			expect(merged.risk.maxUnitsPerSymbol).toBe(3);
			expect(merged.risk.maxUnitsPerGroup).toBe(6);
			expect(merged.sizing.pointValues).toEqual({ ES: "50" });
			expect(merged.sizing.accountEquity).toBe(DEFAULT_ENGINE_CONFIG.sizing.accountEquity);
			expect(merged.correlationGroups).toEqual({ AAPL: "tech" });
		});
	});

	describe("parseConfigFile", () => {
		it("accepts a partial file", () => {
			expect(parseConfigFile('{"pyramid":{"maxUnits":5}}', "inline")).toEqual({ pyramid: { maxUnits: 5 } });
		});

		it("reports invalid JSON", () => {
			expect(() => parseConfigFile("{", "cfg.json")).toThrow("Config file cfg.json is not valid JSON");
		});

		it("lists every schema issue", () => {
			let caught: unknown;
			try {
				parseConfigFile('{"risk":{"maxUnitsPerSymbol":0},"colour":"blue"}', "cfg.json");
			} catch (e) {
				caught = e;
			}
			expect(caught).toBeInstanceOf(ConfigError);
			expect(caught instanceof ConfigError && caught.context["issues"]).toHaveLength(2);
			expect(caught instanceof ConfigError && caught.message).toMatch(/^Config file cfg\.json is invalid: /);
		});
	});

	describe("loadConfigFile", () => {
		it("loads the shipped example", () => {
			const file = loadConfigFile(EXAMPLE);

			expect(file.sizing?.pointValues).toEqual({ ES: "50", NQ: "20", GC: "100", CL: "1000" });
			expect(file.correlationGroups?.["GC"]).toBe("metals");
		});

		it("raises a ConfigError for a missing file", () => {
			expect(() => loadConfigFile("/nonexistent/engine.json")).toThrow(
				"Cannot read config file /nonexistent/engine.json",
			);
		});
	});

	describe("configFromEnv", () => {
		it("is empty without TURTLE_ variables", () => {
			expect(configFromEnv({ HOME: "/root" })).toEqual({});
		});

		it("reads the supported variables", () => {
			expect(
				configFromEnv({
					TURTLE_DATA_DIR: "/var/turtle",
					TURTLE_LOG_LEVEL: "debug",
					TURTLE_LOCK_STALE_MS: "60000",
					TURTLE_ACCOUNT_EQUITY: " 50000 ",
					TURTLE_COLLABORATOR_TIMEOUT_MS: "2500",
				}),
			).toEqual({
				dataDir: "/var/turtle",
				logLevel: "debug",
				lockStaleMs: 60_000,
				collaboratorTimeoutMs: 2_500,
				sizing: { accountEquity: "50000" },
			});
		});

		it.each([
			["TURTLE_LOG_LEVEL", "loud", 'Invalid TURTLE_LOG_LEVEL: "loud"'],
			["TURTLE_LOCK_STALE_MS", "15m", 'Invalid TURTLE_LOCK_STALE_MS: "15m" must be a positive integer'],
			["TURTLE_LOCK_STALE_MS", "0", 'Invalid TURTLE_LOCK_STALE_MS: "0" must be a positive integer'],
			["TURTLE_ACCOUNT_EQUITY", "-5", 'Invalid TURTLE_ACCOUNT_EQUITY: "-5" must be a decimal'],
		])("rejects %s=%s", (key, value, message) => {
			expect(() => configFromEnv({ [key]: value })).toThrow(message);
		});
	});

	describe("resolveEngineConfig", () => {
		it("layers defaults, file and environment and resolves the data dir", () => {
			const config = resolveEngineConfig({
				configPath: EXAMPLE,
				env: { TURTLE_ACCOUNT_EQUITY: "80000" },
				cwd: "/srv/turtle",
			});

			expect(config.dataDir).toBe(resolve("/srv/turtle", "data"));
			expect(config.sizing.accountEquity).toBe("80000");
			expect(config.sizing.pointValues["ES"]).toBe("50");
			expect(config.correlationGroups["AAPL"]).toBe("tech");
		});
	});
});
