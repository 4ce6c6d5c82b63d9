/**
 * Engine configuration.
 *
 * Resolution order: DEFAULT_ENGINE_CONFIG, then an optional JSON config file
 * (validated), then TURTLE_* environment overrides. The resolved object is
 * handed to the orchestrator at construction; nothing reads process.env later.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { validate, z } from "../lib/validation/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface RiskLimitConfig {
	/** Max units held in one symbol. */
	readonly maxUnitsPerSymbol: number;
	/** Max units across one correlation group. */
	readonly maxUnitsPerGroup: number;
	/** Max units across all positions in one direction. */
	readonly maxUnitsPerDirection: number;
	/** Max aggregate N exposure (Σ N at entry over all units). */
	readonly maxTotalNExposure: number;
	/** Utilisation ratio at which `status` and runs emit near-limit warnings. */
	readonly warnRatio: number;
}

export interface PyramidConfig {
	readonly maxUnits: number;
	/** Favorable move, in N, required between consecutive units. */
	readonly intervalN: number;
	/** Distance of the protective stop from the newest unit, in N. */
	readonly stopDistanceN: number;
}

export interface FillMatchConfig {
	/** Length of the window an entry order is expected to fill in. */
	readonly entryWindowMs: number;
	/** Slack applied on both sides of a window before rejecting a fill by time. */
	readonly timeToleranceMs: number;
	/** Price-only fallback accepts fills within this % of the intended price. */
	readonly maxPriceDeviationPct: number;
	/** How far back fills are requested, relative to the oldest open window. */
	readonly lookbackMs: number;
}

export interface BackoffConfig {
	readonly baseMs: number;
	readonly maxMs: number;
}

export interface SizingConfig {
	readonly accountEquity: string;
	/** Fraction of equity risked per unit, as a percentage. */
	readonly riskPerUnitPct: number;
	readonly defaultPointValue: string;
	readonly pointValues: Readonly<Record<string, string>>;
}

export interface EngineConfig {
	readonly dataDir: string;
	readonly logLevel: LogLevel;
	readonly lockStaleMs: number;
	readonly maxBackups: number;
	readonly collaboratorTimeoutMs: number;
	readonly backoff: BackoffConfig;
	readonly risk: RiskLimitConfig;
	readonly pyramid: PyramidConfig;
	readonly fills: FillMatchConfig;
	readonly sizing: SizingConfig;
	/** Symbol → correlation group. Unlisted symbols fall in `defaultGroup`. */
	readonly correlationGroups: Readonly<Record<string, string>>;
	readonly defaultGroup: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	dataDir: "data",
	logLevel: "info",
	lockStaleMs: 15 * 60_000,
	maxBackups: 7,
	collaboratorTimeoutMs: 10_000,
	backoff: { baseMs: 5 * 60_000, maxMs: 6 * 3_600_000 },
	risk: {
		maxUnitsPerSymbol: 4,
		maxUnitsPerGroup: 6,
		maxUnitsPerDirection: 12,
		maxTotalNExposure: 10,
		warnRatio: 0.8,
	},
	pyramid: { maxUnits: 4, intervalN: 0.5, stopDistanceN: 2 },
	fills: {
		entryWindowMs: 24 * 3_600_000,
		timeToleranceMs: 30 * 60_000,
		maxPriceDeviationPct: 2,
		lookbackMs: 7 * 24 * 3_600_000,
	},
	sizing: {
		accountEquity: "100000",
		riskPerUnitPct: 1,
		defaultPointValue: "1",
		pointValues: {},
	},
	correlationGroups: {},
	defaultGroup: "default",
};

// ── File schema ──────────────────────────────────────────────────────

const decimalString = z
	.union([z.string(), z.number()])
	.transform((v) => String(v))
	.refine((v) => /^\d+(\.\d+)?$/.test(v.trim()), "must be a non-negative decimal");

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const configFileSchema = z
	.object({
		dataDir: z.string().min(1),
		logLevel: logLevelSchema,
		lockStaleMs: z.number().int().positive(),
		maxBackups: z.number().int().nonnegative(),
		collaboratorTimeoutMs: z.number().int().positive(),
		backoff: z
			.object({ baseMs: z.number().int().positive(), maxMs: z.number().int().positive() })
			.strict()
			.partial(),
		risk: z
			.object({
				maxUnitsPerSymbol: z.number().int().positive(),
				maxUnitsPerGroup: z.number().int().positive(),
				maxUnitsPerDirection: z.number().int().positive(),
				maxTotalNExposure: z.number().positive(),
				warnRatio: z.number().gt(0).lte(1),
			})
			.strict()
			.partial(),
		pyramid: z
			.object({
				maxUnits: z.number().int().positive(),
				intervalN: z.number().positive(),
				stopDistanceN: z.number().positive(),
			})
			.strict()
			.partial(),
		fills: z
			.object({
				entryWindowMs: z.number().int().positive(),
				timeToleranceMs: z.number().int().nonnegative(),
				maxPriceDeviationPct: z.number().nonnegative(),
				lookbackMs: z.number().int().positive(),
			})
			.strict()
			.partial(),
		sizing: z
			.object({
				accountEquity: decimalString,
				riskPerUnitPct: z.number().gt(0).lte(100),
				defaultPointValue: decimalString,
				pointValues: z.record(decimalString),
			})
			.strict()
			.partial(),
		correlationGroups: z.record(z.string().min(1)),
		defaultGroup: z.string().min(1),
	})
	.strict()
	.partial();

export type EngineConfigFile = z.infer<typeof configFileSchema>;

/** Deep-merge a validated file/env overlay onto a base config. */
export function mergeConfig(base: EngineConfig, overlay: EngineConfigFile): EngineConfig {
	const { backoff, risk, pyramid, fills, sizing } = overlay;
	return {
		dataDir: overlay.dataDir ?? base.dataDir,
		logLevel: overlay.logLevel ?? base.logLevel,
		lockStaleMs: overlay.lockStaleMs ?? base.lockStaleMs,
		maxBackups: overlay.maxBackups ?? base.maxBackups,
		collaboratorTimeoutMs: overlay.collaboratorTimeoutMs ?? base.collaboratorTimeoutMs,
		backoff: {
			baseMs: backoff?.baseMs ?? base.backoff.baseMs,
			maxMs: backoff?.maxMs ?? base.backoff.maxMs,
		},
		risk: {
			maxUnitsPerSymbol: risk?.maxUnitsPerSymbol ?? base.risk.maxUnitsPerSymbol,
			maxUnitsPerGroup: risk?.maxUnitsPerGroup ?? base.risk.maxUnitsPerGroup,
			maxUnitsPerDirection: risk?.maxUnitsPerDirection ?? base.risk.maxUnitsPerDirection,
			maxTotalNExposure: risk?.maxTotalNExposure ?? base.risk.maxTotalNExposure,
			warnRatio: risk?.warnRatio ?? base.risk.warnRatio,
		},
		pyramid: {
			maxUnits: pyramid?.maxUnits ?? base.pyramid.maxUnits,
			intervalN: pyramid?.intervalN ?? base.pyramid.intervalN,
			stopDistanceN: pyramid?.stopDistanceN ?? base.pyramid.stopDistanceN,
		},
		fills: {
			entryWindowMs: fills?.entryWindowMs ?? base.fills.entryWindowMs,
			timeToleranceMs: fills?.timeToleranceMs ?? base.fills.timeToleranceMs,
			maxPriceDeviationPct: fills?.maxPriceDeviationPct ?? base.fills.maxPriceDeviationPct,
			lookbackMs: fills?.lookbackMs ?? base.fills.lookbackMs,
		},
		sizing: {
			accountEquity: sizing?.accountEquity ?? base.sizing.accountEquity,
			riskPerUnitPct: sizing?.riskPerUnitPct ?? base.sizing.riskPerUnitPct,
			defaultPointValue: sizing?.defaultPointValue ?? base.sizing.defaultPointValue,
			pointValues: normalizeKeys({ ...base.sizing.pointValues, ...(sizing?.pointValues ?? {}) }),
		},
		correlationGroups: normalizeKeys({
			...base.correlationGroups,
			...(overlay.correlationGroups ?? {}),
		}),
		defaultGroup: overlay.defaultGroup ?? base.defaultGroup,
	};
}

function normalizeKeys(bySymbol: Record<string, string>): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [symbol, value] of Object.entries(bySymbol)) {
		out[symbol.trim().toUpperCase()] = value;
	}
	return out;
}

/**
 * Parse a config file body. Unknown keys and wrong types are a ConfigError
 * listing every issue.
 */
export function parseConfigFile(raw: string, source: string): EngineConfigFile {
	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (e) {
		throw new ConfigError(`Config file ${source} is not valid JSON`, { source, cause: e });
	}
	const result = validate(configFileSchema, data);
	if (!result.ok) {
		const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
		throw new ConfigError(`Config file ${source} is invalid: ${issues.join("; ")}`, {
			source,
			issues,
		});
	}
	return result.value;
}

/** Read and validate a JSON config file from disk. */
export function loadConfigFile(path: string): EngineConfigFile {
	let raw: string;
	try {
		raw = readFileSync(path, "utf8");
	} catch (e) {
		throw new ConfigError(`Cannot read config file ${path}`, { source: path, cause: e });
	}
	return parseConfigFile(raw, path);
}

// ── Environment overrides ────────────────────────────────────────────

/** Mutable builder shape for constructing the env overlay without TS4111 index issues. */
interface MutableEnvOverlay {
	dataDir?: string;
	logLevel?: LogLevel;
	lockStaleMs?: number;
	collaboratorTimeoutMs?: number;
	sizing?: { accountEquity?: string };
}

/**
 * Reads overrides from environment variables.
 * Supported: TURTLE_DATA_DIR, TURTLE_LOG_LEVEL, TURTLE_LOCK_STALE_MS,
 * TURTLE_ACCOUNT_EQUITY, TURTLE_COLLABORATOR_TIMEOUT_MS.
 * @throws ConfigError if a variable contains an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigFile {
	const result: MutableEnvOverlay = {};

	const dataDir = env["TURTLE_DATA_DIR"];
	if (dataDir) result.dataDir = dataDir;

	const level = env["TURTLE_LOG_LEVEL"];
	if (level) {
		const parsed = logLevelSchema.safeParse(level);
		if (!parsed.success) {
			throw new ConfigError(`Invalid TURTLE_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = parsed.data;
	}

	const staleMs = parsePositiveIntEnv(env, "TURTLE_LOCK_STALE_MS");
	if (staleMs !== undefined) result.lockStaleMs = staleMs;

	const timeoutMs = parsePositiveIntEnv(env, "TURTLE_COLLABORATOR_TIMEOUT_MS");
	if (timeoutMs !== undefined) result.collaboratorTimeoutMs = timeoutMs;

	const equity = env["TURTLE_ACCOUNT_EQUITY"];
	if (equity) {
		if (!/^\d+(\.\d+)?$/.test(equity.trim())) {
			throw new ConfigError(`Invalid TURTLE_ACCOUNT_EQUITY: "${equity}" must be a decimal`);
		}
		result.sizing = { accountEquity: equity.trim() };
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parsePositiveIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`);
	}
	return parsed;
}

/** Defaults ← optional config file ← environment. `dataDir` is resolved to an absolute path. */
export function resolveEngineConfig(options: {
	readonly configPath?: string | undefined;
	readonly env?: NodeJS.ProcessEnv;
	readonly cwd?: string;
}): EngineConfig {
	let config = DEFAULT_ENGINE_CONFIG;
	if (options.configPath !== undefined) {
		config = mergeConfig(config, loadConfigFile(options.configPath));
	}
	config = mergeConfig(config, configFromEnv(options.env ?? process.env));
	return { ...config, dataDir: resolve(options.cwd ?? process.cwd(), config.dataDir) };
}
