// ── Shared kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Positions ────────────────────────────────────────────────────────
export * from "./position/index.js";

// ── Persistence and run lock ─────────────────────────────────────────
export * from "./persistence/index.js";
export * from "./lock/index.js";

// ── Fill matching, pyramiding, risk and sizing ───────────────────────
export * from "./fills/index.js";
export * from "./pyramid/index.js";
export * from "./risk/index.js";
export * from "./sizing/index.js";

// ── Collaborators and notifications ──────────────────────────────────
export * from "./collaborators/index.js";
export * from "./notify/index.js";

// ── Orchestration ────────────────────────────────────────────────────
export * from "./engine/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError, validate } from "./lib/validation/index.js";
