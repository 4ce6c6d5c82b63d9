export {
	type OrderRef,
	type PositionId,
	type Ticker,
	idToString,
	newPositionId,
	orderRef,
	positionId,
	ticker,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	EngineError,
	AmbiguousMatchError,
	CollaboratorUnavailableError,
	ConfigError,
	CorruptStateError,
	InvalidTransitionError,
	LockError,
	SystemError,
	TimeoutError,
	classifyError,
	isCorruptState,
} from "./errors.js";

export { Decimal, percentOf, relativeDeviationPct } from "./decimal.js";
export {
	Direction,
	FillSide,
	adverseOffset,
	entrySide,
	exitSide,
	favorableOffset,
	stopBreached,
	tightenStop,
} from "./direction.js";
export { type Clock, SystemClock, FakeClock, Duration, parseIso, toIso } from "./time.js";
export {
	type BackoffConfig,
	type EngineConfig,
	type EngineConfigFile,
	type FillMatchConfig,
	type PyramidConfig,
	type RiskLimitConfig,
	type SizingConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	loadConfigFile,
	mergeConfig,
	parseConfigFile,
	resolveEngineConfig,
} from "./config.js";
