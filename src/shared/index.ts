export {
	type MarketId,
	type TokenId,
	type FillId,
	marketId,
	tokenId,
	fillId,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	mapErr,
	tryCatch,
	unwrap,
} from "./result.js";

export {
	ErrorCategory,
	LedgerError,
	InvalidEventReason,
	InvalidEventError,
	InconsistentStateError,
	PersistenceError,
	ConfigError,
	toError,
	isInvalidEventError,
	isInconsistentStateError,
	isPersistenceError,
	isConfigError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export {
	TradeSide,
	Direction,
	directionOf,
	flipDirection,
	complementPrice,
} from "./trade-side.js";
export { type Clock, SystemClock, FakeClock, secondsToMs } from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
