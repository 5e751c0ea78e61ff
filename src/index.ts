// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type MarketId,
	type TokenId,
	type FillId,
	marketId,
	tokenId,
	fillId,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	mapErr,
	tryCatch,
	unwrap,
	Decimal,
	TradeSide,
	Direction,
	complementPrice,
	type Clock,
	SystemClock,
	FakeClock,
	secondsToMs,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
	LedgerError,
	ErrorCategory,
	InvalidEventReason,
	InvalidEventError,
	InconsistentStateError,
	PersistenceError,
	ConfigError,
	isInvalidEventError,
	isInconsistentStateError,
	isPersistenceError,
	isConfigError,
} from "./shared/index.js";

// ── Ledger ───────────────────────────────────────────────────────────
export { PositionLedger } from "./ledger/position-ledger.js";
export type { ClosedTradeRecord, LedgerView, Position } from "./ledger/types.js";
export type { LedgerDelta, LedgerOp } from "./ledger/ledger-delta.js";
export {
	type ClosedTradeRow,
	type LedgerSnapshot,
	type PositionRow,
	ledgerSnapshotSchema,
} from "./ledger/snapshot.js";

// ── Classification ───────────────────────────────────────────────────
export {
	type ClassifierOptions,
	DEFAULT_CLASSIFIER_OPTIONS,
	classifyFill,
} from "./classification/classifier.js";
export {
	ClassificationKind,
	type ClosingKind,
	CLOSING_KINDS,
	isClosingKind,
} from "./classification/kind.js";
export {
	type TradeEvent,
	type TradeEventInput,
	parseTradeEvent,
	checkTradeEvent,
	tradeEventSchema,
} from "./classification/trade-event.js";
export {
	type Classification,
	type ClosingClassification,
	type HedgeClassification,
	isClosingClassification,
} from "./classification/types.js";

// ── Engine ───────────────────────────────────────────────────────────
export {
	type ProcessError,
	type TradeEngineConfig,
	TradeEngine,
} from "./engine/trade-engine.js";
export {
	type CopySessionConfig,
	type IngestOutcome,
	type OpenError,
	CopySession,
} from "./engine/copy-session.js";

// ── Feed ─────────────────────────────────────────────────────────────
export {
	type ActivityFill,
	type ActivityRecordInput,
	activityRecordSchema,
	parseActivity,
} from "./feed/activity.js";
export {
	type FillCursorOptions,
	type FillCursorSnapshot,
	CursorDecision,
	DEFAULT_MAX_SEEN_FILLS,
	FillCursor,
} from "./feed/fill-cursor.js";

// ── Sizing ───────────────────────────────────────────────────────────
export {
	type CopySizerConfig,
	type CopySizingResult,
	type FillSizer,
	CopySizer,
} from "./sizing/index.js";

// ── Notifications ────────────────────────────────────────────────────
export {
	type FillNotification,
	type HandlerErrorCallback,
	type NotificationEvents,
	type NotificationSink,
	EmitterNotificationSink,
	LoggerNotificationSink,
	combineSinks,
	nullSink,
	toNotification,
} from "./events/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type EngineSnapshot,
	type FileStateStoreConfig,
	type LoadError,
	type StateStore,
	FileStateStore,
	MemoryStateStore,
	SNAPSHOT_VERSION,
	engineSnapshotSchema,
} from "./persistence/index.js";

// ── Reporting ────────────────────────────────────────────────────────
export {
	type StatusOptions,
	type StatusSource,
	formatNotification,
	formatPnl,
	formatStatus,
} from "./reporting/format.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export {
	type ValidationIssue,
	ValidationError,
	isValidationError,
	validate,
} from "./lib/validation/index.js";
