/**
 * LedgerError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal) so callers
 * can decide whether to drop the input, retry the I/O, or halt.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing LedgerError subclasses with optional cause chain. */
interface LedgerErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for the engine, with category-based retry semantics. */
export class LedgerError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "LedgerError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Why a fill was refused at the engine boundary. */
export const InvalidEventReason = {
	Malformed: "malformed",
	NonPositiveSize: "non_positive_size",
	PriceOutOfRange: "price_out_of_range",
	SellWithoutPosition: "sell_without_position",
} as const;

export type InvalidEventReason = (typeof InvalidEventReason)[keyof typeof InvalidEventReason];

/** Non-retryable: the fill violates the input contract and must be dropped. */
export class InvalidEventError extends LedgerError {
	readonly reason: InvalidEventReason;

	constructor(
		message: string,
		reason: InvalidEventReason,
		context: Record<string, unknown> & LedgerErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "INVALID_EVENT", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidEventError";
		this.reason = reason;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), reason: this.reason };
	}
}

/** Fatal: ledger contents disagree with what a mutation or snapshot requires. */
export class InconsistentStateError extends LedgerError {
	constructor(message: string, context: Record<string, unknown> & LedgerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INCONSISTENT_STATE", ErrorCategory.Fatal, rest);
		this.name = "InconsistentStateError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: state could not be read from or written to durable storage. */
export class PersistenceError extends LedgerError {
	constructor(message: string, context: Record<string, unknown> & LedgerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "PERSISTENCE_ERROR", ErrorCategory.Retryable, rest);
		this.name = "PersistenceError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends LedgerError {
	constructor(message: string, context: Record<string, unknown> & LedgerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Normalize anything thrown into an Error. */
export function toError(e: unknown): Error {
	return e instanceof Error ? e : new Error(String(e));
}

// ── Type guards ──────────────────────────────────────────────────────

export function isInvalidEventError(e: unknown): e is InvalidEventError {
	return e instanceof InvalidEventError;
}

export function isInconsistentStateError(e: unknown): e is InconsistentStateError {
	return e instanceof InconsistentStateError;
}

export function isPersistenceError(e: unknown): e is PersistenceError {
	return e instanceof PersistenceError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
