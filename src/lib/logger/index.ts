/**
 * Logger wrapper — structured logging backed by pino.
 *
 * The engine itself never logs. Sinks, stores and the example runners
 * receive a Logger so their output can be captured in tests.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	readonly bindings?: Record<string, unknown>;
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type Level = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function write(
	target: pino.Logger,
	level: Level,
	msgOrObj: string | Record<string, unknown>,
	msg?: string,
): void {
	if (typeof msgOrObj === "string") {
		target[level](msgOrObj);
	} else {
		target[level](msgOrObj, msg ?? "");
	}
}

function wrapPino(target: pino.Logger): Logger {
	return {
		info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(target, "info", msgOrObj, msg);
		},
		warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(target, "warn", msgOrObj, msg);
		},
		error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(target, "error", msgOrObj, msg);
		},
		debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(target, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(target.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ tokenId: "tok-up" }, "Position opened");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const root = config.destination ? pino(pinoOptions, config.destination) : pino(pinoOptions);
	return wrapPino(config.bindings ? root.child(config.bindings) : root);
}
