/**
 * Engine configuration.
 *
 * Defaults are safe for replay and tests; a live session overrides them
 * from FILLBOOK_* environment variables and explicit options.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface EngineConfig {
	/** Share-size tolerance under which a residual position counts as fully closed */
	readonly sizeEpsilon: number;
	/** Whether a SELL with no held position opens a short instead of being rejected */
	readonly allowShortOpen: boolean;
	/** Where FileStateStore keeps the ledger snapshot */
	readonly stateFilePath: string;
	readonly logLevel: LogLevel;
	/** Maximum notional per copied fill, in USDC */
	readonly maxTradeUsdc: number;
	/** Multiplier applied to the source fill size before the cap */
	readonly riskMultiplier: number;
	/** Wallet whose fills are copied; fills from other wallets are ignored when set */
	readonly targetWallet?: string | undefined;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	sizeEpsilon: 1e-9,
	allowShortOpen: false,
	stateFilePath: "fillbook-state.json",
	logLevel: "info",
	maxTradeUsdc: 100,
	riskMultiplier: 1,
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shape for constructing Partial<EngineConfig>. */
interface MutableEngineConfig {
	sizeEpsilon?: number;
	allowShortOpen?: boolean;
	stateFilePath?: string;
	logLevel?: LogLevel;
	maxTradeUsdc?: number;
	riskMultiplier?: number;
	targetWallet?: string;
}

/**
 * Reads config values from environment variables.
 * Supported: FILLBOOK_SIZE_EPSILON, FILLBOOK_ALLOW_SHORT_OPEN, FILLBOOK_STATE_FILE,
 * FILLBOOK_LOG_LEVEL, FILLBOOK_MAX_TRADE_USDC, FILLBOOK_RISK_MULTIPLIER,
 * FILLBOOK_TARGET_WALLET.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	const sizeEpsilon = parsePositiveNumber(env, "FILLBOOK_SIZE_EPSILON");
	if (sizeEpsilon !== undefined) result.sizeEpsilon = sizeEpsilon;

	const maxTradeUsdc = parsePositiveNumber(env, "FILLBOOK_MAX_TRADE_USDC");
	if (maxTradeUsdc !== undefined) result.maxTradeUsdc = maxTradeUsdc;

	const riskMultiplier = parsePositiveNumber(env, "FILLBOOK_RISK_MULTIPLIER");
	if (riskMultiplier !== undefined) result.riskMultiplier = riskMultiplier;

	const allowShortOpen = parseBoolean(env, "FILLBOOK_ALLOW_SHORT_OPEN");
	if (allowShortOpen !== undefined) result.allowShortOpen = allowShortOpen;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const stateFile = env["FILLBOOK_STATE_FILE"];
	if (stateFile) result.stateFilePath = stateFile;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const wallet = env["FILLBOOK_TARGET_WALLET"];
	if (wallet) result.targetWallet = wallet.trim().toLowerCase();

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawLevel = env["FILLBOOK_LOG_LEVEL"];
	if (rawLevel) {
		const level = LOG_LEVELS.find((l) => l === rawLevel.trim().toLowerCase());
		if (level === undefined) {
			throw new ConfigError(`Invalid FILLBOOK_LOG_LEVEL: "${rawLevel}"`, {
				allowed: LOG_LEVELS,
			});
		}
		result.logLevel = level;
	}

	return result;
}

/** Merge defaults, environment, and explicit overrides (later wins). */
export function resolveConfig(
	overrides: Partial<EngineConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
	return { ...DEFAULT_ENGINE_CONFIG, ...configFromEnv(env), ...overrides };
}

function strictParseNumber(raw: string): number {
	const trimmed = raw.trim();
	if (!/^[0-9]*\.?[0-9]+(e[-+]?[0-9]+)?$/i.test(trimmed)) {
		return Number.NaN;
	}
	return Number(trimmed);
}

function parsePositiveNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseNumber(raw);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive number`);
	}
	return parsed;
}

function parseBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
	const raw = env[key];
	if (raw === undefined) return undefined;
	const normalized = raw.trim().toLowerCase();
	if (["true", "1", "yes"].includes(normalized)) return true;
	if (["false", "0", "no", ""].includes(normalized)) return false;
	throw new ConfigError(`Invalid ${key}: "${raw}" must be true or false`);
}
