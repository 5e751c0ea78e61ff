import { describe, expect, it } from "vitest";
import {
	ConfigError,
	ErrorCategory,
	InconsistentStateError,
	InvalidEventError,
	InvalidEventReason,
	type LedgerError,
	PersistenceError,
	isConfigError,
	isInconsistentStateError,
	isInvalidEventError,
	isPersistenceError,
	toError,
} from "./errors.js";

describe("LedgerError hierarchy", () => {
	describe("error categories", () => {
		const cases: Array<[string, LedgerError, ErrorCategory]> = [
			[
				"InvalidEventError",
				new InvalidEventError("bad size", InvalidEventReason.NonPositiveSize),
				ErrorCategory.NonRetryable,
			],
			["InconsistentStateError", new InconsistentStateError("drift"), ErrorCategory.Fatal],
			["PersistenceError", new PersistenceError("disk full"), ErrorCategory.Retryable],
			["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
		];

		it.each(cases)("%s has category %s", (_name, error, expected) => {
			expect(error.category).toBe(expected);
		});

		it("only PersistenceError is retryable", () => {
			expect(cases.filter(([, e]) => e.isRetryable).map(([name]) => name)).toEqual([
				"PersistenceError",
			]);
		});
	});

	describe("codes and names", () => {
		it("InvalidEventError", () => {
			const error = new InvalidEventError("x", InvalidEventReason.PriceOutOfRange);
			expect(error.code).toBe("INVALID_EVENT");
			expect(error.name).toBe("InvalidEventError");
			expect(error.reason).toBe("price_out_of_range");
			expect(error).toBeInstanceOf(Error);
		});

		it("InconsistentStateError", () => {
			const error = new InconsistentStateError("x");
			expect(error.code).toBe("INCONSISTENT_STATE");
			expect(error.name).toBe("InconsistentStateError");
		});

		it("PersistenceError and ConfigError", () => {
			expect(new PersistenceError("x").code).toBe("PERSISTENCE_ERROR");
			expect(new ConfigError("x").code).toBe("CONFIG_ERROR");
		});
	});

	describe("context and cause", () => {
		it("keeps context fields and moves cause onto the error", () => {
			const cause = new Error("ENOSPC");
			const error = new PersistenceError("save failed", { filePath: "/tmp/x", cause });

			expect(error.context).toEqual({ filePath: "/tmp/x" });
			expect(error.cause).toBe(cause);
		});

		it("leaves cause unset when none is given", () => {
			expect(new InconsistentStateError("x", { tokenId: "tok-up" }).cause).toBeUndefined();
		});
	});

	describe("toJSON", () => {
		it("serializes the structured fields", () => {
			const error = new InconsistentStateError("changed underneath", { tokenId: "tok-up" });

			expect(error.toJSON()).toEqual({
				name: "InconsistentStateError",
				message: "changed underneath",
				code: "INCONSISTENT_STATE",
				category: "fatal",
				retryable: false,
				context: { tokenId: "tok-up" },
			});
		});

		it("adds the reason for InvalidEventError", () => {
			const error = new InvalidEventError("no position", InvalidEventReason.SellWithoutPosition, {
				fillId: "0xabc",
			});

			expect(error.toJSON()).toMatchObject({
				code: "INVALID_EVENT",
				reason: "sell_without_position",
				context: { fillId: "0xabc" },
			});
		});
	});

	describe("type guards", () => {
		it("match only their own class", () => {
			const invalid = new InvalidEventError("x", InvalidEventReason.Malformed);
			const inconsistent = new InconsistentStateError("x");

			expect(isInvalidEventError(invalid)).toBe(true);
			expect(isInvalidEventError(inconsistent)).toBe(false);
			expect(isInconsistentStateError(inconsistent)).toBe(true);
			expect(isPersistenceError(new PersistenceError("x"))).toBe(true);
			expect(isConfigError(new Error("x"))).toBe(false);
		});
	});

	describe("toError", () => {
		it("passes errors through and wraps anything else", () => {
			const error = new Error("boom");
			expect(toError(error)).toBe(error);
			expect(toError("boom").message).toBe("boom");
		});
	});
});
