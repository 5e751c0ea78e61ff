import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isValidationError } from "../lib/validation/index.js";
import { isPersistenceError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { Direction } from "../shared/trade-side.js";
import { FileStateStore } from "./file-state-store.js";
import type { EngineSnapshot } from "./types.js";

// ── Test data factories ─────────────────────────────────────────────

function makeSnapshot(savedAtMs = 10_000, size = "60"): EngineSnapshot {
	return {
		version: 1,
		savedAtMs,
		ledger: {
			positions: [
				{
					tokenId: "tok-up",
					marketId: "m-1",
					outcome: "Up",
					size,
					entryPrice: "0.6",
					direction: Direction.Long,
					openedAtMs: 1_000,
					updatedAtMs: 2_000,
				},
			],
			closedTrades: [
				{
					marketId: "m-1",
					tokenId: "tok-up",
					outcome: "Up",
					kind: "PARTIAL_CLOSE",
					closingSize: "40",
					entryPrice: "0.6",
					exitPrice: "0.7",
					realizedPnl: "4",
					timestampMs: 2_000,
				},
			],
		},
		cursor: { lastSeenTimestampMs: 2_000, seenFillIds: ["0x1", "0x2"] },
	};
}

describe("FileStateStore", () => {
	let dir: string;
	let filePath: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "fillbook-state-"));
		filePath = join(dir, "state.json");
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe("load", () => {
		it("returns null when nothing has been saved", async () => {
			const store = FileStateStore.create({ filePath });

			expect(unwrap(await store.load())).toBeNull();
		});

		it("reports unparseable JSON", async () => {
			await writeFile(filePath, "{not json", "utf-8");
			const result = await FileStateStore.create({ filePath }).load();

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(isPersistenceError(result.error)).toBe(true);
				expect(result.error.message).toBe(`State file ${filePath} is not valid JSON`);
			}
		});

		it("reports a snapshot of the wrong shape", async () => {
			await writeFile(filePath, JSON.stringify({ ...makeSnapshot(), version: 2 }), "utf-8");
			const result = await FileStateStore.create({ filePath }).load();

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(isValidationError(result.error)).toBe(true);
				expect(result.error.message).toBe(`State file ${filePath} failed validation`);
			}
		});

		it("reports read failures other than a missing file", async () => {
			const result = await FileStateStore.create({ filePath: dir }).load();

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(isPersistenceError(result.error)).toBe(true);
				expect(result.error.context).toMatchObject({ filePath: dir, code: "EISDIR" });
			}
		});
	});

	describe("save", () => {
		it("round-trips a snapshot", async () => {
			const store = FileStateStore.create({ filePath });
			const snapshot = makeSnapshot();

			unwrap(await store.save(snapshot));

			expect(unwrap(await store.load())).toEqual(snapshot);
		});

		it("writes indented JSON with a trailing newline by default", async () => {
			const store = FileStateStore.create({ filePath });
			const snapshot = makeSnapshot();

			unwrap(await store.save(snapshot));

			expect(await readFile(filePath, "utf-8")).toBe(`${JSON.stringify(snapshot, null, 2)}\n`);
		});

		it("writes compact JSON when pretty is off", async () => {
			const store = FileStateStore.create({ filePath, pretty: false });
			const snapshot = makeSnapshot();

			unwrap(await store.save(snapshot));

			expect(await readFile(filePath, "utf-8")).toBe(`${JSON.stringify(snapshot)}\n`);
		});

		it("creates missing parent directories", async () => {
			const nested = join(dir, "a", "b", "state.json");
			const store = FileStateStore.create({ filePath: nested });

			unwrap(await store.save(makeSnapshot()));

			expect(store.filePath).toBe(nested);
			expect(unwrap(await store.load())?.savedAtMs).toBe(10_000);
		});

		it("applies concurrent saves in call order and leaves no temp file", async () => {
			const store = FileStateStore.create({ filePath });

			const results = await Promise.all([
				store.save(makeSnapshot(1, "10")),
				store.save(makeSnapshot(2, "20")),
				store.save(makeSnapshot(3, "30")),
			]);
			await store.flush();

			expect(results.every((r) => r.ok)).toBe(true);
			const loaded = unwrap(await store.load());
			expect(loaded?.savedAtMs).toBe(3);
			expect(loaded?.ledger.positions[0]?.size).toBe("30");
			expect(await readdir(dir)).toEqual(["state.json"]);
		});

		it("reports a write failure as a persistence error", async () => {
			const blocker = join(dir, "blocker");
			await writeFile(blocker, "", "utf-8");
			const store = FileStateStore.create({ filePath: join(blocker, "state.json") });

			const result = await store.save(makeSnapshot());

			expect(result.ok).toBe(false);
			if (!result.ok) expect(isPersistenceError(result.error)).toBe(true);
		});

		it("keeps working after a failed save", async () => {
			const sub = join(dir, "sub");
			await writeFile(sub, "", "utf-8");
			const store = FileStateStore.create({ filePath: join(sub, "state.json") });
			const first = await store.save(makeSnapshot());
			await rm(sub);
			await mkdir(sub);

			const second = await store.save(makeSnapshot(20_000));

			expect(first.ok).toBe(false);
			expect(second.ok).toBe(true);
			expect(unwrap(await store.load())?.savedAtMs).toBe(20_000);
		});
	});
});
