/**
 * FileStateStore — keeps the latest engine snapshot in one JSON file.
 *
 * Saves go through a serialized write queue and land atomically: the
 * snapshot is written to a sibling temp file, then renamed over the target.
 * A crash mid-save leaves the previous snapshot intact.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { validate } from "../lib/validation/index.js";
import { PersistenceError } from "../shared/errors.js";
import { type Result, err, ok, tryCatch } from "../shared/result.js";
import { type EngineSnapshot, type LoadError, type StateStore, engineSnapshotSchema } from "./types.js";

/** Configuration for creating a FileStateStore instance. */
export interface FileStateStoreConfig {
	readonly filePath: string;
	/** Indent the JSON for humans (default true) */
	readonly pretty?: boolean;
}

export class FileStateStore implements StateStore {
	private readonly config: FileStateStoreConfig;
	private writeQueue: Promise<Result<void, PersistenceError>> = Promise.resolve(ok(undefined));

	private constructor(config: FileStateStoreConfig) {
		this.config = config;
	}

	/**
	 * Creates a store backed by the given file. Nothing is touched on disk
	 * until the first save.
	 */
	static create(config: FileStateStoreConfig): FileStateStore {
		return new FileStateStore(config);
	}

	get filePath(): string {
		return this.config.filePath;
	}

	async load(): Promise<Result<EngineSnapshot | null, LoadError>> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") {
				return ok(null);
			}
			return err(ioError("read", this.filePath, error));
		}

		const parsed = tryCatch(
			(): unknown => JSON.parse(content),
			(error) =>
				new PersistenceError(`State file ${this.filePath} is not valid JSON`, {
					filePath: this.filePath,
					cause: error,
				}),
		);
		if (!parsed.ok) return parsed;

		return validate(
			engineSnapshotSchema,
			parsed.value,
			`State file ${this.filePath} failed validation`,
		);
	}

	/** Queues a save behind any in flight; resolves once this one has landed. */
	save(snapshot: EngineSnapshot): Promise<Result<void, PersistenceError>> {
		const body = JSON.stringify(snapshot, null, this.config.pretty === false ? undefined : 2);
		const next = this.writeQueue.then(() => this.writeOnce(body));
		this.writeQueue = next;
		return next;
	}

	/** Waits for all pending saves to complete. */
	async flush(): Promise<void> {
		await this.writeQueue;
	}

	private async writeOnce(body: string): Promise<Result<void, PersistenceError>> {
		const tempPath = `${this.filePath}.tmp`;
		try {
			await mkdir(dirname(this.filePath), { recursive: true });
			await writeFile(tempPath, `${body}\n`, "utf-8");
			await rename(tempPath, this.filePath);
			return ok(undefined);
		} catch (error: unknown) {
			await rm(tempPath, { force: true }).catch(() => undefined);
			return err(ioError("write", this.filePath, error));
		}
	}
}

function ioError(op: "read" | "write", filePath: string, error: unknown): PersistenceError {
	const code = isNodeError(error) ? error.code : "UNKNOWN";
	const msg = error instanceof Error ? error.message : String(error);
	return new PersistenceError(`State file ${op} of ${filePath} failed: [${code}] ${msg}`, {
		filePath,
		code,
		cause: error,
	});
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
