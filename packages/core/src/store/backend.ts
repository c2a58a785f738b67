import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { PersistenceReadError, PersistenceWriteError, describeError } from "../errors";

// ============================================================================
// Storage Backends
// ============================================================================

/**
 * Where promotion documents live. Both calls are synchronous.
 */
export interface StorageBackend {
	/** Human-readable location, used in warnings */
	readonly location: string;
	/**
	 * Stored text, or null when nothing has been stored yet.
	 * @throws PersistenceReadError
	 */
	read(): string | null;
	/** @throws PersistenceWriteError */
	write(text: string): void;
}

/** The file, or a directory on its path, does not exist */
function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/**
 * JSON file on disk. Writes go to a temporary file beside the target and
 * are renamed over it, so readers never see a partial document.
 */
export class FileBackend implements StorageBackend {
	readonly location: string;

	constructor(readonly path: string) {
		this.location = path;
	}

	read(): string | null {
		try {
			return readFileSync(this.path, "utf8");
		} catch (err) {
			if (isNotFound(err)) return null;
			throw new PersistenceReadError(`Cannot read ${this.path}: ${describeError(err)}`, { cause: err });
		}
	}

	write(text: string): void {
		const dir = dirname(this.path);
		const tmp = join(dir, `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);
		try {
			mkdirSync(dir, { recursive: true });
			writeFileSync(tmp, text, "utf8");
			renameSync(tmp, this.path);
		} catch (err) {
			const leftover = removeTemporary(tmp);
			const detail = leftover ? `; ${tmp} was left behind: ${describeError(leftover)}` : "";
			throw new PersistenceWriteError(`Cannot write ${this.path}: ${describeError(err)}${detail}`, { cause: err });
		}
	}
}

/** Removes a temporary file; returns the error if it could not be removed */
function removeTemporary(path: string): unknown {
	try {
		rmSync(path, { force: true });
		return null;
	} catch (err) {
		// A missing directory means there is nothing to remove
		return isNotFound(err) ? null : err;
	}
}

/**
 * Keeps the document in memory. For tests and sessions that should not
 * touch the disk.
 */
export class MemoryBackend implements StorageBackend {
	readonly location = "memory";
	private text: string | null;

	constructor(initial?: string) {
		this.text = initial ?? null;
	}

	read(): string | null {
		return this.text;
	}

	write(text: string): void {
		this.text = text;
	}

	/** Last written text */
	contents(): string | null {
		return this.text;
	}
}
