/**
 * FileLedger: JSONL-based persistent execution ledger.
 *
 * Appends one JSON object per line through a serialized write queue, with
 * optional size-based rotation (`ledger.jsonl` → `ledger.jsonl.1` → ...).
 * `readLedger()` reads the rotated files and the live one back in write
 * order, reporting corrupt lines instead of silently dropping them.
 */

import { appendFile, mkdir, readFile, rename, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { validate } from "../lib/validation/index.js";
import { ledgerRecordSchema } from "./ledger-schema.js";
import type { ExecutionLedger, LedgerRecord } from "./types.js";

export interface FileLedgerConfig {
	readonly filePath: string;
	readonly maxFileSizeBytes?: number;
	readonly maxFiles?: number;
}

/** A line that is not JSON, or JSON that is not a ledger record. */
export interface CorruptLine {
	readonly filePath: string;
	readonly lineNumber: number;
	readonly raw: string;
	readonly reason: string;
}

export interface LedgerContents {
	readonly records: readonly LedgerRecord[];
	readonly corruptLines: readonly CorruptLine[];
}

export class FileLedger implements ExecutionLedger {
	private readonly config: FileLedgerConfig;
	private closed = false;
	private directoryReady = false;
	private writeQueue: Promise<void> = Promise.resolve();

	private constructor(config: FileLedgerConfig) {
		this.config = config;
	}

	static create(config: FileLedgerConfig): FileLedger {
		return new FileLedger(config);
	}

	get filePath(): string {
		return this.config.filePath;
	}

	private get maxFiles(): number {
		if (this.config.maxFiles !== undefined) {
			return this.config.maxFiles;
		}
		return this.config.maxFileSizeBytes !== undefined ? 5 : 0;
	}

	async append(record: LedgerRecord): Promise<void> {
		if (this.closed) {
			throw new Error("FileLedger is closed");
		}
		const line = `${JSON.stringify(record)}\n`;
		const prev = this.writeQueue;
		// A failed write must not poison the queue for later appends.
		this.writeQueue = prev.catch(() => undefined).then(() => this.writeOnce(line));
		await this.writeQueue;
	}

	async flush(): Promise<void> {
		await this.writeQueue.catch(() => undefined);
	}

	/** Marks the ledger as closed, draining any pending writes first. */
	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (!this.directoryReady) {
				await mkdir(dirname(this.filePath), { recursive: true });
				this.directoryReady = true;
			}
			const maxSize = this.config.maxFileSizeBytes;
			if (maxSize !== undefined && maxSize > 0) {
				await this.rotateIfNeeded(maxSize);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (err: unknown) {
			const code = isNodeError(err) ? err.code : "UNKNOWN";
			const msg = err instanceof Error ? err.message : String(err);
			throw new Error(`FileLedger write to ${this.filePath} failed: [${code}] ${msg}`, {
				cause: err,
			});
		}
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) {
				return;
			}
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return;
			}
			throw err;
		}
		await this.rotate();
	}

	private async rotate(): Promise<void> {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
	}
}

/**
 * Reads a JSONL ledger together with its rotated files, oldest first
 * (`.N` … `.1`, then the live file). A missing file is an empty ledger.
 */
export async function readLedger(filePath: string): Promise<LedgerContents> {
	const rotated: string[] = [];
	for (let i = 1; ; i++) {
		const candidate = `${filePath}.${i}`;
		if (!(await exists(candidate))) break;
		rotated.push(candidate);
	}

	const records: LedgerRecord[] = [];
	const corruptLines: CorruptLine[] = [];
	for (const file of [...rotated.reverse(), filePath]) {
		const content = await readIfExists(file);
		if (content !== null) {
			parseLines(file, content, records, corruptLines);
		}
	}
	return { records, corruptLines };
}

function parseLines(
	filePath: string,
	content: string,
	records: LedgerRecord[],
	corruptLines: CorruptLine[],
): void {
	const lines = content.split("\n");
	for (let i = 0; i < lines.length; i++) {
		const trimmed = lines[i]?.trim() ?? "";
		if (trimmed.length === 0) {
			continue;
		}
		const raw = trimmed.slice(0, 200);
		let parsed: unknown;
		try {
			parsed = JSON.parse(trimmed);
		} catch {
			corruptLines.push({ filePath, lineNumber: i + 1, raw, reason: "invalid JSON" });
			continue;
		}
		const record = validate(ledgerRecordSchema, parsed, "Malformed ledger record");
		if (record.ok) {
			records.push(record.value);
		} else {
			corruptLines.push({ filePath, lineNumber: i + 1, raw, reason: record.error.summary() });
		}
	}
}

async function readIfExists(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (err: unknown) {
		if (isNodeError(err) && err.code === "ENOENT") {
			return null;
		}
		throw err;
	}
}

async function exists(filePath: string): Promise<boolean> {
	try {
		await stat(filePath);
		return true;
	} catch (err: unknown) {
		if (isNodeError(err) && err.code === "ENOENT") {
			return false;
		}
		throw err;
	}
}

async function renameIfExists(src: string, dst: string): Promise<void> {
	try {
		await rename(src, dst);
	} catch (err: unknown) {
		if (!isNodeError(err) || err.code !== "ENOENT") {
			throw err;
		}
	}
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
