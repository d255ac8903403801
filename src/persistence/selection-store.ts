/**
 * SelectionStore: the token ids chosen for monitoring, persisted as a JSON
 * array so a restart keeps the same selection.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ValidationError, validate, z } from "../lib/validation/index.js";
import { type MarketTokenId, marketTokenId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export const DEFAULT_SELECTION_FILE = "selected-positions.json";

const selectionSchema = z.array(z.string().trim().min(1, "token id cannot be empty"));

function dedupe(ids: readonly MarketTokenId[]): MarketTokenId[] {
	return [...new Set(ids)];
}

export class SelectionStore {
	readonly filePath: string;

	constructor(filePath: string = DEFAULT_SELECTION_FILE) {
		this.filePath = filePath;
	}

	/** A missing file is an empty selection. */
	async load(): Promise<Result<MarketTokenId[], ValidationError>> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				return ok([]);
			}
			throw e;
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(content);
		} catch (e: unknown) {
			const message = e instanceof Error ? e.message : String(e);
			return err(
				new ValidationError(`Selection file ${this.filePath} is not valid JSON`, [
					{ path: [], message },
				]),
			);
		}

		const ids = validate(selectionSchema, parsed, `Selection file ${this.filePath} is malformed`);
		if (!ids.ok) return ids;
		return ok(dedupe(ids.value.map(marketTokenId)));
	}

	/** Replaces the file atomically: write a temp file, then rename over. */
	async save(ids: readonly MarketTokenId[]): Promise<void> {
		await mkdir(dirname(this.filePath), { recursive: true });
		const tmp = `${this.filePath}.${process.pid}.tmp`;
		await writeFile(tmp, `${JSON.stringify(dedupe(ids), null, 2)}\n`, "utf-8");
		await rename(tmp, this.filePath);
	}

	async clear(): Promise<void> {
		await rm(this.filePath, { force: true });
	}
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && "code" in e;
}
