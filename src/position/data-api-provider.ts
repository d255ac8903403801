/**
 * DataApiPositionProvider: reads the account's positions from the Polymarket
 * Data API (`GET /positions`).
 */

import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError, NetworkError, type TradingError, classifyError } from "../shared/errors.js";
import type { EthAddress } from "../shared/identifiers.js";
import { idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Position } from "./position.js";
import { parsePositionRecord } from "./snapshot-schema.js";
import type { PositionSnapshot, PositionSnapshotProvider, SkippedRecord } from "./types.js";

export const POLYMARKET_DATA_API_URL = "https://data-api.polymarket.com";

/** Minimal fetch signature so tests can inject a stand-in. */
export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface DataApiProviderConfig {
	readonly baseUrl: string;
	readonly user: EthAddress;
	readonly logger: Logger;
	readonly limit?: number;
	readonly timeoutMs?: number;
	readonly fetchFn?: FetchFn;
}

export class DataApiPositionProvider implements PositionSnapshotProvider {
	private readonly baseUrl: string;
	private readonly user: EthAddress;
	private readonly logger: Logger;
	private readonly limit: number;
	private readonly timeoutMs: number;
	private readonly fetchFn: FetchFn;

	private constructor(config: DataApiProviderConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.user = config.user;
		this.logger = config.logger.child({ module: "data-api" });
		this.limit = config.limit ?? 100;
		this.timeoutMs = config.timeoutMs ?? 10_000;
		this.fetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
	}

	static create(config: DataApiProviderConfig): Result<DataApiPositionProvider, ConfigError> {
		if (config.baseUrl.trim().length === 0) {
			return err(new ConfigError("Data API base URL is required"));
		}
		return ok(new DataApiPositionProvider(config));
	}

	async fetchPositions(minPositionValue: number): Promise<Result<PositionSnapshot, TradingError>> {
		const url = this.buildUrl(minPositionValue);
		let body: unknown;
		try {
			const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) });
			if (!response.ok) {
				return err(
					classifyError(
						Object.assign(new Error(`Data API HTTP ${response.status}`), {
							status: response.status,
						}),
					),
				);
			}
			body = await response.json();
		} catch (e) {
			return err(classifyError(e));
		}

		if (!Array.isArray(body)) {
			return err(new NetworkError("Data API returned a non-array positions payload", { url }));
		}

		const minValue = Decimal.from(minPositionValue);
		const positions: Position[] = [];
		const skipped: SkippedRecord[] = [];
		let belowMinValue = 0;

		body.forEach((raw: unknown, index) => {
			const parsed = parsePositionRecord(raw);
			if (!parsed.ok) {
				this.logger.warn({ index, issues: parsed.error.summary() }, "Skipping malformed position");
				skipped.push({ index, error: parsed.error });
				return;
			}
			if (parsed.value.currentValue.lt(minValue)) {
				belowMinValue++;
				return;
			}
			positions.push(parsed.value);
		});

		this.logger.debug(
			{ received: body.length, kept: positions.length, skipped: skipped.length, belowMinValue },
			"Fetched positions",
		);
		return ok({ positions, skipped, belowMinValue });
	}

	private buildUrl(minPositionValue: number): string {
		const url = new URL(`${this.baseUrl}/positions`);
		url.searchParams.set("sizeThreshold", String(minPositionValue));
		url.searchParams.set("limit", String(this.limit));
		url.searchParams.set("sortDirection", "DESC");
		url.searchParams.set("user", idToString(this.user));
		return url.toString();
	}
}
