/**
 * DryRunLiquidator: prices a liquidation against the live book and
 * reports the chunks it would send, without submitting anything.
 */

import type { ClobClient } from "../lib/clob/client.js";
import type { Logger } from "../lib/logger/index.js";
import type { Position } from "../position/position.js";
import { Decimal } from "../shared/decimal.js";
import { exchangeOrderId } from "../shared/identifiers.js";
import { discoverPrice } from "./liquidation-executor.js";
import {
	type AttemptRecord,
	DEFAULT_LIQUIDATION_POLICY,
	type ExecutionResult,
	type LiquidationPolicy,
	LiquidationStatus,
	type Liquidator,
	OrderPhase,
	type OrderReceipt,
	validatePolicy,
} from "./types.js";

export interface DryRunLiquidatorDeps {
	readonly client: ClobClient;
	readonly logger: Logger;
	readonly policy?: LiquidationPolicy;
}

export class DryRunLiquidator implements Liquidator {
	private readonly client: ClobClient;
	private readonly logger: Logger;
	private readonly policy: LiquidationPolicy;

	/** @throws ConfigError on the same policies the live liquidator refuses */
	constructor(deps: DryRunLiquidatorDeps) {
		const policy = validatePolicy(deps.policy ?? DEFAULT_LIQUIDATION_POLICY);
		if (!policy.ok) throw policy.error;
		this.client = deps.client;
		this.logger = deps.logger.child({ module: "dry-run" });
		this.policy = policy.value;
	}

	async liquidate(position: Position, _signal?: AbortSignal): Promise<ExecutionResult> {
		const log = this.logger.child({ tokenId: position.tokenId });
		const opening = await discoverPrice(this.client, position, this.policy, log);

		const orders: OrderReceipt[] = [];
		const attempts: AttemptRecord[] = [];
		let remaining = position.size;
		while (remaining.gt(this.policy.dustThreshold)) {
			const size = Decimal.min(remaining, this.policy.maxChunkSize);
			remaining = remaining.sub(size);
			const attempt = orders.length + 1;
			orders.push({
				orderId: exchangeOrderId(`dry-run-${attempt}`),
				price: opening.price,
				size,
				phase: OrderPhase.Chunk,
				attempt,
			});
			attempts.push({
				attempt,
				phase: OrderPhase.Chunk,
				price: opening.price,
				size,
				outcome: "accepted",
				remainingAfter: remaining,
				errorMsg: null,
			});
			log.info(
				{ attempt, price: opening.price.toString(), size: size.toString() },
				"[DRY RUN] Would place sell order",
			);
		}

		const totalSizeOrdered = orders.reduce((sum, o) => sum.add(o.size), Decimal.zero());
		return {
			success: true,
			status: LiquidationStatus.Done,
			ordersPlaced: orders.length,
			totalSizeOrdered,
			remainingSize: position.size.sub(totalSizeOrdered),
			originalSize: position.size,
			orders,
			attempts,
			priceSource: opening.source,
			error: null,
			dryRun: true,
		};
	}
}
