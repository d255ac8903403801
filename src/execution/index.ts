export type {
	AttemptOutcome,
	AttemptRecord,
	ExecutionResult,
	LiquidationPolicy,
	Liquidator,
	OrderReceipt,
} from "./types.js";
export {
	DEFAULT_LIQUIDATION_POLICY,
	LiquidationStatus,
	OrderPhase,
	PriceSource,
	validatePolicy,
} from "./types.js";
export {
	ABORTED,
	ChunkedLiquidator,
	NO_ORDERS_PLACED,
	applyFloor,
	bestBid,
	discoverPrice,
} from "./liquidation-executor.js";
export type { ChunkedLiquidatorDeps, OpeningPrice } from "./liquidation-executor.js";
export { DryRunLiquidator } from "./dry-run-liquidator.js";
export type { DryRunLiquidatorDeps } from "./dry-run-liquidator.js";
export { DEFAULT_IN_FLIGHT_TTL_MS, InFlightGuard } from "./in-flight-guard.js";
export type { InFlightGuardConfig } from "./in-flight-guard.js";
export { summarizeExecution } from "./summary.js";
export type { ExecutionSummary, OrderSummary } from "./summary.js";
