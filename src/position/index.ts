export { Position, type PositionParams, type PositionSummary } from "./position.js";
export type { PositionSnapshot, PositionSnapshotProvider, SkippedRecord } from "./types.js";
export {
	type PositionRecord,
	parsePositionRecord,
	positionRecordSchema,
	recordToPosition,
} from "./snapshot-schema.js";
export {
	type DataApiProviderConfig,
	DataApiPositionProvider,
	type FetchFn,
	POLYMARKET_DATA_API_URL,
} from "./data-api-provider.js";
