export type { ExecutionLedger, LedgerPosition, LedgerRecord } from "./types.js";
export { toLedgerRecord } from "./types.js";
export { FileLedger, readLedger } from "./file-ledger.js";
export type { CorruptLine, FileLedgerConfig, LedgerContents } from "./file-ledger.js";
export { MemoryLedger } from "./memory-ledger.js";
export type { MemoryLedgerConfig } from "./memory-ledger.js";
export { ledgerRecordSchema } from "./ledger-schema.js";
export {
	LEDGER_CSV_COLUMNS,
	csvField,
	ledgerToCsv,
	salePrices,
	summarizeLedger,
} from "./ledger-csv.js";
export type { LedgerTotals, SalePrices } from "./ledger-csv.js";
export { DEFAULT_SELECTION_FILE, SelectionStore } from "./selection-store.js";
