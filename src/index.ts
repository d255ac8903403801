// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type EthAddress,
	type ExchangeOrderId,
	type MarketTokenId,
	ethAddress,
	exchangeOrderId,
	idToString,
	marketTokenId,
	type Result,
	ok,
	err,
	map,
	Decimal,
	type Clock,
	type Sleep,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	TradingError,
	ErrorCategory,
	AuthError,
	ConfigError,
	NetworkError,
	RateLimitError,
	SystemError,
	TimeoutError,
	classifyError,
	DEFAULT_STOP_LOSS_CONFIG,
	MIN_CHECK_INTERVAL_SECONDS,
	SelectionMode,
	type StopLossConfig,
	type ThresholdPatch,
	configFromEnv,
	effectiveSelectionMode,
	validateConfig,
	withDryRun,
	withSelection,
	withThresholds,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type LogLevel,
	type Logger,
	type LoggerConfig,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { ValidationError, validate } from "./lib/validation/index.js";
export {
	type ApiKeySet,
	type Credentials,
	Secret,
	createCredentials,
	sealPrivateKey,
	unwrapCredentials,
} from "./auth/index.js";

// ── Venue ────────────────────────────────────────────────────────────
export {
	type BookLevel,
	type ClobConfig,
	type ClobProviders,
	type OrderBookSnapshot,
	type OrderStatusReport,
	type SellOrderAck,
	type SellOrderRequest,
	ClobClient,
	connectPolymarket,
	connectPolymarketPublic,
	createPolymarketProviders,
	POLYGON_CHAIN_ID,
	POLYMARKET_CLOB_HOST,
	PROXY_SIGNATURE_TYPE,
} from "./lib/clob/index.js";

// ── Positions ────────────────────────────────────────────────────────
export {
	Position,
	type PositionSummary,
	type PositionSnapshot,
	type PositionSnapshotProvider,
	type SkippedRecord,
	DataApiPositionProvider,
	type DataApiProviderConfig,
	POLYMARKET_DATA_API_URL,
} from "./position/index.js";

// ── Triggers ─────────────────────────────────────────────────────────
export {
	type SelectionResult,
	type TriggerDecision,
	type TriggerReason,
	describeReason,
	evaluateTrigger,
	filterMonitored,
} from "./trigger/index.js";

// ── Execution ────────────────────────────────────────────────────────
export {
	type AttemptRecord,
	type ExecutionResult,
	type ExecutionSummary,
	type LiquidationPolicy,
	type Liquidator,
	type OrderReceipt,
	ChunkedLiquidator,
	DEFAULT_LIQUIDATION_POLICY,
	DryRunLiquidator,
	InFlightGuard,
	LiquidationStatus,
	OrderPhase,
	PriceSource,
	summarizeExecution,
	validatePolicy,
} from "./execution/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type ExecutionLedger,
	type LedgerRecord,
	FileLedger,
	MemoryLedger,
	SelectionStore,
	ledgerToCsv,
	readLedger,
	summarizeLedger,
	toLedgerRecord,
} from "./persistence/index.js";

// ── Events & Notifications ───────────────────────────────────────────
export { type BotEvent, type BotEventType, BotEventBus, isBotEventOf } from "./events/index.js";
export {
	type MessageSender,
	TelegramNotifier,
	attachLogSubscriber,
	renderTelegramMessage,
} from "./notify/index.js";

// ── Monitoring ───────────────────────────────────────────────────────
export {
	type CycleReport,
	type SchedulerStats,
	MonitoringScheduler,
	type MonitoringSchedulerDeps,
} from "./monitor/index.js";
export { renderCycleSummary, renderPositionsTable } from "./tui/index.js";
