export {
	type EthAddress,
	type ExchangeOrderId,
	type MarketTokenId,
	ethAddress,
	exchangeOrderId,
	idToString,
	marketTokenId,
} from "./identifiers.js";

export {
	type Result,
	err,
	map,
	ok,
} from "./result.js";

export {
	AuthError,
	ConfigError,
	ErrorCategory,
	NetworkError,
	RateLimitError,
	SystemError,
	TimeoutError,
	TradingError,
	classifyError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { type Clock, Duration, FakeClock, type Sleep, SystemClock, sleep } from "./time.js";
export {
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
} from "./config.js";
