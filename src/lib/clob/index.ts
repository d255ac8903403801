export type {
	BookLevel,
	ClobConfig,
	ClobProviders,
	OrderBookSnapshot,
	OrderStatusReport,
	SellOrderAck,
	SellOrderRequest,
} from "./types.js";
export { ClobClient, DEFAULT_REQUEST_TIMEOUT_MS } from "./client.js";
export {
	type ConnectOptions,
	type PolymarketClobApi,
	POLYGON_CHAIN_ID,
	POLYMARKET_CLOB_HOST,
	PROXY_SIGNATURE_TYPE,
	connectPolymarket,
	connectPolymarketPublic,
	createPolymarketProviders,
} from "./polymarket-providers.js";
