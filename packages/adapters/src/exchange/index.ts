/**
 * Competition exchange adapters
 */

export {
  ExchangeMarketDataAdapter,
  normalizeExchangeMessage,
  reconnectDelayMs,
  DEFAULT_RECONNECT_CONFIG,
  EXCHANGE_NAME,
} from "./market-data-adapter";
export type { OrderTransport, ReconnectConfig } from "./market-data-adapter";
export { ExchangeExecutionAdapter, encodeAddOrder } from "./execution-adapter";
export { WsConnection, defaultConnectionFactory } from "./ws-connection";
export type { IWsConnection, WsConnectionFactory, WsConnectionOptions } from "./ws-connection";
export { ExchangeConfigSchema, MarketDataUpdateEnvelopeSchema, buildStreamUrl } from "./types";
export type { AddOrderMessage, ExchangeConfig, MarketDataUpdateEnvelope } from "./types";
