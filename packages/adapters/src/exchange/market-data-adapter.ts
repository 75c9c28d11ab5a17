/**
 * Exchange Market Data Adapter
 *
 * - Single WebSocket per session (`?team_secret=` auth)
 * - Exponential backoff reconnection
 * - Normalization of `market_data_update` frames to domain events
 * - Outbound frames share the socket (see OrderTransport)
 */

import { err, ok, type Result } from "neverthrow";
import { logger } from "@option-edge/utils";

import { defaultConnectionFactory, type IWsConnection, type WsConnectionFactory } from "./ws-connection";
import {
  buildStreamUrl,
  CandleListSchema,
  CandlesSectionSchema,
  ExchangeConfigSchema,
  ExchangeEnvelopeSchema,
  MarketDataUpdateEnvelopeSchema,
  OrderbookDepthSchema,
  OrderbookDepthsSchema,
  type ExchangeConfig,
} from "./types";

import type {
  BookLevel,
  InstrumentBook,
  MarketDataError,
  MarketDataEvent,
  MarketDataPort,
  MarketDataUpdateEvent,
} from "../ports";

export const EXCHANGE_NAME = "algotrade";
const log = logger.child("market-data");

// ============================================================================
// Reconnection Configuration
// ============================================================================

export interface ReconnectConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RECONNECT_CONFIG: ReconnectConfig = {
  initialDelayMs: 100,
  maxDelayMs: 30_000,
  multiplier: 2,
};

/**
 * Compute the delay before reconnect attempt `attempt` (0-based)
 */
export function reconnectDelayMs(config: ReconnectConfig, attempt: number): number {
  return Math.min(config.initialDelayMs * Math.pow(config.multiplier, attempt), config.maxDelayMs);
}

// ============================================================================
// Message Normalization (exchange wire → domain)
// ============================================================================

function stripSymbolPrefix(symbol: string): string {
  return symbol.replace(/^\$+/, "");
}

function toBookLevels(side: Record<string, number> | null | undefined): BookLevel[] {
  if (!side) return [];
  return Object.entries(side).map(([px, qty]) => ({ px, qty }));
}

function toUnderlyingPrices(candles: unknown, invalidEntries: string[]): Record<string, number> {
  const prices: Record<string, number> = {};

  const section = CandlesSectionSchema.safeParse(candles ?? {});
  if (!section.success) {
    invalidEntries.push("candles");
    return prices;
  }

  for (const [symbol, list] of Object.entries(section.data.untradeable ?? {})) {
    const parsed = CandleListSchema.safeParse(list);
    if (!parsed.success) {
      invalidEntries.push(`candles.untradeable.${symbol}`);
      continue;
    }

    const close = parsed.data[parsed.data.length - 1]?.close;
    if (close !== undefined) {
      prices[stripSymbolPrefix(symbol)] = close;
    }
  }

  return prices;
}

function toInstrumentBooks(depths: unknown, invalidEntries: string[]): InstrumentBook[] {
  const section = OrderbookDepthsSchema.safeParse(depths ?? {});
  if (!section.success) {
    invalidEntries.push("orderbook_depths");
    return [];
  }

  const books: InstrumentBook[] = [];
  for (const [instrumentId, depth] of Object.entries(section.data)) {
    const parsed = OrderbookDepthSchema.safeParse(depth);
    if (!parsed.success) {
      invalidEntries.push(instrumentId);
      continue;
    }

    books.push({
      instrumentId,
      bids: toBookLevels(parsed.data.bids),
      asks: toBookLevels(parsed.data.asks),
    });
  }

  return books;
}

/**
 * Normalize one inbound frame
 *
 * Books and candle lists that fail validation are left out and listed in
 * `invalidEntries`; the rest of the update is kept.
 *
 * @returns ok(null) for frame types this adapter does not consume
 */
export function normalizeExchangeMessage(
  data: unknown,
  receivedAt: Date = new Date(),
): Result<MarketDataUpdateEvent | null, MarketDataError> {
  const envelope = ExchangeEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return err({ type: "invalid_message", message: "Frame has no type" });
  }

  if (envelope.data.type !== "market_data_update") {
    return ok(null);
  }

  const parsed = MarketDataUpdateEnvelopeSchema.safeParse(data);
  if (!parsed.success) {
    return err({ type: "invalid_message", message: parsed.error.message });
  }

  const message = parsed.data;
  const invalidEntries: string[] = [];
  const time = typeof message.time === "number" && Number.isFinite(message.time) ? message.time : undefined;

  return ok({
    type: "market_data",
    ts: receivedAt,
    exchange: EXCHANGE_NAME,
    time,
    underlyingPrices: toUnderlyingPrices(message.candles, invalidEntries),
    books: toInstrumentBooks(message.orderbook_depths, invalidEntries),
    invalidEntries,
    raw: data,
  });
}

// ============================================================================
// Order Transport
// ============================================================================

/**
 * Outbound channel for order frames
 */
export interface OrderTransport {
  sendFrame(payload: string): Promise<void>;
}

// ============================================================================
// ExchangeMarketDataAdapter
// ============================================================================

/**
 * Exchange Market Data Adapter
 *
 * Implements MarketDataPort over a single WebSocket, and OrderTransport on the same socket.
 */
export class ExchangeMarketDataAdapter implements MarketDataPort, OrderTransport {
  private readonly config: ExchangeConfig;
  private readonly reconnectConfig: ReconnectConfig;
  private readonly connectionFactory: WsConnectionFactory;

  private eventHandlers: ((event: MarketDataEvent) => void)[] = [];
  private connection: IWsConnection<unknown> | null = null;
  private reconnectAttempt = 0;
  private reconnectTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private isConnected_ = false;
  private stopped = false;

  /**
   * Create a new ExchangeMarketDataAdapter
   *
   * @param config - Exchange connection configuration (throws when invalid)
   * @param reconnectConfig - Reconnection configuration
   * @param connectionFactory - Optional factory for creating WebSocket connections (for testing)
   */
  constructor(
    config: ExchangeConfig,
    reconnectConfig: ReconnectConfig = DEFAULT_RECONNECT_CONFIG,
    connectionFactory: WsConnectionFactory = defaultConnectionFactory,
  ) {
    this.config = ExchangeConfigSchema.parse(config);
    this.reconnectConfig = reconnectConfig;
    this.connectionFactory = connectionFactory;
  }

  async connect(): Promise<Result<void, MarketDataError>> {
    this.stopped = false;
    return this.openConnection();
  }

  private async openConnection(): Promise<Result<void, MarketDataError>> {
    const connection = this.connectionFactory(buildStreamUrl(this.config), EXCHANGE_NAME);

    try {
      await connection.connect();
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.warn("Failed to connect", { error: message });
      this.scheduleReconnect("connect_failed");
      return err({ type: "connection_failed", message });
    }

    // disconnect() ran while the handshake was pending
    if (this.stopped) {
      await connection.close();
      return ok(undefined);
    }

    this.connection = connection;
    this.isConnected_ = true;
    this.reconnectAttempt = 0;

    this.emitEvent({
      type: "connected",
      ts: new Date(),
      exchange: EXCHANGE_NAME,
    });

    // Start listening in background
    void this.listen(connection);

    return ok(undefined);
  }

  async disconnect(): Promise<Result<void, MarketDataError>> {
    this.stopped = true;

    if (this.reconnectTimeoutId) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.close();
    }

    if (this.isConnected_) {
      this.isConnected_ = false;
      this.emitEvent({
        type: "disconnected",
        ts: new Date(),
        exchange: EXCHANGE_NAME,
      });
    }

    return ok(undefined);
  }

  onEvent(handler: (event: MarketDataEvent) => void): void {
    this.eventHandlers.push(handler);
  }

  isConnected(): boolean {
    return this.isConnected_;
  }

  async sendFrame(payload: string): Promise<void> {
    if (!this.connection || !this.isConnected_) {
      throw new Error("Exchange connection is not open");
    }
    await this.connection.send(payload);
  }

  // ============================================================================
  // Stream Loop
  // ============================================================================

  private async listen(connection: IWsConnection<unknown>): Promise<void> {
    let sawFirstUpdate = false;

    try {
      for await (const message of connection) {
        if (this.stopped || this.connection !== connection) break;

        const normalized = normalizeExchangeMessage(message);
        if (normalized.isErr()) {
          log.warn("Dropping invalid frame", normalized.error);
          continue;
        }

        const event = normalized.value;
        if (event === null) continue;

        if (event.invalidEntries && event.invalidEntries.length > 0) {
          log.warn("Dropped invalid entries from update", { entries: event.invalidEntries });
        }

        if (!sawFirstUpdate) {
          sawFirstUpdate = true;
          log.info("First market data update received", {
            underlyings: Object.keys(event.underlyingPrices).length,
            books: event.books.length,
          });
        }

        this.emitEvent(event);
      }

      if (!this.stopped && this.connection === connection) {
        log.warn("Stream ended unexpectedly (iterator completed)");
        this.handleDisconnect("iterator_completed");
      }
    } catch (error) {
      if (!this.stopped && this.connection === connection) {
        log.warn("Stream disconnected", { error });
        this.handleDisconnect(error instanceof Error ? error.message : "stream_threw");
      }
    }
  }

  // ============================================================================
  // Event Handling
  // ============================================================================

  private emitEvent(event: MarketDataEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        log.error("Event handler threw an error", { error });
      }
    }
  }

  private handleDisconnect(reason: string): void {
    // Mark connection as down so order sends fail fast with sink_unavailable.
    this.isConnected_ = false;
    this.connection = null;

    this.emitEvent({
      type: "disconnected",
      ts: new Date(),
      exchange: EXCHANGE_NAME,
      reason,
    });

    this.scheduleReconnect(reason);
  }

  private scheduleReconnect(reason: string): void {
    if (this.reconnectTimeoutId || this.stopped) return;

    const delay = reconnectDelayMs(this.reconnectConfig, this.reconnectAttempt);
    this.reconnectAttempt++;

    this.emitEvent({
      type: "reconnecting",
      ts: new Date(),
      exchange: EXCHANGE_NAME,
      reason: `Reconnecting in ${String(delay)}ms (attempt ${String(this.reconnectAttempt)}) - ${reason}`,
    });

    log.info(`Scheduling reconnect in ${String(delay)}ms (attempt ${String(this.reconnectAttempt)})`, { reason });

    this.reconnectTimeoutId = setTimeout(() => {
      this.reconnectTimeoutId = null;
      void this.openConnection();
    }, delay);
  }
}
