/**
 * Market Data Port - Interface for market data consumption
 *
 * - Adapters implement this port for venue-specific feeds
 * - Events are delivered in arrival order
 */

import type { Result } from "neverthrow";

/**
 * Book level keyed by the exchange's price string
 */
export interface BookLevel {
  px: string;
  qty: number;
}

/**
 * Order book of a single instrument
 */
export interface InstrumentBook {
  instrumentId: string;
  bids: BookLevel[];
  asks: BookLevel[];
}

/**
 * Market data update event
 *
 * One exchange update: latest underlying closes plus every instrument book it carried.
 */
export interface MarketDataUpdateEvent {
  type: "market_data";
  ts: Date;
  exchange: string;
  /** Exchange tick, when the update carries one */
  time?: number;
  /** Last close per underlying symbol (`$` prefix stripped) */
  underlyingPrices: Record<string, number>;
  books: InstrumentBook[];
  /** Books and candle lists dropped while decoding (the rest of the update is kept) */
  invalidEntries?: string[];
  raw?: unknown;
}

/**
 * Connection event
 */
export interface ConnectionEvent {
  type: "connected" | "disconnected" | "reconnecting";
  ts: Date;
  exchange: string;
  reason?: string;
}

export type MarketDataEvent = MarketDataUpdateEvent | ConnectionEvent;

/**
 * Market data adapter errors
 */
export type MarketDataError =
  | { type: "connection_failed"; message: string }
  | { type: "invalid_message"; message: string };

/**
 * Market Data Port interface
 */
export interface MarketDataPort {
  /**
   * Connect to market data stream
   */
  connect(): Promise<Result<void, MarketDataError>>;

  /**
   * Disconnect from market data stream
   */
  disconnect(): Promise<Result<void, MarketDataError>>;

  /**
   * Register event handler
   */
  onEvent(handler: (event: MarketDataEvent) => void): void;

  /**
   * Check if connected
   */
  isConnected(): boolean;
}
