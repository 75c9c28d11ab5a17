/**
 * Exchange Types
 *
 * Wire format of the competition exchange WebSocket API (JSON text frames).
 */

import { z } from "zod";

/**
 * Exchange connection configuration schema
 */
export const ExchangeConfigSchema = z.object({
  /**
   * WebSocket endpoint without the secret (e.g., ws://localhost:9001/trade)
   */
  url: z.string().min(1),

  /**
   * Team auth token, sent as the `team_secret` query parameter
   */
  teamSecret: z.string().min(1),
});

export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;

// ============================================================================
// Inbound messages
// ============================================================================

/**
 * Any inbound frame; only `type` is inspected before dispatch
 */
export const ExchangeEnvelopeSchema = z.object({
  type: z.string(),
});

export const CandleSchema = z.object({
  close: z.number().optional(),
});

/**
 * Candle history of one symbol
 */
export const CandleListSchema = z.array(CandleSchema);

/**
 * `candles` section; each symbol's list is validated on its own
 */
export const CandlesSectionSchema = z.object({
  untradeable: z.record(z.string(), z.unknown()).nullish(),
  tradeable: z.unknown().optional(),
});

/**
 * Book side: price string -> resting quantity
 */
export const BookSideSchema = z.record(z.string(), z.number());

/**
 * One instrument's depth. A null or missing side is an empty side.
 */
export const OrderbookDepthSchema = z.object({
  bids: BookSideSchema.nullish(),
  asks: BookSideSchema.nullish(),
});

/**
 * `orderbook_depths` section; each book is validated on its own
 */
export const OrderbookDepthsSchema = z.record(z.string(), z.unknown());

/**
 * `market_data_update` frame
 *
 * {
 *   type: "market_data_update",
 *   time?: number,
 *   candles: { untradeable: { "$SYM": [{ close, ... }] }, tradeable: { ... } },
 *   orderbook_depths: { "$SYM_call_100_5000": { bids: { "98": 2 }, asks: { "101": 3 } } }
 * }
 *
 * Only the envelope is checked here, so one bad book or candle list
 * does not cost the rest of the update.
 */
export const MarketDataUpdateEnvelopeSchema = z.object({
  type: z.literal("market_data_update"),
  time: z.unknown().optional(),
  candles: z.unknown().optional(),
  orderbook_depths: z.unknown().optional(),
});

export type MarketDataUpdateEnvelope = z.infer<typeof MarketDataUpdateEnvelopeSchema>;

// ============================================================================
// Outbound messages
// ============================================================================

/**
 * `add_order` frame
 */
export interface AddOrderMessage {
  type: "add_order";
  user_request_id: string;
  instrument_id: string;
  price: number;
  expiry: number;
  side: "bid" | "ask";
  quantity: number;
}

/**
 * Build the authenticated stream URL
 */
export function buildStreamUrl(config: ExchangeConfig): string {
  const separator = config.url.includes("?") ? "&" : "?";
  return `${config.url}${separator}team_secret=${encodeURIComponent(config.teamSecret)}`;
}
