/**
 * Execution Port - Interface for order submission
 *
 * - Adapters implement this port for venue-specific trading
 * - One attempt per call, no retries
 */

import type { ResultAsync } from "neverthrow";

/**
 * Order side (exchange wording: bid = buy, ask = sell)
 */
export type OrderSide = "bid" | "ask";

/**
 * Place order request
 */
export interface PlaceOrderRequest {
  /** Zero-padded client request id */
  clientOrderId: string;
  instrumentId: string;
  side: OrderSide;
  price: number;
  quantity: number;
  /** Good-till tick */
  expiry: number;
}

/**
 * Local acknowledgment: the order left the process.
 * The exchange's own response is not awaited.
 */
export interface OrderAck {
  clientOrderId: string;
  sentAt: Date;
}

/**
 * Execution adapter errors
 */
export type ExecutionError =
  | { type: "sink_unavailable"; message: string }
  | { type: "invalid_order"; message: string }
  | { type: "unknown"; message: string };

/**
 * Execution Port interface
 */
export interface ExecutionPort {
  /**
   * Place a new order
   */
  placeOrder(request: PlaceOrderRequest): ResultAsync<OrderAck, ExecutionError>;
}
