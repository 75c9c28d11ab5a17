/**
 * Exchange Execution Adapter
 *
 * - Encodes `add_order` frames and writes them to the exchange socket
 * - One attempt per order, no retries, no wait for the exchange's reply
 */

import { errAsync, ResultAsync } from "neverthrow";
import { logger } from "@option-edge/utils";

import type { OrderTransport } from "./market-data-adapter";
import type { AddOrderMessage } from "./types";
import type { ExecutionError, ExecutionPort, OrderAck, PlaceOrderRequest } from "../ports";

const log = logger.child("execution");

/**
 * Encode a place-order request as an `add_order` frame
 */
export function encodeAddOrder(request: PlaceOrderRequest): string {
  const message: AddOrderMessage = {
    type: "add_order",
    user_request_id: request.clientOrderId,
    instrument_id: request.instrumentId,
    price: request.price,
    expiry: request.expiry,
    side: request.side,
    quantity: request.quantity,
  };
  return JSON.stringify(message);
}

function validateRequest(request: PlaceOrderRequest): string | null {
  if (request.instrumentId === "") return "instrumentId is empty";
  if (!Number.isFinite(request.price) || request.price < 0) return `Invalid price: ${String(request.price)}`;
  if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
    return `Invalid quantity: ${String(request.quantity)}`;
  }
  return null;
}

/**
 * Exchange Execution Adapter
 *
 * Implements ExecutionPort on top of an OrderTransport (the market data session's socket)
 */
export class ExchangeExecutionAdapter implements ExecutionPort {
  private readonly transport: OrderTransport;

  constructor(transport: OrderTransport) {
    this.transport = transport;
  }

  placeOrder(request: PlaceOrderRequest): ResultAsync<OrderAck, ExecutionError> {
    const invalid = validateRequest(request);
    if (invalid !== null) {
      return errAsync({ type: "invalid_order", message: invalid });
    }

    const frame = encodeAddOrder(request);
    log.debug("Sending add_order", {
      clientOrderId: request.clientOrderId,
      instrumentId: request.instrumentId,
      price: request.price,
    });

    return ResultAsync.fromPromise(this.transport.sendFrame(frame), this.mapError).map(() => ({
      clientOrderId: request.clientOrderId,
      sentAt: new Date(),
    }));
  }

  private mapError = (error: unknown): ExecutionError => {
    if (error instanceof Error) {
      return {
        type: "sink_unavailable",
        message: error.message,
      };
    }

    return {
      type: "unknown",
      message: String(error),
    };
  };
}
