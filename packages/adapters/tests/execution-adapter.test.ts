/**
 * Exchange Execution Adapter Unit Tests
 *
 * - add_order encoding
 * - Error mapping
 * - No retries
 */

import { describe, expect, test, vi } from "vitest";

import { ExchangeExecutionAdapter, encodeAddOrder } from "../src/exchange/execution-adapter";
import type { PlaceOrderRequest } from "../src/ports";

const createRequest = (overrides: Partial<PlaceOrderRequest> = {}): PlaceOrderRequest => ({
  clientOrderId: "0000000001",
  instrumentId: "$CARD_call_100_5000",
  side: "bid",
  price: 101,
  quantity: 1,
  expiry: 99999999,
  ...overrides,
});

describe("encodeAddOrder", () => {
  test("should encode the exchange add_order frame", () => {
    const frame = encodeAddOrder(createRequest());

    expect(frame).toBe(
      '{"type":"add_order","user_request_id":"0000000001","instrument_id":"$CARD_call_100_5000",' +
        '"price":101,"expiry":99999999,"side":"bid","quantity":1}',
    );
  });
});

describe("ExchangeExecutionAdapter", () => {
  test("should send one frame and acknowledge locally", async () => {
    const sendFrame = vi.fn(async (_payload: string) => {});
    const adapter = new ExchangeExecutionAdapter({ sendFrame });

    const result = await adapter.placeOrder(createRequest());

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.clientOrderId).toBe("0000000001");
    }
    expect(sendFrame).toHaveBeenCalledTimes(1);
    expect(JSON.parse(sendFrame.mock.calls[0]?.[0] ?? "{}")).toEqual({
      type: "add_order",
      user_request_id: "0000000001",
      instrument_id: "$CARD_call_100_5000",
      price: 101,
      expiry: 99999999,
      side: "bid",
      quantity: 1,
    });
  });

  test("should map a transport failure to sink_unavailable without retrying", async () => {
    const sendFrame = vi.fn(async (_payload: string) => {
      throw new Error("Exchange connection is not open");
    });
    const adapter = new ExchangeExecutionAdapter({ sendFrame });

    const result = await adapter.placeOrder(createRequest());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "sink_unavailable", message: "Exchange connection is not open" });
    }
    expect(sendFrame).toHaveBeenCalledTimes(1);
  });

  test("should map a non-Error rejection to unknown", async () => {
    const sendFrame = vi.fn((_payload: string) => Promise.reject("boom"));
    const adapter = new ExchangeExecutionAdapter({ sendFrame });

    const result = await adapter.placeOrder(createRequest());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "unknown", message: "boom" });
    }
  });

  test("should reject an invalid quantity before sending", async () => {
    const sendFrame = vi.fn(async (_payload: string) => {});
    const adapter = new ExchangeExecutionAdapter({ sendFrame });

    const result = await adapter.placeOrder(createRequest({ quantity: 0 }));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "invalid_order", message: "Invalid quantity: 0" });
    }
    expect(sendFrame).not.toHaveBeenCalled();
  });
});
