/**
 * Process Market Data Unit Tests
 *
 * - Quote construction from books
 * - Arrival-order evaluation and order submission
 * - Bad quotes are skipped without stopping the update
 * - Overrides take effect on the next quote
 */

import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import { afterEach, describe, expect, test, vi } from "vitest";
import type { Decision } from "@option-edge/core";
import type {
  ExecutionError,
  ExecutionPort,
  InstrumentBook,
  MarketDataUpdateEvent,
  OrderAck,
  PlaceOrderRequest,
} from "@option-edge/adapters";
import { logger, type LogRecord } from "@option-edge/utils";

import { OrderIdGenerator } from "../../src/services/order-id";
import { ParamsStore } from "../../src/services/params-store";
import { TickClock } from "../../src/services/tick-clock";
import { UnderlyingPriceCache } from "../../src/services/underlying-price-cache";
import { buildQuote, processMarketData, type ProcessMarketDataDeps } from "../../src/usecases/process-market-data";

// ─────────────────────────────────────────────────────────────────────────────
// Test Fixtures
// ─────────────────────────────────────────────────────────────────────────────

const createBook = (instrumentId: string, asks: InstrumentBook["asks"]): InstrumentBook => ({
  instrumentId,
  bids: [],
  asks,
});

const createEvent = (overrides: Partial<MarketDataUpdateEvent> = {}): MarketDataUpdateEvent => ({
  type: "market_data",
  ts: new Date(1_000),
  exchange: "algotrade",
  time: 1000,
  underlyingPrices: { CARD: 100 },
  books: [],
  ...overrides,
});

const createDeps = (
  placeOrder: (request: PlaceOrderRequest) => ResultAsync<OrderAck, ExecutionError>,
  params = { alpha: 0.9, maxExpiryHorizon: 10_000 },
) => {
  const paramsStore = ParamsStore.create(params)._unsafeUnwrap();
  const decisions: Decision[] = [];
  const placeOrderMock = vi.fn(placeOrder);
  const executionPort: ExecutionPort = { placeOrder: placeOrderMock };

  const deps: ProcessMarketDataDeps = {
    paramsSource: paramsStore,
    tickClock: new TickClock(),
    priceCache: new UnderlyingPriceCache(),
    orderIds: new OrderIdGenerator(),
    executionPort,
    orderExpiry: 99_999_999,
    onDecision: decision => decisions.push(decision),
  };

  return { deps, paramsStore, decisions, placeOrder: placeOrderMock };
};

const acceptOrder = (request: PlaceOrderRequest): ResultAsync<OrderAck, ExecutionError> =>
  okAsync({ clientOrderId: request.clientOrderId, sentAt: new Date(0) });

// ─────────────────────────────────────────────────────────────────────────────
// buildQuote
// ─────────────────────────────────────────────────────────────────────────────

describe("buildQuote", () => {
  test("should combine instrument terms, best ask and spot", () => {
    const cache = new UnderlyingPriceCache();
    cache.update({ CARD: 100 });

    const outcome = buildQuote(
      createBook("$CARD_call_90_5000", [
        { px: "9.5", qty: 1 },
        { px: "8", qty: 2 },
      ]),
      cache,
    );

    expect(outcome).toEqual({
      kind: "quote",
      quote: {
        instrumentId: "$CARD_call_90_5000",
        optionType: "call",
        spotPx: 100,
        strikePx: 90,
        askPx: 8,
        expiry: 5000,
      },
    });
  });

  test("should pass over underlying books", () => {
    expect(buildQuote(createBook("$CARD", [{ px: "100", qty: 1 }]), new UnderlyingPriceCache())).toEqual({
      kind: "not_option",
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// processMarketData
// ─────────────────────────────────────────────────────────────────────────────

describe("processMarketData", () => {
  afterEach(() => {
    logger.clearSink();
  });

  test("should buy one contract at the best ask when the discounted fair value exceeds it", () => {
    const { deps, placeOrder } = createDeps(acceptOrder);

    // fairValue = 100 - 90 = 10; 10 * 0.9 = 9 > 8
    const summary = processMarketData(
      deps,
      createEvent({
        books: [
          createBook("$CARD_call_90_5000", [
            { px: "9.5", qty: 1 },
            { px: "8", qty: 2 },
          ]),
        ],
      }),
    );

    expect(summary).toEqual({ tick: 1000, evaluated: 1, buys: 1, skipped: 0, malformed: 0 });
    expect(placeOrder).toHaveBeenCalledTimes(1);
    expect(placeOrder).toHaveBeenCalledWith({
      clientOrderId: "0000000001",
      instrumentId: "$CARD_call_90_5000",
      side: "bid",
      price: 8,
      quantity: 1,
      expiry: 99_999_999,
    });
  });

  test("should not trade when the discounted fair value is below the ask", () => {
    const { deps, placeOrder, decisions } = createDeps(acceptOrder);

    // 10 * 0.9 = 9 < 9.5
    const summary = processMarketData(
      deps,
      createEvent({ books: [createBook("$CARD_call_90_5000", [{ px: "9.5", qty: 1 }])] }),
    );

    expect(summary).toEqual({ tick: 1000, evaluated: 1, buys: 0, skipped: 0, malformed: 0 });
    expect(placeOrder).not.toHaveBeenCalled();
    expect(decisions).toEqual([{ action: "none", instrumentId: "$CARD_call_90_5000", reasonCode: "NO_EDGE" }]);
  });

  test("should filter contracts expiring beyond the horizon", () => {
    const { deps, placeOrder, decisions } = createDeps(acceptOrder);

    // 20000 - 1000 = 19000 > 10000
    processMarketData(deps, createEvent({ books: [createBook("$CARD_call_90_20000", [{ px: "1", qty: 1 }])] }));

    expect(placeOrder).not.toHaveBeenCalled();
    expect(decisions).toEqual([
      { action: "none", instrumentId: "$CARD_call_90_20000", reasonCode: "BEYOND_EXPIRY_HORIZON" },
    ]);
  });

  test("should skip bad books and keep evaluating the rest of the update", () => {
    const { deps, placeOrder } = createDeps(acceptOrder);

    const summary = processMarketData(
      deps,
      createEvent({
        books: [
          createBook("$CARD", [{ px: "100", qty: 5 }]),
          createBook("$CARD_call_90_5000", []),
          createBook("$LOGN_put_50_5000", [{ px: "1", qty: 1 }]),
          createBook("$CARD_call_abc_5000", [{ px: "1", qty: 1 }]),
          createBook("$CARD_callput_90_5000", [{ px: "1", qty: 1 }]),
          createBook("$CARD_put_120_5000", [{ px: "oops", qty: 1 }]),
          // fairValue = 120 - 100 = 20; 20 * 0.9 = 18 > 15
          createBook("$CARD_put_120_5000", [{ px: "15", qty: 1 }]),
        ],
      }),
    );

    expect(summary).toEqual({ tick: 1000, evaluated: 1, buys: 1, skipped: 2, malformed: 3 });
    expect(placeOrder).toHaveBeenCalledTimes(1);
    expect(placeOrder.mock.calls[0]?.[0].instrumentId).toBe("$CARD_put_120_5000");
  });

  test("should submit orders in arrival order", () => {
    const { deps, placeOrder } = createDeps(acceptOrder);

    processMarketData(
      deps,
      createEvent({
        books: [
          createBook("$CARD_call_80_5000", [{ px: "10", qty: 1 }]),
          createBook("$CARD_call_90_5000", [{ px: "5", qty: 1 }]),
        ],
      }),
    );

    expect(placeOrder.mock.calls.map(([request]) => [request.clientOrderId, request.instrumentId])).toEqual([
      ["0000000001", "$CARD_call_80_5000"],
      ["0000000002", "$CARD_call_90_5000"],
    ]);
  });

  test("should use the overridden alpha from the next update on", () => {
    const { deps, placeOrder, paramsStore } = createDeps(acceptOrder);
    const book = createBook("$CARD_call_90_5000", [{ px: "8.5", qty: 1 }]);

    // 10 * 0.9 = 9 > 8.5
    processMarketData(deps, createEvent({ time: 1000, books: [book] }));
    paramsStore.apply({ alpha: 0.8 });
    // 10 * 0.8 = 8 < 8.5
    processMarketData(deps, createEvent({ time: 1001, books: [book] }));

    expect(placeOrder).toHaveBeenCalledTimes(1);
  });

  test("should count ticks when updates carry no time", () => {
    const { deps } = createDeps(acceptOrder);

    const first = processMarketData(deps, createEvent({ time: undefined }));
    const second = processMarketData(deps, createEvent({ time: undefined }));

    expect(first.tick).toBe(1);
    expect(second.tick).toBe(2);
  });

  test("should log and carry on when the order sink is unavailable", async () => {
    const records: LogRecord[] = [];
    logger.setSink({ write: r => records.push(r) });
    const { deps, placeOrder } = createDeps(() =>
      errAsync({ type: "sink_unavailable", message: "Exchange connection is not open" }),
    );

    const summary = processMarketData(
      deps,
      createEvent({ books: [createBook("$CARD_call_90_5000", [{ px: "8", qty: 1 }])] }),
    );

    expect(summary.buys).toBe(1);
    expect(placeOrder).toHaveBeenCalledTimes(1);
    await vi.waitFor(() => {
      expect(records.find(r => r.message === "Order submission failed")?.fields).toEqual({
        clientOrderId: "0000000001",
        instrumentId: "$CARD_call_90_5000",
        errorType: "sink_unavailable",
        reason: "Exchange connection is not open",
      });
    });
  });
});
