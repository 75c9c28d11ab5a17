/**
 * Process Market Data - one pass of the evaluation loop
 *
 * For each market data update:
 * 1. Refresh underlying spot prices and the tick clock
 * 2. For every option book, in arrival order: build a Quote and evaluate it
 *    against the live params snapshot
 * 3. On BUY, submit one order (fire and forget: no retry, no wait for the exchange)
 *
 * A bad quote is logged and skipped; it never stops the rest of the update.
 */

import {
  evaluate,
  parseInstrumentId,
  selectBestAsk,
  type BuyDecision,
  type Decision,
  type EvaluationError,
  type Quote,
  type Tick,
} from "@option-edge/core";
import type { ExecutionPort, InstrumentBook, MarketDataUpdateEvent, PlaceOrderRequest } from "@option-edge/adapters";
import { logger } from "@option-edge/utils";

import type { OrderIdGenerator } from "../services/order-id";
import type { ParamsSource } from "../services/params-store";
import type { TickClock } from "../services/tick-clock";
import type { UnderlyingPriceCache } from "../services/underlying-price-cache";

const log = logger.child("evaluate");

export interface ProcessMarketDataDeps {
  paramsSource: ParamsSource;
  tickClock: TickClock;
  priceCache: UnderlyingPriceCache;
  orderIds: OrderIdGenerator;
  executionPort: ExecutionPort;
  /** Good-till tick sent with every order */
  orderExpiry: number;
  /**
   * Optional hook, called once per evaluated quote (observability, tests)
   */
  onDecision?: (decision: Decision, tick: Tick) => void;
}

/**
 * Per-update summary
 */
export interface ProcessSummary {
  tick: Tick;
  /** Quotes that reached a decision */
  evaluated: number;
  buys: number;
  /** Option books with nothing to evaluate (no asks, unknown spot) */
  skipped: number;
  /** Quotes rejected as malformed or with an unknown option type */
  malformed: number;
}

type QuoteOutcome =
  | { kind: "quote"; quote: Quote }
  | { kind: "not_option" }
  | { kind: "skipped"; reason: string }
  | { kind: "malformed"; error: EvaluationError };

/**
 * Turn one instrument book into a Quote
 */
export function buildQuote(book: InstrumentBook, priceCache: UnderlyingPriceCache): QuoteOutcome {
  const parsed = parseInstrumentId(book.instrumentId);
  if (parsed === null) {
    return { kind: "not_option" };
  }
  if (parsed.isErr()) {
    return { kind: "malformed", error: parsed.error };
  }
  const instrument = parsed.value;

  const bestAsk = selectBestAsk(book.asks, book.instrumentId);
  if (bestAsk.isErr()) {
    return { kind: "malformed", error: bestAsk.error };
  }
  if (bestAsk.value === null) {
    return { kind: "skipped", reason: "no_asks" };
  }

  const spotPx = priceCache.get(instrument.symbol);
  if (spotPx === undefined) {
    return { kind: "skipped", reason: "unknown_spot" };
  }

  return {
    kind: "quote",
    quote: {
      instrumentId: instrument.instrumentId,
      optionType: instrument.optionType,
      spotPx,
      strikePx: instrument.strikePx,
      askPx: bestAsk.value,
      expiry: instrument.expiry,
    },
  };
}

function submitOrder(deps: ProcessMarketDataDeps, decision: BuyDecision): void {
  const request: PlaceOrderRequest = {
    clientOrderId: deps.orderIds.next(),
    instrumentId: decision.instrumentId,
    side: "bid",
    price: decision.limitPx,
    quantity: decision.quantity,
    expiry: deps.orderExpiry,
  };

  log.info("BUY", {
    clientOrderId: request.clientOrderId,
    instrumentId: request.instrumentId,
    price: request.price,
    fairValue: decision.fairValue,
  });

  // Every error is mapped to a value, so the handled promise never rejects
  void deps.executionPort.placeOrder(request).match(
    ack => {
      log.debug("Order sent", { clientOrderId: ack.clientOrderId });
    },
    error => {
      log.error("Order submission failed", {
        clientOrderId: request.clientOrderId,
        instrumentId: request.instrumentId,
        errorType: error.type,
        reason: error.message,
      });
    },
  );
}

/**
 * Process one market data update
 */
export function processMarketData(deps: ProcessMarketDataDeps, event: MarketDataUpdateEvent): ProcessSummary {
  deps.priceCache.update(event.underlyingPrices, event.ts.getTime());
  const tick = deps.tickClock.advance(event.time);

  const summary: ProcessSummary = { tick, evaluated: 0, buys: 0, skipped: 0, malformed: 0 };

  for (const book of event.books) {
    const outcome = buildQuote(book, deps.priceCache);

    switch (outcome.kind) {
      case "not_option":
        continue;
      case "skipped":
        summary.skipped++;
        log.debug("Skipping book", { instrumentId: book.instrumentId, reason: outcome.reason });
        continue;
      case "malformed":
        summary.malformed++;
        log.warn("Malformed quote", { ...outcome.error, instrumentId: book.instrumentId });
        continue;
      case "quote":
        break;
    }

    // Read the snapshot per quote: an override applies from the next quote on
    const result = evaluate(outcome.quote, deps.paramsSource.current(), tick);
    if (result.isErr()) {
      if (result.error.type === "invalid_parameter") {
        summary.skipped++;
        log.error("Evaluation rejected params", { ...result.error, instrumentId: book.instrumentId });
      } else {
        summary.malformed++;
        log.warn("Malformed quote", { ...result.error, instrumentId: book.instrumentId });
      }
      continue;
    }

    const decision = result.value;
    summary.evaluated++;
    deps.onDecision?.(decision, tick);

    if (decision.action === "buy") {
      summary.buys++;
      submitOrder(deps, decision);
    } else {
      log.debug("No trade", { instrumentId: decision.instrumentId, reasonCode: decision.reasonCode });
    }
  }

  return summary;
}
