/**
 * Mispricing Evaluator - Main decision logic
 *
 * - Expiry filter first: long-dated contracts lock capital
 * - fairValue = intrinsic value (call: spot - strike, put: strike - spot, floored at 0)
 * - BUY 1 contract at the ask when fairValue * alpha > ask (strict)
 *
 * Stateless across calls. The caller passes the live params snapshot,
 * so manual overrides take effect on the next quote.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { invalidParameter, type EvaluationError } from "./errors";
import { calculateFairValue, exceedsAsk } from "./fair-value";
import { validateParams, validateQuote, type QuoteInput } from "./validation";
import type { BuyDecision, Decision, NoneDecision, Quote, StrategyParams, Tick } from "./types";

function noneDecision(instrumentId: string, reasonCode: NoneDecision["reasonCode"]): NoneDecision {
  return {
    action: "none",
    instrumentId,
    reasonCode,
  };
}

function buyDecision(quote: Quote, fairValue: number): BuyDecision {
  return {
    action: "buy",
    instrumentId: quote.instrumentId,
    quantity: 1,
    limitPx: quote.askPx,
    fairValue,
    reasonCode: "EDGE_FOUND",
  };
}

/**
 * Whether the quote expires beyond the tradeable horizon.
 * A quote expiring exactly at the horizon is still eligible.
 */
export function isBeyondExpiryHorizon(expiry: Tick, currentTick: Tick, maxExpiryHorizon: Tick): boolean {
  return expiry - currentTick > maxExpiryHorizon;
}

/**
 * Evaluate a single quote
 *
 * 1. Validate params and quote (errors are returned, not coerced)
 * 2. Expiry filter → NONE (BEYOND_EXPIRY_HORIZON)
 * 3. Compute fair value
 * 4. fairValue * alpha > ask → BUY, else NONE (NO_EDGE)
 *
 * @param quote - Option snapshot
 * @param params - Live params snapshot
 * @param currentTick - Exchange tick the quote is evaluated at
 */
export function evaluate(
  quote: QuoteInput,
  params: StrategyParams,
  currentTick: Tick,
): Result<Decision, EvaluationError> {
  const paramsResult = validateParams(params);
  if (paramsResult.isErr()) {
    return err(paramsResult.error);
  }

  if (!Number.isFinite(currentTick)) {
    return err(invalidParameter(`currentTick must be finite, got ${String(currentTick)}`, "currentTick"));
  }

  const quoteResult = validateQuote(quote);
  if (quoteResult.isErr()) {
    return err(quoteResult.error);
  }
  const validQuote = quoteResult.value;

  if (isBeyondExpiryHorizon(validQuote.expiry, currentTick, params.maxExpiryHorizon)) {
    return ok(noneDecision(validQuote.instrumentId, "BEYOND_EXPIRY_HORIZON"));
  }

  const fairValue = calculateFairValue(validQuote.optionType, validQuote.spotPx, validQuote.strikePx);

  if (exceedsAsk(fairValue, params.alpha, validQuote.askPx)) {
    return ok(buyDecision(validQuote, fairValue));
  }

  return ok(noneDecision(validQuote.instrumentId, "NO_EDGE"));
}
