/**
 * Instrument id parsing and book helpers
 *
 * Option ids follow `$<SYMBOL>_<call|put>_<strike>_<expiry>`, e.g. `$CARD_call_100_5000`.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { malformedQuote, unknownOptionType, type MalformedQuoteError, type QuoteError } from "./errors";
import { isOptionType } from "./validation";
import type { ParsedInstrument, PriceLevel } from "./types";

const INTEGER_PATTERN = /^\d+$/;
const PRICE_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Strip the `$` prefix the exchange puts on symbols
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.replace(/^\$+/, "");
}

/**
 * Whether an instrument id names an option at all
 */
export function isOptionInstrument(instrumentId: string): boolean {
  return instrumentId.includes("call") || instrumentId.includes("put");
}

/**
 * Parse an option instrument id
 *
 * @returns null when the instrument is not an option (futures, underlyings)
 */
export function parseInstrumentId(instrumentId: string): Result<ParsedInstrument, QuoteError> | null {
  if (!isOptionInstrument(instrumentId)) {
    return null;
  }

  const parts = normalizeSymbol(instrumentId).split("_");
  const [symbol, optionType, strikeStr, expiryStr] = parts;
  if (
    parts.length !== 4 ||
    symbol === undefined ||
    optionType === undefined ||
    strikeStr === undefined ||
    expiryStr === undefined
  ) {
    return err(malformedQuote(`Unexpected instrument naming: ${instrumentId}`, instrumentId));
  }

  if (!isOptionType(optionType)) {
    return err(unknownOptionType(optionType, instrumentId));
  }

  if (!INTEGER_PATTERN.test(strikeStr) || !INTEGER_PATTERN.test(expiryStr)) {
    return err(malformedQuote(`Non-integer strike or expiry: ${instrumentId}`, instrumentId));
  }

  return ok({
    instrumentId,
    symbol,
    optionType,
    strikePx: Number.parseInt(strikeStr, 10),
    expiry: Number.parseInt(expiryStr, 10),
  });
}

/**
 * Select the lowest ask from a book side
 *
 * Levels with non-positive quantity are treated as removed.
 *
 * @returns null when there is nothing to buy
 */
export function selectBestAsk(levels: PriceLevel[], instrumentId?: string): Result<number | null, MalformedQuoteError> {
  let best: number | null = null;

  for (const level of levels) {
    if (!(level.qty > 0)) continue;

    if (!PRICE_PATTERN.test(level.px)) {
      return err(malformedQuote(`Invalid ask price: ${level.px}`, instrumentId));
    }

    const px = Number.parseFloat(level.px);
    if (best === null || px < best) {
      best = px;
    }
  }

  return ok(best);
}
