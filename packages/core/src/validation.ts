/**
 * Parameter and Quote Validation
 *
 * - Params are validated once at configuration load and on every override
 * - Quotes are validated per evaluation
 * - Invalid input is rejected, never coerced
 *
 * This module is pure logic (no I/O dependencies).
 */

import { err, ok, type Result } from "neverthrow";

import {
  invalidParameter,
  malformedQuote,
  unknownOptionType,
  type InvalidParameterError,
  type QuoteError,
} from "./errors";
import { OPTION_TYPES, type OptionType, type Quote, type StrategyParams } from "./types";

/**
 * Quote as received from a collaborator, before the option type is known to be valid
 */
export type QuoteInput = Omit<Quote, "optionType"> & { optionType: string };

export function isNonNegativeFinite(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

export function isOptionType(value: unknown): value is OptionType {
  return OPTION_TYPES.some(t => t === value);
}

/**
 * Validate strategy params
 *
 * - alpha ∈ (0, 1]
 * - maxExpiryHorizon is a non-negative integer
 */
export function validateParams(params: StrategyParams): Result<StrategyParams, InvalidParameterError> {
  const { alpha, maxExpiryHorizon } = params;

  if (!Number.isFinite(alpha) || alpha <= 0 || alpha > 1) {
    return err(invalidParameter(`alpha must be in (0, 1], got ${String(alpha)}`, "alpha"));
  }

  if (!Number.isInteger(maxExpiryHorizon) || maxExpiryHorizon < 0) {
    return err(
      invalidParameter(
        `maxExpiryHorizon must be a non-negative integer, got ${String(maxExpiryHorizon)}`,
        "maxExpiryHorizon",
      ),
    );
  }

  return ok(params);
}

/**
 * Validate a quote
 *
 * Price fields must be non-negative finite numbers; optionType must be call or put.
 */
export function validateQuote(quote: QuoteInput): Result<Quote, QuoteError> {
  const { instrumentId, optionType } = quote;

  if (typeof instrumentId !== "string" || instrumentId === "") {
    return err(malformedQuote("instrumentId is missing"));
  }

  if (!isOptionType(optionType)) {
    return err(unknownOptionType(optionType, instrumentId));
  }

  const fields = {
    spotPx: quote.spotPx,
    strikePx: quote.strikePx,
    askPx: quote.askPx,
    expiry: quote.expiry,
  };
  for (const [field, value] of Object.entries(fields)) {
    if (!isNonNegativeFinite(value)) {
      return err(malformedQuote(`${field} must be a non-negative number, got ${String(value)}`, instrumentId));
    }
  }

  return ok({ ...quote, optionType });
}
