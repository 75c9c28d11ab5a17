/**
 * packages/core - Pure Strategy Logic
 *
 * This package contains all pure business logic for the option buyer.
 * NO I/O dependencies (HTTP, WS, FS).
 * NO exceptions thrown (uses Result types).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  Tick,
  OptionType,
  PriceLevel,
  // Strategy
  StrategyParams,
  ReasonCode,
  // Market data
  Quote,
  ParsedInstrument,
  // Decision
  Decision,
  BuyDecision,
  NoneDecision,
} from "./types";
export { OPTION_TYPES } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export type {
  EvaluationError,
  InvalidParameterError,
  MalformedQuoteError,
  QuoteError,
  UnknownOptionTypeError,
} from "./errors";
export { invalidParameter, malformedQuote, unknownOptionType } from "./errors";

// ─────────────────────────────────────────────────────────────────────────────
// Evaluator
// ─────────────────────────────────────────────────────────────────────────────
export { evaluate, isBeyondExpiryHorizon } from "./evaluator";
export { calculateFairValue, exceedsAsk } from "./fair-value";

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────
export type { QuoteInput } from "./validation";
export { validateParams, validateQuote, isNonNegativeFinite, isOptionType } from "./validation";

// ─────────────────────────────────────────────────────────────────────────────
// Instruments
// ─────────────────────────────────────────────────────────────────────────────
export { parseInstrumentId, selectBestAsk, normalizeSymbol, isOptionInstrument } from "./instrument";
