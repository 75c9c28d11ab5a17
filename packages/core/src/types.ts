/**
 * Core Domain Types
 *
 * Pure type definitions for the mispricing evaluator.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Exchange tick (monotonic time unit used for expiries) */
export type Tick = number;

/** Option right */
export type OptionType = "call" | "put";

export const OPTION_TYPES: readonly OptionType[] = ["call", "put"] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Strategy Params
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Strategy parameters
 *
 * Process-wide and mutable at runtime (manual override),
 * so the evaluator must be handed the live snapshot on every call.
 */
export interface StrategyParams {
  /** Multiplier applied to fair value before comparing to the ask. Must lie in (0, 1]. */
  alpha: number;
  /** Maximum remaining ticks until expiry for a quote to be tradeable */
  maxExpiryHorizon: Tick;
}

// ─────────────────────────────────────────────────────────────────────────────
// Market Data
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A single option snapshot. Received, evaluated, discarded.
 */
export interface Quote {
  instrumentId: string;
  optionType: OptionType;
  spotPx: number;
  strikePx: number;
  askPx: number;
  expiry: Tick;
}

/**
 * Option terms encoded in an instrument id (`$<SYMBOL>_<call|put>_<strike>_<expiry>`)
 */
export interface ParsedInstrument {
  instrumentId: string;
  symbol: string;
  optionType: OptionType;
  strikePx: number;
  expiry: Tick;
}

/**
 * Order book level as delivered by the exchange (price keyed by string)
 */
export interface PriceLevel {
  px: string;
  qty: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Decision
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reason codes for decisions (audit/testing)
 */
export type ReasonCode =
  | "EDGE_FOUND" // fairValue * alpha > ask
  | "NO_EDGE" // fairValue * alpha <= ask
  | "BEYOND_EXPIRY_HORIZON"; // expiry - currentTick > maxExpiryHorizon

export interface NoneDecision {
  action: "none";
  instrumentId: string;
  reasonCode: Exclude<ReasonCode, "EDGE_FOUND">;
}

export interface BuyDecision {
  action: "buy";
  instrumentId: string;
  quantity: 1;
  /** Price to bid at (the best ask that was evaluated) */
  limitPx: number;
  fairValue: number;
  reasonCode: "EDGE_FOUND";
}

export type Decision = NoneDecision | BuyDecision;
