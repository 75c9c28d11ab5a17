/**
 * Fair Value Calculator
 *
 * Intrinsic value only (immediate exercise payoff, no time value).
 *
 * This module is pure (no I/O, no throw).
 */

import type { OptionType } from "./types";

/**
 * Calculate intrinsic value
 *
 * - call: max(0, spot - strike)
 * - put:  max(0, strike - spot)
 */
export function calculateFairValue(optionType: OptionType, spotPx: number, strikePx: number): number {
  const payoff = optionType === "call" ? spotPx - strikePx : strikePx - spotPx;
  return Math.max(0, payoff);
}

/**
 * Check the buy condition: fairValue * alpha > askPx (strict)
 */
export function exceedsAsk(fairValue: number, alpha: number, askPx: number): boolean {
  return fairValue * alpha > askPx;
}
