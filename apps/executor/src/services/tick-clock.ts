/**
 * Tick Clock - current exchange tick
 *
 * Advanced once per market data update. Updates that carry the exchange's
 * `time` set the clock directly; updates without it count as one tick.
 */

import type { Tick } from "@option-edge/core";

export class TickClock {
  private tick: Tick;
  private updates = 0;

  constructor(startTick: Tick = 0) {
    this.tick = startTick;
  }

  advance(exchangeTime?: number): Tick {
    this.updates++;
    this.tick = exchangeTime !== undefined && Number.isFinite(exchangeTime) ? exchangeTime : this.tick + 1;
    return this.tick;
  }

  current(): Tick {
    return this.tick;
  }

  /** Number of updates seen since start */
  updateCount(): number {
    return this.updates;
  }
}
