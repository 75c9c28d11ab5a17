/**
 * Underlying Price Cache - latest spot per underlying symbol
 *
 * Symbols are stored without the exchange's `$` prefix, matching
 * `ParsedInstrument.symbol`.
 */

export class UnderlyingPriceCache {
  private prices = new Map<string, number>();
  private lastUpdateMs = 0;

  update(prices: Record<string, number>, nowMs: number = Date.now()): void {
    for (const [symbol, price] of Object.entries(prices)) {
      this.prices.set(symbol, price);
    }
    this.lastUpdateMs = nowMs;
  }

  get(symbol: string): number | undefined {
    return this.prices.get(symbol);
  }

  symbols(): string[] {
    return [...this.prices.keys()];
  }

  getLastUpdateMs(): number {
    return this.lastUpdateMs;
  }
}
