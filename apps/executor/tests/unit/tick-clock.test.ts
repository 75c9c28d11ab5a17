import { describe, expect, test } from "vitest";

import { TickClock } from "../../src/services/tick-clock";

describe("TickClock", () => {
  test("should adopt the exchange time when present", () => {
    const clock = new TickClock();

    expect(clock.advance(1200)).toBe(1200);
    expect(clock.advance(1260)).toBe(1260);
    expect(clock.current()).toBe(1260);
  });

  test("should count updates without a time", () => {
    const clock = new TickClock();

    clock.advance();
    clock.advance();

    expect(clock.current()).toBe(2);
    expect(clock.updateCount()).toBe(2);
  });

  test("should continue from the last exchange time", () => {
    const clock = new TickClock();

    clock.advance(500);
    expect(clock.advance()).toBe(501);
  });

  test("should ignore a non-finite time", () => {
    const clock = new TickClock(10);

    expect(clock.advance(Number.NaN)).toBe(11);
  });
});
