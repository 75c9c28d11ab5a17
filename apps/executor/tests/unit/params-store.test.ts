/**
 * Params Store Unit Tests
 *
 * - Startup validation
 * - apply() validates the merged params and keeps the previous snapshot on error
 * - Listeners see one change per accepted update
 */

import { describe, expect, test, vi } from "vitest";

import { ParamsStore, type ParamsChange } from "../../src/services/params-store";

const createStore = () => ParamsStore.create({ alpha: 0.85, maxExpiryHorizon: 1000 })._unsafeUnwrap();

describe("ParamsStore.create", () => {
  test("should accept valid params", () => {
    const result = ParamsStore.create({ alpha: 1, maxExpiryHorizon: 0 });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.current()).toEqual({ alpha: 1, maxExpiryHorizon: 0 });
    }
  });

  test("should reject alpha of zero", () => {
    const result = ParamsStore.create({ alpha: 0, maxExpiryHorizon: 1000 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: "invalid_parameter",
        message: "alpha must be in (0, 1], got 0",
        param: "alpha",
      });
    }
  });
});

describe("ParamsStore.apply", () => {
  test("should replace the snapshot and notify listeners", () => {
    const store = createStore();
    const changes: ParamsChange[] = [];
    store.subscribe(change => changes.push(change));

    const result = store.apply({ alpha: 0.7 });

    expect(result.isOk()).toBe(true);
    expect(store.current()).toEqual({ alpha: 0.7, maxExpiryHorizon: 1000 });
    expect(changes).toHaveLength(1);
    expect(changes[0]?.source).toBe("manual_override");
    expect(changes[0]?.changedKeys).toEqual(["alpha"]);
    expect(changes[0]?.previous).toEqual({ alpha: 0.85, maxExpiryHorizon: 1000 });
  });

  test("should keep the previous params when alpha is out of range", () => {
    const store = createStore();
    const listener = vi.fn();
    store.subscribe(listener);

    const result = store.apply({ alpha: 1.5 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("alpha must be in (0, 1], got 1.5");
    }
    expect(store.current()).toEqual({ alpha: 0.85, maxExpiryHorizon: 1000 });
    expect(listener).not.toHaveBeenCalled();
  });

  test("should reject a negative horizon", () => {
    const store = createStore();

    const result = store.apply({ maxExpiryHorizon: -1 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: "invalid_parameter",
        message: "maxExpiryHorizon must be a non-negative integer, got -1",
        param: "maxExpiryHorizon",
      });
    }
    expect(store.current().maxExpiryHorizon).toBe(1000);
  });

  test("should not notify when nothing changed", () => {
    const store = createStore();
    const listener = vi.fn();
    store.subscribe(listener);

    const result = store.apply({ alpha: 0.85 });

    expect(result.isOk()).toBe(true);
    expect(listener).not.toHaveBeenCalled();
  });

  test("should leave earlier snapshots untouched", () => {
    const store = createStore();
    const before = store.current();

    store.apply({ alpha: 0.6, maxExpiryHorizon: 50 });

    expect(before).toEqual({ alpha: 0.85, maxExpiryHorizon: 1000 });
    expect(Object.isFrozen(store.current())).toBe(true);
  });

  test("should keep notifying other listeners when one throws", () => {
    const store = createStore();
    const listener = vi.fn();
    store.subscribe(() => {
      throw new Error("listener failure");
    });
    store.subscribe(listener);

    const result = store.apply({ alpha: 0.5 });

    expect(result.isOk()).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  test("should stop notifying after unsubscribe", () => {
    const store = createStore();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    unsubscribe();
    store.apply({ alpha: 0.5 });

    expect(listener).not.toHaveBeenCalled();
  });
});
