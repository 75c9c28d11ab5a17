/**
 * Params Store
 *
 * Holds the live StrategyParams snapshot shared by the evaluation loop and the
 * operator override channel.
 *
 * - `apply()` is the single update entry point
 * - Merged params are validated before they replace the snapshot
 * - The snapshot is replaced as a whole (a quote never sees half an update)
 */

import { err, ok, type Result } from "neverthrow";
import { validateParams, type InvalidParameterError, type StrategyParams } from "@option-edge/core";
import { logger } from "@option-edge/utils";

const log = logger.child("params");

export type ParamsChangeSource = "startup" | "manual_override";

export interface ParamsChange {
  previous: Readonly<StrategyParams>;
  next: Readonly<StrategyParams>;
  source: ParamsChangeSource;
  changedKeys: (keyof StrategyParams)[];
}

export type ParamsListener = (change: ParamsChange) => void;

/**
 * Read side of the store (what the evaluation loop needs)
 */
export interface ParamsSource {
  current(): Readonly<StrategyParams>;
}

const PARAM_KEYS: readonly (keyof StrategyParams)[] = ["alpha", "maxExpiryHorizon"];

export class ParamsStore implements ParamsSource {
  private snapshot: Readonly<StrategyParams>;
  private listeners: ParamsListener[] = [];

  private constructor(initial: StrategyParams) {
    this.snapshot = Object.freeze({ ...initial });
  }

  /**
   * Create a store from the configured params.
   * Invalid initial params are an error: there is nothing sane to fall back to.
   */
  static create(initial: StrategyParams): Result<ParamsStore, InvalidParameterError> {
    return validateParams(initial).map(params => new ParamsStore(params));
  }

  current(): Readonly<StrategyParams> {
    return this.snapshot;
  }

  /**
   * Merge `changes` into the live params.
   *
   * On error the previous snapshot stays in place.
   */
  apply(
    changes: Partial<StrategyParams>,
    source: ParamsChangeSource = "manual_override",
  ): Result<Readonly<StrategyParams>, InvalidParameterError> {
    const previous = this.snapshot;
    const merged: StrategyParams = { ...previous, ...changes };

    const validated = validateParams(merged);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const next = Object.freeze({ ...validated.value });
    const changedKeys = PARAM_KEYS.filter(key => previous[key] !== next[key]);
    if (changedKeys.length === 0) {
      return ok(previous);
    }

    this.snapshot = next;
    this.notify({ previous, next, source, changedKeys });
    return ok(next);
  }

  /**
   * @returns unsubscribe function
   */
  subscribe(listener: ParamsListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(change: ParamsChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        log.error("Params listener threw an error", { error });
      }
    }
  }
}
