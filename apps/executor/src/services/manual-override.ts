/**
 * Manual Override Controller
 *
 * Operator channel on stdin, one command per line:
 *
 *   alpha <value>     set alpha (0 < value <= 1)
 *   horizon <ticks>   set maxExpiryHorizon (non-negative integer)
 *   +  /  -           nudge alpha by the configured step
 *   show              print the live params
 *
 * Every accepted change goes through ParamsStore.apply, so range checks live in one place.
 */

import { createInterface, type Interface } from "node:readline";
import { err, ok, type Result } from "neverthrow";
import type { StrategyParams } from "@option-edge/core";
import { logger } from "@option-edge/utils";

import type { ParamsStore } from "./params-store";

const log = logger.child("override");

// ─────────────────────────────────────────────────────────────────────────────
// Command parsing
// ─────────────────────────────────────────────────────────────────────────────

export type OverrideCommand =
  | { type: "set_alpha"; value: number }
  | { type: "set_horizon"; value: number }
  | { type: "nudge_alpha"; direction: 1 | -1 }
  | { type: "show" };

export interface InvalidCommandError {
  type: "invalid_command";
  message: string;
}

function parseNumberArg(command: string, arg: string | undefined): Result<number, InvalidCommandError> {
  if (arg === undefined) {
    return err({ type: "invalid_command", message: `${command} requires a value` });
  }
  const value = Number(arg);
  if (arg.trim() === "" || Number.isNaN(value)) {
    return err({ type: "invalid_command", message: `Invalid number for ${command}: ${arg}` });
  }
  return ok(value);
}

/**
 * Parse one operator line
 *
 * @returns ok(null) for a blank line
 */
export function parseOverrideCommand(line: string): Result<OverrideCommand | null, InvalidCommandError> {
  const [head, arg, ...extra] = line.trim().split(/\s+/);
  if (head === undefined || head === "") {
    return ok(null);
  }
  if (extra.length > 0) {
    return err({ type: "invalid_command", message: `Too many arguments: ${line.trim()}` });
  }

  switch (head.toLowerCase()) {
    case "alpha":
      return parseNumberArg("alpha", arg).map((value): OverrideCommand => ({ type: "set_alpha", value }));
    case "horizon":
      return parseNumberArg("horizon", arg).map((value): OverrideCommand => ({ type: "set_horizon", value }));
    case "+":
      return ok({ type: "nudge_alpha", direction: 1 });
    case "-":
      return ok({ type: "nudge_alpha", direction: -1 });
    case "show":
      return ok({ type: "show" });
    default:
      return err({ type: "invalid_command", message: `Unknown command: ${head}` });
  }
}

/**
 * Alpha after one nudge, clamped to (0, 1].
 * A step that would reach zero or below leaves alpha unchanged.
 */
export function nudgeAlpha(alpha: number, step: number, direction: 1 | -1): number {
  // Round away binary noise (0.85 + 0.01 must print as 0.86)
  const next = Math.round((alpha + direction * step) * 1e9) / 1e9;
  if (next > 1) return 1;
  if (next <= 0) return alpha;
  return next;
}

// ─────────────────────────────────────────────────────────────────────────────
// Controller
// ─────────────────────────────────────────────────────────────────────────────

export type OverrideOutcome =
  | { status: "applied"; params: Readonly<StrategyParams> }
  | { status: "shown"; params: Readonly<StrategyParams> }
  | { status: "rejected"; message: string }
  | { status: "ignored" };

export interface ManualOverrideConfig {
  paramsStore: ParamsStore;
  alphaStep: number;
}

export class ManualOverrideController {
  private readonly paramsStore: ParamsStore;
  private readonly alphaStep: number;
  private readline: Interface | null = null;

  constructor(config: ManualOverrideConfig) {
    this.paramsStore = config.paramsStore;
    this.alphaStep = config.alphaStep;
  }

  /**
   * Handle one operator line
   */
  handleLine(line: string): OverrideOutcome {
    const parsed = parseOverrideCommand(line);
    if (parsed.isErr()) {
      log.warn("Override rejected", { input: line.trim(), reason: parsed.error.message });
      return { status: "rejected", message: parsed.error.message };
    }

    const command = parsed.value;
    if (command === null) {
      return { status: "ignored" };
    }

    if (command.type === "show") {
      const params = this.paramsStore.current();
      log.info("Current params", { alpha: params.alpha, maxExpiryHorizon: params.maxExpiryHorizon });
      return { status: "shown", params };
    }

    const result = this.paramsStore.apply(this.toChanges(command), "manual_override");
    if (result.isErr()) {
      log.warn("Override rejected", { input: line.trim(), reason: result.error.message });
      return { status: "rejected", message: result.error.message };
    }

    return { status: "applied", params: result.value };
  }

  /**
   * Start reading commands from a line-oriented stream (stdin by default)
   */
  start(input: NodeJS.ReadableStream = process.stdin): void {
    if (this.readline) return;

    this.readline = createInterface({ input, terminal: false });
    this.readline.on("line", line => {
      this.handleLine(line);
    });
    log.info("Manual override listening (alpha <v> | horizon <n> | + | - | show)");
  }

  stop(): void {
    this.readline?.close();
    this.readline = null;
  }

  private toChanges(command: Exclude<OverrideCommand, { type: "show" }>): Partial<StrategyParams> {
    switch (command.type) {
      case "set_alpha":
        return { alpha: command.value };
      case "set_horizon":
        return { maxExpiryHorizon: command.value };
      case "nudge_alpha":
        return { alpha: nudgeAlpha(this.paramsStore.current().alpha, this.alphaStep, command.direction) };
    }
  }
}
