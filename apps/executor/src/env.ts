/**
 * Executor Environment Configuration
 *
 * - Type-safe environment variables with Zod validation
 * - Values are read from `.env` (see .env.example) and the process environment
 *
 * Import `env` instead of reading `process.env` directly.
 */

import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform(value => value === "true" || value === "1");

export const env = createEnv({
  server: {
    // =========================================================================
    // Exchange
    // =========================================================================

    /**
     * Exchange WebSocket endpoint, without credentials
     *
     * Example: ws://localhost:9001/trade
     */
    EXCHANGE_WS_URL: z.url(),

    /**
     * Team auth token, appended as the `team_secret` query parameter.
     * Never logged.
     */
    TEAM_SECRET: z.string().min(1),

    /**
     * Delay before the first reconnect attempt (ms). Doubles per attempt, capped at 30s.
     */
    RECONNECT_DELAY_MS: z.coerce.number().int().positive().default(100),

    // =========================================================================
    // Strategy
    // =========================================================================

    /**
     * Initial alpha. Range (0, 1] is enforced by validateParams at startup.
     */
    ALPHA: z.coerce.number().default(0.85),

    /**
     * Initial maximum remaining ticks to expiry for a quote to be tradeable
     */
    MAX_EXPIRY_HORIZON: z.coerce.number().default(100_000_000),

    /**
     * Step for the `+` / `-` operator commands
     */
    ALPHA_STEP: z.coerce.number().positive().max(1).default(0.01),

    /**
     * Good-till tick sent with every order
     */
    ORDER_EXPIRY: z.coerce.number().int().nonnegative().default(99_999_999),

    // =========================================================================
    // Operator
    // =========================================================================

    /**
     * Read override commands (`alpha <v>`, `horizon <n>`, `+`, `-`, `show`) from stdin
     */
    MANUAL_OVERRIDE_ENABLED: booleanString,

    // =========================================================================
    // Logging / Application
    // =========================================================================

    /**
     * Valid: ERROR | WARN | LOG | INFO | DEBUG (per-quote decisions are DEBUG)
     */
    LOG_LEVEL: z.enum(["ERROR", "WARN", "LOG", "INFO", "DEBUG"]).default("INFO"),

    APP_ENV: z.enum(["development", "test", "production"]).default("development"),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
