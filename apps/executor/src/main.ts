/**
 * Executor Main Entry Point
 *
 * - Composition root for executor
 * - Event-driven: every market data update is evaluated as it arrives
 * - Operator overrides on stdin
 */

import {
  DEFAULT_RECONNECT_CONFIG,
  ExchangeExecutionAdapter,
  ExchangeMarketDataAdapter,
} from "@option-edge/adapters";
import { logger } from "@option-edge/utils";

import { env } from "./env";
import { ManualOverrideController } from "./services/manual-override";
import { OrderIdGenerator } from "./services/order-id";
import { ParamsStore } from "./services/params-store";
import { TickClock } from "./services/tick-clock";
import { UnderlyingPriceCache } from "./services/underlying-price-cache";
import { processMarketData } from "./usecases/process-market-data";

const HEARTBEAT_INTERVAL_MS = 30_000;

/**
 * Main executor function
 */
async function main(): Promise<void> {
  logger.info("Starting executor", {
    url: env.EXCHANGE_WS_URL,
    appEnv: env.APP_ENV,
    logLevel: logger.getCurrentLevel(),
  });

  // Startup params are fatal when invalid
  const storeResult = ParamsStore.create({
    alpha: env.ALPHA,
    maxExpiryHorizon: env.MAX_EXPIRY_HORIZON,
  });
  if (storeResult.isErr()) {
    logger.error("Invalid strategy params", storeResult.error);
    throw new Error("Strategy params validation failed");
  }
  const paramsStore = storeResult.value;

  paramsStore.subscribe(change => {
    logger.info("Params updated", {
      source: change.source,
      changedKeys: change.changedKeys,
      alpha: change.next.alpha,
      maxExpiryHorizon: change.next.maxExpiryHorizon,
    });
  });

  logger.info("Strategy params loaded", { ...paramsStore.current() });

  // Initialize adapters (orders go out on the market data socket)
  const marketDataAdapter = new ExchangeMarketDataAdapter(
    { url: env.EXCHANGE_WS_URL, teamSecret: env.TEAM_SECRET },
    { ...DEFAULT_RECONNECT_CONFIG, initialDelayMs: env.RECONNECT_DELAY_MS },
  );
  const executionAdapter = new ExchangeExecutionAdapter(marketDataAdapter);

  // Initialize services
  const tickClock = new TickClock();
  const priceCache = new UnderlyingPriceCache();
  const orderIds = new OrderIdGenerator();

  const totals = { evaluated: 0, buys: 0, skipped: 0, malformed: 0 };

  // Set up market data event handlers
  marketDataAdapter.onEvent(event => {
    switch (event.type) {
      case "market_data": {
        const summary = processMarketData(
          {
            paramsSource: paramsStore,
            tickClock,
            priceCache,
            orderIds,
            executionPort: executionAdapter,
            orderExpiry: env.ORDER_EXPIRY,
          },
          event,
        );
        totals.evaluated += summary.evaluated;
        totals.buys += summary.buys;
        totals.skipped += summary.skipped;
        totals.malformed += summary.malformed;
        logger.debug("Update processed", { ...summary });
        break;
      }
      case "connected":
        logger.info("Market data connected");
        break;
      case "disconnected":
        logger.warn("Market data disconnected", { reason: event.reason });
        break;
      case "reconnecting":
        logger.info("Market data reconnecting", { reason: event.reason });
        break;
    }
  });

  // Connect (a failed first attempt is retried by the adapter)
  logger.info("Connecting to market data...");
  const connectResult = await marketDataAdapter.connect();
  if (connectResult.isErr()) {
    logger.warn("Initial connection failed; retrying with backoff", connectResult.error);
  }

  // Operator channel
  const overrideController = new ManualOverrideController({
    paramsStore,
    alphaStep: env.ALPHA_STEP,
  });
  if (env.MANUAL_OVERRIDE_ENABLED) {
    overrideController.start();
  }

  // Heartbeat (helps distinguish "quiet" vs "stuck")
  const heartbeatInterval = setInterval(() => {
    const lastSpotMs = priceCache.getLastUpdateMs();
    logger.info("Executor heartbeat", {
      connected: marketDataAdapter.isConnected(),
      tick: tickClock.current(),
      updates: tickClock.updateCount(),
      underlyings: priceCache.symbols().length,
      spotAgeMs: lastSpotMs > 0 ? Date.now() - lastSpotMs : null,
      ...totals,
      ...paramsStore.current(),
    });
  }, HEARTBEAT_INTERVAL_MS);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");

    clearInterval(heartbeatInterval);
    overrideController.stop();
    await marketDataAdapter.disconnect();

    logger.info("Shutdown complete", { updates: tickClock.updateCount(), ...totals });
    process.exitCode = 0;
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  logger.info("Executor running");
}

// Run
main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exitCode = 1;
});
