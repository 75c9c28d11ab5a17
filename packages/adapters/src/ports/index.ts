/**
 * Port interfaces for adapters
 *
 * - Defines venue-agnostic interfaces
 * - Adapters implement these ports
 */

export type {
  BookLevel,
  ConnectionEvent,
  InstrumentBook,
  MarketDataError,
  MarketDataEvent,
  MarketDataPort,
  MarketDataUpdateEvent,
} from "./market-data-port";

export type { ExecutionError, ExecutionPort, OrderAck, OrderSide, PlaceOrderRequest } from "./execution-port";
