/**
 * packages/adapters - Exchange Adapters
 *
 * - Port interfaces for venue-agnostic trading
 * - Venue-specific adapter implementations
 */

// Port interfaces
export * from "./ports";

// Competition exchange adapter
export * from "./exchange";
