/**
 * Executor Services
 */

export {
  ParamsStore,
  type ParamsChange,
  type ParamsChangeSource,
  type ParamsListener,
  type ParamsSource,
} from "./params-store";
export { TickClock } from "./tick-clock";
export { UnderlyingPriceCache } from "./underlying-price-cache";
export { OrderIdGenerator } from "./order-id";
export {
  ManualOverrideController,
  nudgeAlpha,
  parseOverrideCommand,
  type InvalidCommandError,
  type OverrideCommand,
  type OverrideOutcome,
} from "./manual-override";
