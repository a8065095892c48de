/**
 * @shareport/oracle — Price Transition Oracle.
 *
 * Pure transition math over immutable snapshots, plus the stateful oracle
 * that owns one snapshot at a time.
 */

export { PriceTransitionOracle } from "./price-transition-oracle.js";
export {
  priceAt,
  transitionProgressAt,
  applyPriceUpdate,
  applyPolicyChange,
  completeTransition,
  deviationBps,
  inTransition,
  assertPolicy,
} from "./transition.js";
export { BPS } from "./types.js";
export type { OracleState, OracleConfig, PriceUpdateOutcome } from "./types.js";
export { OracleError } from "./errors.js";
export type { OracleErrorCode } from "./errors.js";
