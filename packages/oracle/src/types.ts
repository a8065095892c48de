/**
 * Oracle Types
 */

import type { Address } from "@shareport/types";

/**
 * Basis points in one whole (100%).
 */
export const BPS = 10_000n;

/**
 * Snapshot of the oracle between updates.
 *
 * `transitionStartPrice === targetPrice` means no transition is in
 * progress. Inside one period, `appliedChangeBpsInPeriod` never exceeds
 * `maxDeviationBpsPerPeriod`.
 */
export interface OracleState {
  readonly targetPrice: bigint;
  readonly transitionStartPrice: bigint;
  /** Unix seconds of the last update, policy change or forced completion */
  readonly lastUpdateAt: bigint;
  readonly maxDeviationBpsPerPeriod: bigint;
  readonly periodSeconds: bigint;
  readonly appliedChangeBpsInPeriod: bigint;
  readonly round: number;
}

export interface OracleConfig {
  /** Address the oracle reports under; also its event stream key */
  readonly address: Address;
  readonly owner: Address;
  readonly initialPrice: bigint;
  readonly maxDeviationBps: bigint;
  readonly periodSeconds: bigint;
}

/**
 * Outcome of applying an update to a snapshot.
 */
export interface PriceUpdateOutcome {
  readonly state: OracleState;
  /** True when the new price took effect at once */
  readonly immediate: boolean;
  readonly deltaBps: bigint;
}
