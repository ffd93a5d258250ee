/**
 * Collaborators the engine reads from or calls into. Chain-backed
 * implementations live in services/chain, in-process ones in
 * services/memory.
 */

import type { Address, GovernanceEvent, Hex } from '@veto-governor/shared';

/** Source of block height and block time. The engine never reads the wall clock. */
export interface Clock {
  blockNumber(): Promise<bigint>;
  /** Unix seconds */
  timestamp(): Promise<bigint>;
}

/** Token registry the electorate's weight comes from. */
export interface VotingWeightSource {
  /** Weight held by `account` at the end of `blockNumber` (a past block). */
  weightOf(account: Address, blockNumber: bigint): Promise<bigint>;
  currentWeightOf(account: Address): Promise<bigint>;
  totalSupply(): Promise<bigint>;
}

/** A call held by the timelock until `eta`. */
export interface TimelockTransaction {
  target: Address;
  value: bigint;
  signature: string;
  data: Hex;
  eta: bigint;
}

/**
 * Delay-then-execute component. Rejections (eta too early, not queued,
 * call reverted) surface as thrown errors.
 */
export interface Executor {
  /** Minimum seconds between queue and execute. */
  delay(): Promise<bigint>;
  /** Seconds after eta during which execution is still allowed. */
  gracePeriod(): Promise<bigint>;
  isQueued(txHash: Hex): Promise<boolean>;
  queueTransaction(tx: TimelockTransaction): Promise<Hex>;
  cancelTransaction(tx: TimelockTransaction): Promise<void>;
  executeTransaction(tx: TimelockTransaction): Promise<Hex>;
}

/** Native-currency balances for the custody account. */
export interface Ledger {
  balanceOf(account: Address): Promise<bigint>;
  /** false when the recipient refuses the funds; nothing moves in that case. */
  transfer(from: Address, to: Address, amount: bigint): Promise<boolean>;
}

export type EventSink = (event: GovernanceEvent) => void;
