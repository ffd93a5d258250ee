/**
 * In-process timelock. Holds queued transactions keyed by their hash,
 * releases them between eta and eta + grace period, and moves `value`
 * from the timelock's own balance on execution.
 */

import type { Address, Hex } from '@veto-governor/shared';
import { DEFAULT_GRACE_PERIOD_SECONDS } from '@veto-governor/shared';
import type { Executor, Ledger, TimelockTransaction } from '../../governance/ports.js';
import { timelockTxHash } from '../../governance/timelockHash.js';
import type { ManualClock } from './manualClock.js';

export const DEFAULT_TIMELOCK_DELAY_SECONDS = 172_800n; // 2 days

export interface MemoryTimelockOptions {
  address: Address;
  delay?: bigint;
  gracePeriod?: bigint;
}

export class MemoryTimelock implements Executor {
  readonly address: Address;
  private readonly delaySeconds: bigint;
  private readonly graceSeconds: bigint;
  private readonly queued = new Map<Hex, TimelockTransaction>();
  private readonly reverting = new Set<string>();
  /** Transactions executed so far, in order. */
  readonly executed: TimelockTransaction[] = [];

  constructor(
    private readonly clock: ManualClock,
    private readonly ledger: Ledger,
    opts: MemoryTimelockOptions,
  ) {
    this.address = opts.address;
    this.delaySeconds = opts.delay ?? DEFAULT_TIMELOCK_DELAY_SECONDS;
    this.graceSeconds = opts.gracePeriod ?? DEFAULT_GRACE_PERIOD_SECONDS;
  }

  async delay(): Promise<bigint> {
    return this.delaySeconds;
  }

  async gracePeriod(): Promise<bigint> {
    return this.graceSeconds;
  }

  async isQueued(txHash: Hex): Promise<boolean> {
    return this.queued.has(txHash);
  }

  async queueTransaction(tx: TimelockTransaction): Promise<Hex> {
    if (tx.eta < this.clock.currentTime + this.delaySeconds) {
      throw new Error('Timelock::queueTransaction: Estimated execution block must satisfy delay.');
    }
    const hash = timelockTxHash(tx);
    this.queued.set(hash, { ...tx });
    return hash;
  }

  async cancelTransaction(tx: TimelockTransaction): Promise<void> {
    this.queued.delete(timelockTxHash(tx));
  }

  async executeTransaction(tx: TimelockTransaction): Promise<Hex> {
    const hash = timelockTxHash(tx);
    if (!this.queued.has(hash)) {
      throw new Error("Timelock::executeTransaction: Transaction hasn't been queued.");
    }
    const now = this.clock.currentTime;
    if (now < tx.eta) {
      throw new Error("Timelock::executeTransaction: Transaction hasn't surpassed time lock.");
    }
    if (now > tx.eta + this.graceSeconds) {
      throw new Error('Timelock::executeTransaction: Transaction is stale.');
    }
    if (this.reverting.has(tx.target.toLowerCase())) {
      throw new Error('Timelock::executeTransaction: Transaction execution reverted.');
    }
    if (tx.value > 0n && !(await this.ledger.transfer(this.address, tx.target, tx.value))) {
      throw new Error('Timelock::executeTransaction: Transaction execution reverted.');
    }
    this.queued.delete(hash);
    this.executed.push({ ...tx });
    return hash;
  }

  /** Make every call to `target` revert. */
  revertCallsTo(target: Address): void {
    this.reverting.add(target.toLowerCase());
  }

  queuedCount(): number {
    return this.queued.size;
  }
}
