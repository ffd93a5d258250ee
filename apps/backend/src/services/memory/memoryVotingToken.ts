/**
 * In-process voting token with per-block checkpoints, the same lookup
 * rules as an ERC-721 checkpointable token: weight at block N is the last
 * checkpoint written at or before N, and N must already be mined.
 */

import type { Address } from '@veto-governor/shared';
import type { VotingWeightSource } from '../../governance/ports.js';
import type { ManualClock } from './manualClock.js';

interface Checkpoint {
  fromBlock: bigint;
  votes: bigint;
}

export class MemoryVotingToken implements VotingWeightSource {
  private readonly checkpoints = new Map<string, Checkpoint[]>();
  private supply = 0n;

  constructor(private readonly clock: ManualClock) {}

  async weightOf(account: Address, blockNumber: bigint): Promise<bigint> {
    if (blockNumber >= this.clock.currentBlock) {
      throw new Error(`weightOf: block ${blockNumber} not yet determined`);
    }
    const list = this.checkpoints.get(account.toLowerCase()) ?? [];
    let votes = 0n;
    for (const cp of list) {
      if (cp.fromBlock > blockNumber) break;
      votes = cp.votes;
    }
    return votes;
  }

  async currentWeightOf(account: Address): Promise<bigint> {
    return this.latest(account);
  }

  async totalSupply(): Promise<bigint> {
    return this.supply;
  }

  mint(to: Address, amount = 1n): void {
    this.write(to, this.latest(to) + amount);
    this.supply += amount;
  }

  transfer(from: Address, to: Address, amount = 1n): void {
    const balance = this.latest(from);
    if (balance < amount) {
      throw new Error(`transfer: ${from} holds ${balance}, needs ${amount}`);
    }
    this.write(from, balance - amount);
    this.write(to, this.latest(to) + amount);
  }

  private latest(account: Address): bigint {
    const list = this.checkpoints.get(account.toLowerCase());
    return list && list.length > 0 ? list[list.length - 1].votes : 0n;
  }

  private write(account: Address, votes: bigint): void {
    const key = account.toLowerCase();
    const list = this.checkpoints.get(key) ?? [];
    const block = this.clock.currentBlock;
    const last = list[list.length - 1];
    if (last && last.fromBlock === block) {
      last.votes = votes;
    } else {
      list.push({ fromBlock: block, votes });
    }
    this.checkpoints.set(key, list);
  }
}
