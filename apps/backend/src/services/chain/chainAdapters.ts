/**
 * Chain-backed collaborators: block clock, checkpointed voting token,
 * Timelock contract and native-currency custody.
 */

import type { Address, Hex } from '@veto-governor/shared';
import { TimelockAbi } from '../../abi/Timelock.js';
import { VotingTokenAbi } from '../../abi/VotingToken.js';
import type {
  Clock,
  Executor,
  Ledger,
  TimelockTransaction,
  VotingWeightSource,
} from '../../governance/ports.js';
import type { GovernancePublicClient, GovernanceWalletClient } from './clients.js';

export class ChainClock implements Clock {
  constructor(private readonly client: GovernancePublicClient) {}

  async blockNumber(): Promise<bigint> {
    return this.client.getBlockNumber();
  }

  async timestamp(): Promise<bigint> {
    const block = await this.client.getBlock({ blockTag: 'latest' });
    return block.timestamp;
  }
}

export class ChainVotingToken implements VotingWeightSource {
  constructor(
    private readonly client: GovernancePublicClient,
    private readonly address: Address,
  ) {}

  async weightOf(account: Address, blockNumber: bigint): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: VotingTokenAbi,
      functionName: 'getPriorVotes',
      args: [account, blockNumber],
    });
  }

  async currentWeightOf(account: Address): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: VotingTokenAbi,
      functionName: 'getCurrentVotes',
      args: [account],
    });
  }

  async totalSupply(): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: VotingTokenAbi,
      functionName: 'totalSupply',
    });
  }
}

/**
 * Timelock contract. The signer must be the timelock's admin. Each write
 * waits for its receipt and throws if the transaction reverted.
 */
export class ChainTimelock implements Executor {
  constructor(
    private readonly publicClient: GovernancePublicClient,
    private readonly walletClient: GovernanceWalletClient | null,
    private readonly address: Address,
  ) {}

  async delay(): Promise<bigint> {
    return this.publicClient.readContract({
      address: this.address,
      abi: TimelockAbi,
      functionName: 'delay',
    });
  }

  async gracePeriod(): Promise<bigint> {
    return this.publicClient.readContract({
      address: this.address,
      abi: TimelockAbi,
      functionName: 'GRACE_PERIOD',
    });
  }

  async isQueued(txHash: Hex): Promise<boolean> {
    return this.publicClient.readContract({
      address: this.address,
      abi: TimelockAbi,
      functionName: 'queuedTransactions',
      args: [txHash],
    });
  }

  async queueTransaction(tx: TimelockTransaction): Promise<Hex> {
    const hash = await this.signer('queueTransaction').writeContract({
      address: this.address,
      abi: TimelockAbi,
      functionName: 'queueTransaction',
      args: [tx.target, tx.value, tx.signature, tx.data, tx.eta],
    });
    return this.confirm('queueTransaction', hash);
  }

  async cancelTransaction(tx: TimelockTransaction): Promise<void> {
    const hash = await this.signer('cancelTransaction').writeContract({
      address: this.address,
      abi: TimelockAbi,
      functionName: 'cancelTransaction',
      args: [tx.target, tx.value, tx.signature, tx.data, tx.eta],
    });
    await this.confirm('cancelTransaction', hash);
  }

  async executeTransaction(tx: TimelockTransaction): Promise<Hex> {
    const hash = await this.signer('executeTransaction').writeContract({
      address: this.address,
      abi: TimelockAbi,
      functionName: 'executeTransaction',
      args: [tx.target, tx.value, tx.signature, tx.data, tx.eta],
      value: tx.value,
    });
    return this.confirm('executeTransaction', hash);
  }

  private signer(action: string): GovernanceWalletClient {
    if (!this.walletClient) {
      throw new Error(`[chain/timelock] ${action}: signer not configured`);
    }
    return this.walletClient;
  }

  private async confirm(action: string, hash: Hex): Promise<Hex> {
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
    if (receipt.status !== 'success') {
      throw new Error(`[chain/timelock] ${action} reverted in ${hash}`);
    }
    return hash;
  }
}

/**
 * Custody balance held by the signer account. A send that fails or reverts
 * is reported as `false`.
 */
export class ChainLedger implements Ledger {
  constructor(
    private readonly publicClient: GovernancePublicClient,
    private readonly walletClient: GovernanceWalletClient | null,
  ) {}

  async balanceOf(account: Address): Promise<bigint> {
    return this.publicClient.getBalance({ address: account });
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (!this.walletClient || this.walletClient.account.address.toLowerCase() !== from.toLowerCase()) {
      throw new Error(`[chain/ledger] signer does not control ${from}`);
    }
    try {
      const hash = await this.walletClient.sendTransaction({ to, value: amount });
      const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
      return receipt.status === 'success';
    } catch (err) {
      console.error('[chain/ledger] transfer failed:', err);
      return false;
    }
  }
}
