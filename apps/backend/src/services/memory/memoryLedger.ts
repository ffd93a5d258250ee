import type { Address } from '@veto-governor/shared';
import type { Ledger } from '../../governance/ports.js';

/**
 * Native-currency balances kept in process. Accounts marked with
 * rejectFunds() refuse incoming transfers, like a contract without a
 * payable fallback.
 */
export class MemoryLedger implements Ledger {
  private readonly balances = new Map<string, bigint>();
  private readonly rejecting = new Set<string>();

  async balanceOf(account: Address): Promise<bigint> {
    return this.balanceSync(account);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (this.rejecting.has(to.toLowerCase())) return false;
    const available = this.balanceSync(from);
    if (available < amount) return false;
    this.balances.set(from.toLowerCase(), available - amount);
    this.balances.set(to.toLowerCase(), this.balanceSync(to) + amount);
    return true;
  }

  fund(account: Address, amount: bigint): void {
    this.balances.set(account.toLowerCase(), this.balanceSync(account) + amount);
  }

  rejectFunds(account: Address): void {
    this.rejecting.add(account.toLowerCase());
  }

  balanceSync(account: Address): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }
}
