/**
 * Admin and vetoer slots. Both roles move by the same two-step handoff:
 * the live holder names a pending successor, the successor accepts.
 * The vetoer can also be burned (set to absent) for good.
 */

import type { Address, AuthorityState, GovernanceEvent } from '@veto-governor/shared';
import { GovernanceError, type GovernanceErrorCode } from './errors.js';
import type { Ledger } from './ports.js';

type WithdrawEvent = Extract<GovernanceEvent, { type: 'Withdraw' }>;

function sameAccount(a: Address | null, b: Address | null): boolean {
  if (a === null || b === null) return false;
  return a.toLowerCase() === b.toLowerCase();
}

interface RoleCodes {
  only: GovernanceErrorCode;
  pendingOnly: GovernanceErrorCode;
}

/** One role: a live holder and an optional pending successor. */
export class RoleSlot {
  private pendingHolder: Address | null = null;

  constructor(
    private liveHolder: Address | null,
    private readonly codes: RoleCodes,
  ) {}

  get live(): Address | null {
    return this.liveHolder;
  }

  get pending(): Address | null {
    return this.pendingHolder;
  }

  isHolder(caller: Address): boolean {
    return sameAccount(caller, this.liveHolder);
  }

  assertHolder(caller: Address): void {
    if (!this.isHolder(caller)) {
      throw new GovernanceError(this.codes.only, `${caller} is not the current holder`);
    }
  }

  /** Returns [oldPending, newPending]. */
  setPending(caller: Address, next: Address | null): [Address | null, Address | null] {
    this.assertHolder(caller);
    const old = this.pendingHolder;
    this.pendingHolder = next;
    return [old, next];
  }

  /** Returns [oldLive, newLive]. */
  accept(caller: Address): [Address | null, Address | null] {
    if (!sameAccount(caller, this.pendingHolder)) {
      throw new GovernanceError(this.codes.pendingOnly, `${caller} is not the pending holder`);
    }
    const old = this.liveHolder;
    this.liveHolder = this.pendingHolder;
    this.pendingHolder = null;
    return [old, this.liveHolder];
  }

  /** Clear both slots. Returns the previous live and pending holders. */
  clear(): { live: Address | null; pending: Address | null } {
    const prev = { live: this.liveHolder, pending: this.pendingHolder };
    this.liveHolder = null;
    this.pendingHolder = null;
    return prev;
  }
}

export class AuthorityManager {
  private readonly admin: RoleSlot;
  private readonly vetoer: RoleSlot;

  constructor(admin: Address, vetoer: Address | null) {
    this.admin = new RoleSlot(admin, { only: 'AdminOnly', pendingOnly: 'PendingAdminOnly' });
    this.vetoer = new RoleSlot(vetoer, { only: 'VetoerOnly', pendingOnly: 'PendingVetoerOnly' });
  }

  state(): AuthorityState {
    return {
      admin: this.admin.live,
      pendingAdmin: this.admin.pending,
      vetoer: this.vetoer.live,
      pendingVetoer: this.vetoer.pending,
    };
  }

  get vetoPowerBurned(): boolean {
    return this.vetoer.live === null;
  }

  // ─── Admin ─────────────────────────────────────────────

  assertAdmin(caller: Address): void {
    this.admin.assertHolder(caller);
  }

  setPendingAdmin(caller: Address, newPendingAdmin: Address | null): GovernanceEvent[] {
    const [oldPendingAdmin] = this.admin.setPending(caller, newPendingAdmin);
    return [{ type: 'NewPendingAdmin', oldPendingAdmin, newPendingAdmin }];
  }

  acceptAdmin(caller: Address): GovernanceEvent[] {
    const [oldAdmin, newAdmin] = this.admin.accept(caller);
    return [
      { type: 'NewAdmin', oldAdmin, newAdmin },
      { type: 'NewPendingAdmin', oldPendingAdmin: newAdmin, newPendingAdmin: null },
    ];
  }

  /**
   * Sweep the custodian's whole balance to the admin. A rejected transfer
   * is reported through `sent`, not thrown.
   */
  async withdraw(caller: Address, ledger: Ledger, custodian: Address): Promise<WithdrawEvent> {
    this.assertAdmin(caller);
    const admin = this.admin.live;
    if (admin === null) throw new GovernanceError('AdminOnly', 'no admin set');
    const amount = await ledger.balanceOf(custodian);
    const sent = await ledger.transfer(custodian, admin, amount);
    return { type: 'Withdraw', amount, sent };
  }

  // ─── Vetoer ────────────────────────────────────────────

  assertVetoer(caller: Address): void {
    if (this.vetoPowerBurned) {
      throw new GovernanceError('VetoPowerBurned', 'veto power has been burned');
    }
    this.vetoer.assertHolder(caller);
  }

  setPendingVetoer(caller: Address, newPendingVetoer: Address | null): GovernanceEvent[] {
    this.assertVetoer(caller);
    const [oldPendingVetoer] = this.vetoer.setPending(caller, newPendingVetoer);
    return [{ type: 'NewPendingVetoer', oldPendingVetoer, newPendingVetoer }];
  }

  acceptVetoer(caller: Address): GovernanceEvent[] {
    const [oldVetoer, newVetoer] = this.vetoer.accept(caller);
    return [{ type: 'NewVetoer', oldVetoer, newVetoer }];
  }

  /** Permanently remove the vetoer and any pending successor. */
  burnVetoPower(caller: Address): GovernanceEvent[] {
    this.assertVetoer(caller);
    const prev = this.vetoer.clear();
    const events: GovernanceEvent[] = [];
    if (prev.pending !== null) {
      events.push({ type: 'NewPendingVetoer', oldPendingVetoer: prev.pending, newPendingVetoer: null });
    }
    events.push({ type: 'NewVetoer', oldVetoer: prev.live, newVetoer: null });
    return events;
  }
}
