/**
 * Governance engine: PROPOSE → VOTE → QUEUE (timelock) → EXECUTE,
 * with cancel and veto along the way.
 *
 * Operations run one at a time behind a single queue. Each one reads what
 * it needs from the clock, token and timelock, validates, and only then
 * writes; a thrown GovernanceError leaves engine state untouched.
 */

import type {
  Address,
  AuthorityState,
  DynamicQuorumParams,
  GovernanceEvent,
  GovernanceParams,
  ProposalAction,
  ProposalCalls,
  ProposalState,
  ProposalView,
  VoteReceipt,
} from '@veto-governor/shared';
import { AuthorityManager } from './authority.js';
import { GovernanceError } from './errors.js';
import {
  governanceParamsViolations,
  proposalThresholdViolations,
  quorumParamsViolations,
  votingDelayViolations,
  votingPeriodViolations,
} from './params.js';
import type {
  Clock,
  EventSink,
  Executor,
  Ledger,
  TimelockTransaction,
  VotingWeightSource,
} from './ports.js';
import { ProposalRegistry, type StateContext } from './proposalRegistry.js';
import { bps2Uint, requiredQuorum } from './quorum.js';
import { timelockTxHash } from './timelockHash.js';
import { VoteTally } from './voteTally.js';

export interface GovernanceEngineOptions {
  clock: Clock;
  votingToken: VotingWeightSource;
  executor: Executor;
  ledger: Ledger;
  /** Account whose balance withdraw() sweeps. */
  custodian: Address;
  admin: Address;
  vetoer: Address | null;
  params: GovernanceParams;
  onEvent?: EventSink;
}

export interface WithdrawResult {
  amount: bigint;
  sent: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class GovernanceEngine {
  private readonly clock: Clock;
  private readonly votingToken: VotingWeightSource;
  private readonly executor: Executor;
  private readonly ledger: Ledger;
  private readonly custodian: Address;
  private readonly onEvent: EventSink;

  private readonly votes = new VoteTally();
  private readonly registry = new ProposalRegistry(this.votes);
  private readonly authority: AuthorityManager;
  private params: GovernanceParams;

  private tail: Promise<void> = Promise.resolve();

  constructor(opts: GovernanceEngineOptions) {
    const violations = governanceParamsViolations(opts.params);
    if (violations.length > 0) {
      throw new GovernanceError('InvalidParameter', violations.join('; '));
    }
    this.clock = opts.clock;
    this.votingToken = opts.votingToken;
    this.executor = opts.executor;
    this.ledger = opts.ledger;
    this.custodian = opts.custodian;
    this.onEvent = opts.onEvent ?? (() => undefined);
    this.authority = new AuthorityManager(opts.admin, opts.vetoer);
    this.params = { ...opts.params, quorumParams: { ...opts.params.quorumParams } };
  }

  // ─── Serialization ─────────────────────────────────────

  /** Run `op` after every previously submitted operation has settled. */
  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const run = this.tail.then(op);
    this.tail = run.then(
      () => undefined,
      () => undefined, // the caller receives the rejection through `run`
    );
    return run;
  }

  private emit(events: GovernanceEvent[]): void {
    for (const e of events) this.onEvent(e);
  }

  private async context(): Promise<StateContext> {
    const [blockNumber, timestamp, gracePeriod] = await Promise.all([
      this.clock.blockNumber(),
      this.clock.timestamp(),
      this.executor.gracePeriod(),
    ]);
    return { blockNumber, timestamp, gracePeriod };
  }

  private transactions(actions: ProposalAction[], eta: bigint): TimelockTransaction[] {
    return actions.map((a) => ({
      target: a.target,
      value: a.value,
      signature: a.signature,
      data: a.calldata,
      eta,
    }));
  }

  /**
   * Ask the executor to drop every transaction, carrying on past refusals.
   * Returns one line per transaction it refused.
   */
  private async cancelAll(txs: TimelockTransaction[]): Promise<string[]> {
    const failures: string[] = [];
    for (const tx of txs) {
      try {
        await this.executor.cancelTransaction(tx);
      } catch (err) {
        failures.push(`${tx.signature} on ${tx.target}: ${errorMessage(err)}`);
      }
    }
    return failures;
  }

  /**
   * Pull a queued proposal's actions out of the timelock. Cancelling a
   * transaction that is no longer queued is a no-op for the executor.
   */
  private async cancelQueued(id: number): Promise<void> {
    const p = this.registry.get(id);
    if (p.eta === 0n) return;
    const failures = await this.cancelAll(this.transactions(p.actions, p.eta));
    if (failures.length > 0) {
      throw new GovernanceError('ExecutorRejected', `could not cancel queued actions (${failures.join('; ')})`, id);
    }
  }

  // ─── Proposals ─────────────────────────────────────────

  /**
   * Submit a proposal. The proposer's weight at the previous block must
   * exceed proposalThresholdBPS of the current supply.
   */
  propose(proposer: Address, calls: ProposalCalls, description: string): Promise<number> {
    return this.serialize(async () => {
      const ctx = await this.context();
      const priorBlock = ctx.blockNumber > 0n ? ctx.blockNumber - 1n : 0n;
      const [totalSupply, proposerWeight] = await Promise.all([
        this.votingToken.totalSupply(),
        this.votingToken.weightOf(proposer, priorBlock),
      ]);

      const latest = this.registry.latestProposalId(proposer);
      const previousProposalState =
        latest === undefined ? undefined : this.registry.state(latest, ctx);

      const proposalThreshold = bps2Uint(this.params.proposalThresholdBPS, totalSupply);
      const id = this.registry.create({
        proposer,
        calls,
        description,
        proposerWeight,
        proposalThreshold,
        totalSupply,
        quorumParams: this.params.quorumParams,
        currentBlock: ctx.blockNumber,
        votingDelay: this.params.votingDelay,
        votingPeriod: this.params.votingPeriod,
        previousProposalState,
      });

      const p = this.registry.get(id);
      this.emit([
        {
          type: 'ProposalCreated',
          id,
          proposer,
          actions: this.registry.getActions(id),
          startBlock: p.startBlock,
          endBlock: p.endBlock,
          proposalThreshold,
          quorumVotes: requiredQuorum(totalSupply, 0n, p.quorumParams),
          description,
        },
      ]);
      return id;
    });
  }

  /** Cast a vote weighted by the voter's holdings at the proposal's creation block. */
  castVote(voter: Address, id: number, support: number, reason = ''): Promise<bigint> {
    return this.serialize(async () => {
      const ctx = await this.context();
      const state = this.registry.state(id, ctx);
      const weight = await this.votingToken.weightOf(voter, this.registry.get(id).creationBlock);
      const event = this.votes.castVote(id, voter, support, weight, state, reason);
      this.emit([event]);
      return weight;
    });
  }

  /**
   * Cancel a proposal. Open to the proposer, or to anyone once the
   * proposer's current weight is at or below their qualifying threshold.
   */
  cancel(caller: Address, id: number): Promise<void> {
    return this.serialize(async () => {
      const ctx = await this.context();
      const state = this.registry.state(id, ctx);
      const proposerWeight = await this.votingToken.currentWeightOf(this.registry.get(id).proposer);
      this.registry.assertCancelable(id, caller, proposerWeight, state);

      await this.cancelQueued(id);
      this.registry.cancel(id, caller, proposerWeight, state);
      this.emit([{ type: 'ProposalCanceled', id }]);
    });
  }

  veto(caller: Address, id: number): Promise<void> {
    return this.serialize(async () => {
      this.authority.assertVetoer(caller);
      const ctx = await this.context();
      const state = this.registry.state(id, ctx);
      this.registry.assertVetoable(id, state);

      await this.cancelQueued(id);
      this.registry.markVetoed(id, state);
      this.emit([{ type: 'ProposalVetoed', id }]);
    });
  }

  /** Hand a Succeeded proposal's actions to the timelock. Returns the eta. */
  queue(id: number): Promise<bigint> {
    return this.serialize(async () => {
      const ctx = await this.context();
      const state = this.registry.state(id, ctx);
      this.registry.assertQueueable(id, state);

      const eta = ctx.timestamp + (await this.executor.delay());
      const txs = this.transactions(this.registry.get(id).actions, eta);

      const seen = new Set<string>();
      for (const tx of txs) {
        const hash = timelockTxHash(tx);
        if (seen.has(hash) || (await this.executor.isQueued(hash))) {
          throw new GovernanceError('ActionAlreadyQueued', `identical action already queued at eta ${eta}`, id);
        }
        seen.add(hash);
      }

      const queued: TimelockTransaction[] = [];
      try {
        for (const tx of txs) {
          await this.executor.queueTransaction(tx);
          queued.push(tx);
        }
      } catch (err) {
        const failures = await this.cancelAll(queued);
        const rollback = failures.length > 0 ? `; rollback failed for ${failures.join('; ')}` : '';
        throw new GovernanceError('ExecutorRejected', `${errorMessage(err)}${rollback}`, id);
      }

      this.registry.markQueued(id, eta, state);
      this.emit([{ type: 'ProposalQueued', id, eta }]);
      return eta;
    });
  }

  /** Run a Queued proposal's actions through the timelock once eta has passed. */
  execute(id: number): Promise<void> {
    return this.serialize(async () => {
      const ctx = await this.context();
      const state = this.registry.state(id, ctx);
      this.registry.assertExecutable(id, state, ctx.timestamp);

      const p = this.registry.get(id);
      for (const tx of this.transactions(p.actions, p.eta)) {
        try {
          await this.executor.executeTransaction(tx);
        } catch (err) {
          throw new GovernanceError('ExecutorRejected', errorMessage(err), id);
        }
      }

      this.registry.markExecuted(id, state, ctx.timestamp);
      this.emit([{ type: 'ProposalExecuted', id }]);
    });
  }

  // ─── Views ─────────────────────────────────────────────

  state(id: number): Promise<ProposalState> {
    return this.serialize(async () => this.registry.state(id, await this.context()));
  }

  proposal(id: number): Promise<ProposalView> {
    return this.serialize(async () => {
      const state = this.registry.state(id, await this.context());
      return {
        ...this.registry.snapshot(id),
        ...this.votes.tally(id),
        quorumVotes: this.registry.quorumVotes(id),
        state,
      };
    });
  }

  getActions(id: number): ProposalAction[] {
    return this.registry.getActions(id);
  }

  getReceipt(id: number, voter: Address): VoteReceipt {
    this.registry.get(id);
    return this.votes.receipt(id, voter);
  }

  quorumVotes(id: number): bigint {
    return this.registry.quorumVotes(id);
  }

  proposalCount(): number {
    return this.registry.count();
  }

  async proposalThreshold(): Promise<bigint> {
    return bps2Uint(this.params.proposalThresholdBPS, await this.votingToken.totalSupply());
  }

  parameters(): GovernanceParams {
    return { ...this.params, quorumParams: { ...this.params.quorumParams } };
  }

  authorityState(): AuthorityState {
    return this.authority.state();
  }

  // ─── Admin parameters ──────────────────────────────────

  setVotingDelay(caller: Address, newVotingDelay: bigint): Promise<void> {
    return this.serialize(async () => {
      this.applyParameters(caller, { votingDelay: newVotingDelay });
    });
  }

  setVotingPeriod(caller: Address, newVotingPeriod: bigint): Promise<void> {
    return this.serialize(async () => {
      this.applyParameters(caller, { votingPeriod: newVotingPeriod });
    });
  }

  setProposalThresholdBPS(caller: Address, newProposalThresholdBPS: number): Promise<void> {
    return this.serialize(async () => {
      this.applyParameters(caller, { proposalThresholdBPS: newProposalThresholdBPS });
    });
  }

  /** Applies to proposals created from now on; existing ones keep theirs. */
  setDynamicQuorumParams(caller: Address, newParams: DynamicQuorumParams): Promise<void> {
    return this.serialize(async () => {
      this.applyParameters(caller, { quorumParams: newParams });
    });
  }

  /** Several changes at once. Either all of them apply or none does. */
  updateParameters(caller: Address, changes: Partial<GovernanceParams>): Promise<GovernanceParams> {
    return this.serialize(async () => {
      this.applyParameters(caller, changes);
      return this.parameters();
    });
  }

  private applyParameters(caller: Address, changes: Partial<GovernanceParams>): void {
    this.authority.assertAdmin(caller);
    const { votingDelay, votingPeriod, proposalThresholdBPS, quorumParams } = changes;
    const violations = [
      ...(votingDelay === undefined ? [] : votingDelayViolations(votingDelay)),
      ...(votingPeriod === undefined ? [] : votingPeriodViolations(votingPeriod)),
      ...(proposalThresholdBPS === undefined ? [] : proposalThresholdViolations(proposalThresholdBPS)),
      ...(quorumParams === undefined ? [] : quorumParamsViolations(quorumParams)),
    ];
    if (violations.length > 0) {
      throw new GovernanceError('InvalidParameter', violations.join('; '));
    }

    const events: GovernanceEvent[] = [];
    if (votingDelay !== undefined) {
      events.push({ type: 'VotingDelaySet', oldVotingDelay: this.params.votingDelay, newVotingDelay: votingDelay });
      this.params.votingDelay = votingDelay;
    }
    if (votingPeriod !== undefined) {
      events.push({ type: 'VotingPeriodSet', oldVotingPeriod: this.params.votingPeriod, newVotingPeriod: votingPeriod });
      this.params.votingPeriod = votingPeriod;
    }
    if (proposalThresholdBPS !== undefined) {
      events.push({
        type: 'ProposalThresholdBPSSet',
        oldProposalThresholdBPS: this.params.proposalThresholdBPS,
        newProposalThresholdBPS: proposalThresholdBPS,
      });
      this.params.proposalThresholdBPS = proposalThresholdBPS;
    }
    if (quorumParams !== undefined) {
      events.push({ type: 'DynamicQuorumParamsSet', oldParams: this.params.quorumParams, newParams: { ...quorumParams } });
      this.params.quorumParams = { ...quorumParams };
    }
    this.emit(events);
  }

  // ─── Authority ─────────────────────────────────────────

  setPendingAdmin(caller: Address, newPendingAdmin: Address | null): Promise<void> {
    return this.serialize(async () => {
      this.emit(this.authority.setPendingAdmin(caller, newPendingAdmin));
    });
  }

  acceptAdmin(caller: Address): Promise<void> {
    return this.serialize(async () => {
      this.emit(this.authority.acceptAdmin(caller));
    });
  }

  setPendingVetoer(caller: Address, newPendingVetoer: Address | null): Promise<void> {
    return this.serialize(async () => {
      this.emit(this.authority.setPendingVetoer(caller, newPendingVetoer));
    });
  }

  acceptVetoer(caller: Address): Promise<void> {
    return this.serialize(async () => {
      this.emit(this.authority.acceptVetoer(caller));
    });
  }

  burnVetoPower(caller: Address): Promise<void> {
    return this.serialize(async () => {
      this.emit(this.authority.burnVetoPower(caller));
    });
  }

  /** Sweep the custodian's balance to the admin; `sent` is false if the transfer bounced. */
  withdraw(caller: Address): Promise<WithdrawResult> {
    return this.serialize(async () => {
      const event = await this.authority.withdraw(caller, this.ledger, this.custodian);
      this.emit([event]);
      return { amount: event.amount, sent: event.sent };
    });
  }
}
