/**
 * Proposal store. Owns the immutable action payloads and the lifecycle
 * flags; state() derives the lifecycle state from flags, tallies, block
 * height and time on every call. No state value is ever stored.
 */

import {
  MAX_PROPOSAL_ACTIONS,
  type Address,
  type DynamicQuorumParams,
  type Proposal,
  type ProposalAction,
  type ProposalCalls,
  type ProposalState,
} from '@veto-governor/shared';
import { GovernanceError } from './errors.js';
import { requiredQuorum } from './quorum.js';
import type { VoteTally } from './voteTally.js';

export interface CreateProposalInput {
  proposer: Address;
  calls: ProposalCalls;
  description: string;
  /** Proposer's weight as of the block before creation. */
  proposerWeight: bigint;
  proposalThreshold: bigint;
  totalSupply: bigint;
  quorumParams: DynamicQuorumParams;
  currentBlock: bigint;
  votingDelay: bigint;
  votingPeriod: bigint;
  /** State of the proposer's previous proposal, if any. */
  previousProposalState?: ProposalState;
}

/** Chain position the derived state is evaluated at. */
export interface StateContext {
  blockNumber: bigint;
  timestamp: bigint;
  gracePeriod: bigint;
}

const TERMINAL_STATES: ReadonlySet<ProposalState> = new Set([
  'Canceled',
  'Defeated',
  'Expired',
  'Vetoed',
  'Executed',
]);

export function isTerminal(state: ProposalState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Zip the four parallel call sequences into actions. They must share one
 * length between 1 and MAX_PROPOSAL_ACTIONS.
 */
export function toActions(calls: ProposalCalls): ProposalAction[] {
  const n = calls.targets.length;
  if (
    calls.values.length !== n ||
    calls.signatures.length !== n ||
    calls.calldatas.length !== n
  ) {
    throw new GovernanceError('ActionsMismatch', 'proposal function information arity mismatch');
  }
  if (n === 0) {
    throw new GovernanceError('ActionsMismatch', 'must provide actions');
  }
  if (n > MAX_PROPOSAL_ACTIONS) {
    throw new GovernanceError('ActionsMismatch', `too many actions (max ${MAX_PROPOSAL_ACTIONS})`);
  }
  return calls.targets.map((target, i) => ({
    target,
    value: calls.values[i],
    signature: calls.signatures[i],
    calldata: calls.calldatas[i],
  }));
}

export class ProposalRegistry {
  private readonly proposals = new Map<number, Proposal>();
  private readonly latestByProposer = new Map<string, number>();
  private nextId = 1;

  constructor(private readonly votes: VoteTally) {}

  count(): number {
    return this.nextId - 1;
  }

  /** Validate and store a proposal; returns the new id. */
  create(input: CreateProposalInput): number {
    if (input.proposerWeight <= input.proposalThreshold) {
      throw new GovernanceError(
        'BelowThreshold',
        `proposer votes ${input.proposerWeight} must exceed threshold ${input.proposalThreshold}`,
      );
    }
    const actions = toActions(input.calls);
    const prev = input.previousProposalState;
    if (prev === 'Pending' || prev === 'Active') {
      throw new GovernanceError('InvalidTransition', `proposer already has a ${prev} proposal`);
    }

    const id = this.nextId;
    const startBlock = input.currentBlock + input.votingDelay;
    const proposal: Proposal = {
      id,
      proposer: input.proposer,
      actions,
      description: input.description,
      creationBlock: input.currentBlock,
      startBlock,
      endBlock: startBlock + input.votingPeriod,
      totalSupply: input.totalSupply,
      proposalThreshold: input.proposalThreshold,
      quorumParams: { ...input.quorumParams },
      eta: 0n,
      canceled: false,
      vetoed: false,
      executed: false,
    };

    this.proposals.set(id, proposal);
    this.latestByProposer.set(input.proposer.toLowerCase(), id);
    this.nextId += 1;
    return id;
  }

  get(id: number): Proposal {
    const p = this.proposals.get(id);
    if (!p) throw new GovernanceError('UnknownProposal', `no proposal with id ${id}`, id);
    return p;
  }

  /** Copy of the stored proposal, safe to hand to callers. */
  snapshot(id: number): Proposal {
    const p = this.get(id);
    return {
      ...p,
      actions: p.actions.map((a) => ({ ...a })),
      quorumParams: { ...p.quorumParams },
    };
  }

  getActions(id: number): ProposalAction[] {
    return this.get(id).actions.map((a) => ({ ...a }));
  }

  latestProposalId(proposer: Address): number | undefined {
    return this.latestByProposer.get(proposer.toLowerCase());
  }

  /** Votes For needed to pass, given the against-votes cast so far. */
  quorumVotes(id: number): bigint {
    const p = this.get(id);
    return requiredQuorum(p.totalSupply, this.votes.tally(id).againstVotes, p.quorumParams);
  }

  state(id: number, ctx: StateContext): ProposalState {
    const p = this.get(id);
    if (p.canceled) return 'Canceled';
    if (p.vetoed) return 'Vetoed';
    if (ctx.blockNumber <= p.startBlock) return 'Pending';
    if (ctx.blockNumber <= p.endBlock) return 'Active';

    const { forVotes, againstVotes } = this.votes.tally(id);
    if (forVotes <= againstVotes || forVotes < this.quorumVotes(id)) return 'Defeated';
    if (p.eta === 0n) return 'Succeeded';
    if (p.executed) return 'Executed';
    if (ctx.timestamp >= p.eta + ctx.gracePeriod) return 'Expired';
    return 'Queued';
  }

  /**
   * Anyone may cancel once the proposer's weight has dropped to or below the
   * threshold they qualified with; otherwise only the proposer may.
   */
  assertCancelable(
    id: number,
    caller: Address,
    proposerWeight: bigint,
    currentState: ProposalState,
  ): void {
    const p = this.get(id);
    if (isTerminal(currentState)) {
      throw new GovernanceError('AlreadyFinal', `cannot cancel a ${currentState} proposal`, id);
    }
    const isProposer = caller.toLowerCase() === p.proposer.toLowerCase();
    if (!isProposer && proposerWeight > p.proposalThreshold) {
      throw new GovernanceError('ProposerAboveThreshold', 'proposer still holds more than the threshold', id);
    }
  }

  cancel(
    id: number,
    caller: Address,
    proposerWeight: bigint,
    currentState: ProposalState,
  ): void {
    this.assertCancelable(id, caller, proposerWeight, currentState);
    this.get(id).canceled = true;
  }

  assertVetoable(id: number, currentState: ProposalState): void {
    this.get(id);
    if (currentState === 'Executed') {
      throw new GovernanceError('CannotVetoExecuted', 'proposal already executed', id);
    }
    if (isTerminal(currentState)) {
      throw new GovernanceError('AlreadyFinal', `cannot veto a ${currentState} proposal`, id);
    }
  }

  markVetoed(id: number, currentState: ProposalState): void {
    this.assertVetoable(id, currentState);
    this.get(id).vetoed = true;
  }

  assertQueueable(id: number, currentState: ProposalState): void {
    this.get(id);
    if (currentState !== 'Succeeded') {
      throw new GovernanceError('InvalidTransition', `only a Succeeded proposal can be queued (is ${currentState})`, id);
    }
  }

  markQueued(id: number, eta: bigint, currentState: ProposalState): void {
    this.assertQueueable(id, currentState);
    this.get(id).eta = eta;
  }

  assertExecutable(id: number, currentState: ProposalState, timestamp: bigint): void {
    const p = this.get(id);
    if (currentState !== 'Queued') {
      throw new GovernanceError('InvalidTransition', `only a Queued proposal can be executed (is ${currentState})`, id);
    }
    if (timestamp < p.eta) {
      throw new GovernanceError('InvalidTransition', `timelock eta ${p.eta} not reached`, id);
    }
  }

  markExecuted(id: number, currentState: ProposalState, timestamp: bigint): void {
    this.assertExecutable(id, currentState, timestamp);
    this.get(id).executed = true;
  }
}
