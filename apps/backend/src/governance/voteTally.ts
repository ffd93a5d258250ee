/**
 * Per-proposal vote accumulators and receipts.
 * A voter records at most one receipt per proposal; the weight on the
 * receipt is fixed when the vote is cast.
 */

import type {
  Address,
  GovernanceEvent,
  ProposalState,
  VoteReceipt,
  VoteSupport,
  VoteTotals,
} from '@veto-governor/shared';
import { GovernanceError } from './errors.js';

type VoteCastEvent = Extract<GovernanceEvent, { type: 'VoteCast' }>;

const EMPTY_RECEIPT: VoteReceipt = { hasVoted: false, support: 0, votes: 0n };

function isVoteSupport(value: number): value is VoteSupport {
  return value === 0 || value === 1 || value === 2;
}

export class VoteTally {
  private readonly totals = new Map<number, VoteTotals>();
  private readonly receipts = new Map<number, Map<string, VoteReceipt>>();

  castVote(
    id: number,
    voter: Address,
    support: number,
    weight: bigint,
    currentState: ProposalState,
    reason = '',
  ): VoteCastEvent {
    if (currentState !== 'Active') {
      throw new GovernanceError('VotingClosed', `proposal is ${currentState}`, id);
    }
    if (!isVoteSupport(support)) {
      throw new GovernanceError('InvalidSupport', `support must be 0, 1 or 2 (got ${support})`, id);
    }
    const key = voter.toLowerCase();
    const byVoter = this.receipts.get(id) ?? new Map<string, VoteReceipt>();
    if (byVoter.get(key)?.hasVoted) {
      throw new GovernanceError('AlreadyVoted', `${voter} already voted`, id);
    }

    const current = this.tally(id);
    const next: VoteTotals = {
      forVotes: support === 1 ? current.forVotes + weight : current.forVotes,
      againstVotes: support === 0 ? current.againstVotes + weight : current.againstVotes,
      abstainVotes: support === 2 ? current.abstainVotes + weight : current.abstainVotes,
    };

    byVoter.set(key, { hasVoted: true, support, votes: weight });
    this.receipts.set(id, byVoter);
    this.totals.set(id, next);

    return { type: 'VoteCast', voter, proposalId: id, support, votes: weight, reason };
  }

  tally(id: number): VoteTotals {
    const t = this.totals.get(id);
    return t
      ? { ...t }
      : { forVotes: 0n, againstVotes: 0n, abstainVotes: 0n };
  }

  receipt(id: number, voter: Address): VoteReceipt {
    const r = this.receipts.get(id)?.get(voter.toLowerCase());
    return r ? { ...r } : { ...EMPTY_RECEIPT };
  }
}
