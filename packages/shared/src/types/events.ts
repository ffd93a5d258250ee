import type {
  Address,
  DynamicQuorumParams,
  ProposalAction,
  VoteSupport,
} from './governance.js';

// ─── Governance Events ───────────────────────────────────

/**
 * Observable side effects of engine operations, emitted after the
 * operation has committed. Field names follow the on-chain event layout.
 */
export type GovernanceEvent =
  | {
      type: 'ProposalCreated';
      id: number;
      proposer: Address;
      actions: ProposalAction[];
      startBlock: bigint;
      endBlock: bigint;
      proposalThreshold: bigint;
      quorumVotes: bigint;
      description: string;
    }
  | {
      type: 'VoteCast';
      voter: Address;
      proposalId: number;
      support: VoteSupport;
      votes: bigint;
      reason: string;
    }
  | { type: 'ProposalCanceled'; id: number }
  | { type: 'ProposalVetoed'; id: number }
  | { type: 'ProposalQueued'; id: number; eta: bigint }
  | { type: 'ProposalExecuted'; id: number }
  | { type: 'NewPendingAdmin'; oldPendingAdmin: Address | null; newPendingAdmin: Address | null }
  | { type: 'NewAdmin'; oldAdmin: Address | null; newAdmin: Address | null }
  | { type: 'NewPendingVetoer'; oldPendingVetoer: Address | null; newPendingVetoer: Address | null }
  | { type: 'NewVetoer'; oldVetoer: Address | null; newVetoer: Address | null }
  | { type: 'Withdraw'; amount: bigint; sent: boolean }
  | { type: 'VotingDelaySet'; oldVotingDelay: bigint; newVotingDelay: bigint }
  | { type: 'VotingPeriodSet'; oldVotingPeriod: bigint; newVotingPeriod: bigint }
  | { type: 'ProposalThresholdBPSSet'; oldProposalThresholdBPS: number; newProposalThresholdBPS: number }
  | {
      type: 'DynamicQuorumParamsSet';
      oldParams: DynamicQuorumParams;
      newParams: DynamicQuorumParams;
    };

export type GovernanceEventType = GovernanceEvent['type'];

// ─── Log Events ──────────────────────────────────────────

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Structured log event persisted for every governance event and for
 * failures the HTTP layer reports.
 */
export type LogEventType = GovernanceEventType | 'ERROR';

export interface LogEvent {
  id: string;
  timestamp: number; // ms
  type: LogEventType;
  payload: unknown;
  level: LogLevel;
}
