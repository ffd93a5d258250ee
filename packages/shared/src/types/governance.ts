// ─── Governance Types ────────────────────────────────────

/** 0x-prefixed 20-byte account. */
export type Address = `0x${string}`;

/** 0x-prefixed hex payload (calldata, hashes). */
export type Hex = `0x${string}`;

/** Vote support: 0 Against, 1 For, 2 Abstain */
export type VoteSupport = 0 | 1 | 2;

/**
 * Lifecycle state of a proposal. Always derived, never stored.
 * Canceled, Defeated, Expired, Vetoed and Executed are terminal.
 */
export type ProposalState =
  | 'Pending'
  | 'Active'
  | 'Canceled'
  | 'Defeated'
  | 'Succeeded'
  | 'Queued'
  | 'Expired'
  | 'Executed'
  | 'Vetoed';

/** One call the timelock makes when the proposal executes. */
export interface ProposalAction {
  target: Address;
  value: bigint; // wei
  signature: string; // e.g. "transfer(address,uint256)", may be empty
  calldata: Hex;
}

/**
 * The call list as submitted: four parallel sequences of equal length.
 */
export interface ProposalCalls {
  targets: Address[];
  values: bigint[];
  signatures: string[];
  calldatas: Hex[];
}

/**
 * Dynamic quorum configuration. All values are basis points except
 * quorumCoefficient, which is fixed point scaled by 1e6.
 */
export interface DynamicQuorumParams {
  minQuorumVotesBPS: number;
  maxQuorumVotesBPS: number;
  quorumCoefficient: number;
}

/**
 * Stored proposal. Everything except the four lifecycle flags and eta is
 * fixed at creation.
 */
export interface Proposal {
  id: number;
  proposer: Address;
  actions: ProposalAction[];
  description: string;
  creationBlock: bigint;
  startBlock: bigint;
  endBlock: bigint;
  /** Voting supply at creation; quorum is computed against it. */
  totalSupply: bigint;
  proposalThreshold: bigint;
  quorumParams: DynamicQuorumParams;
  /** Unix seconds; 0n until queued. */
  eta: bigint;
  canceled: boolean;
  vetoed: boolean;
  executed: boolean;
}

/** Proposal plus its live tallies, as returned by read views. */
export interface ProposalView extends Proposal {
  forVotes: bigint;
  againstVotes: bigint;
  abstainVotes: bigint;
  quorumVotes: bigint;
  state: ProposalState;
}

export interface VoteReceipt {
  hasVoted: boolean;
  support: VoteSupport;
  votes: bigint;
}

export interface VoteTotals {
  forVotes: bigint;
  againstVotes: bigint;
  abstainVotes: bigint;
}

/** Live and pending holders of the two privileged roles. `null` means absent. */
export interface AuthorityState {
  admin: Address | null;
  pendingAdmin: Address | null;
  vetoer: Address | null;
  pendingVetoer: Address | null;
}

/** Tunable engine parameters (admin-settable after construction). */
export interface GovernanceParams {
  votingDelay: bigint; // blocks
  votingPeriod: bigint; // blocks
  proposalThresholdBPS: number;
  quorumParams: DynamicQuorumParams;
}
