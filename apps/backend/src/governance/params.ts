import {
  MAX_PROPOSAL_THRESHOLD_BPS,
  MAX_QUORUM_VOTES_BPS_UPPER_BOUND,
  MAX_VOTING_DELAY,
  MAX_VOTING_PERIOD,
  MIN_PROPOSAL_THRESHOLD_BPS,
  MIN_QUORUM_VOTES_BPS_LOWER_BOUND,
  MIN_QUORUM_VOTES_BPS_UPPER_BOUND,
  MIN_VOTING_DELAY,
  MIN_VOTING_PERIOD,
  type DynamicQuorumParams,
  type GovernanceParams,
} from '@veto-governor/shared';

export function votingDelayViolations(votingDelay: bigint): string[] {
  if (votingDelay < MIN_VOTING_DELAY || votingDelay > MAX_VOTING_DELAY) {
    return [`votingDelay ${votingDelay} outside [${MIN_VOTING_DELAY}, ${MAX_VOTING_DELAY}] blocks`];
  }
  return [];
}

export function votingPeriodViolations(votingPeriod: bigint): string[] {
  if (votingPeriod < MIN_VOTING_PERIOD || votingPeriod > MAX_VOTING_PERIOD) {
    return [`votingPeriod ${votingPeriod} outside [${MIN_VOTING_PERIOD}, ${MAX_VOTING_PERIOD}] blocks`];
  }
  return [];
}

export function proposalThresholdViolations(bps: number): string[] {
  if (!Number.isInteger(bps) || bps < MIN_PROPOSAL_THRESHOLD_BPS || bps > MAX_PROPOSAL_THRESHOLD_BPS) {
    return [`proposalThresholdBPS ${bps} outside [${MIN_PROPOSAL_THRESHOLD_BPS}, ${MAX_PROPOSAL_THRESHOLD_BPS}]`];
  }
  return [];
}

export function quorumParamsViolations(p: DynamicQuorumParams): string[] {
  const violations: string[] = [];
  if (
    !Number.isInteger(p.minQuorumVotesBPS) ||
    p.minQuorumVotesBPS < MIN_QUORUM_VOTES_BPS_LOWER_BOUND ||
    p.minQuorumVotesBPS > MIN_QUORUM_VOTES_BPS_UPPER_BOUND
  ) {
    violations.push(
      `minQuorumVotesBPS ${p.minQuorumVotesBPS} outside [${MIN_QUORUM_VOTES_BPS_LOWER_BOUND}, ${MIN_QUORUM_VOTES_BPS_UPPER_BOUND}]`,
    );
  }
  if (!Number.isInteger(p.maxQuorumVotesBPS) || p.maxQuorumVotesBPS > MAX_QUORUM_VOTES_BPS_UPPER_BOUND) {
    violations.push(`maxQuorumVotesBPS ${p.maxQuorumVotesBPS} above ${MAX_QUORUM_VOTES_BPS_UPPER_BOUND}`);
  }
  if (p.minQuorumVotesBPS > p.maxQuorumVotesBPS) {
    violations.push('minQuorumVotesBPS must not exceed maxQuorumVotesBPS');
  }
  if (!Number.isInteger(p.quorumCoefficient) || p.quorumCoefficient < 0) {
    violations.push(`quorumCoefficient ${p.quorumCoefficient} must be a non-negative integer`);
  }
  return violations;
}

/** Every bound the parameters break; empty when they are usable. */
export function governanceParamsViolations(params: GovernanceParams): string[] {
  return [
    ...votingDelayViolations(params.votingDelay),
    ...votingPeriodViolations(params.votingPeriod),
    ...proposalThresholdViolations(params.proposalThresholdBPS),
    ...quorumParamsViolations(params.quorumParams),
  ];
}
