import {
  BPS_DENOMINATOR,
  QUORUM_COEFFICIENT_SCALE,
  type DynamicQuorumParams,
} from '@veto-governor/shared';

/** `bps` basis points of `n`, truncating. */
export function bps2Uint(bps: number, n: bigint): bigint {
  return (n * BigInt(bps)) / BPS_DENOMINATOR;
}

/**
 * Dynamic quorum: the share of supply that must vote For rises with the
 * share that voted Against.
 *
 *   againstBPS  = against * 10000 / supply
 *   quorumBPS   = min(max, minBPS + againstBPS * coefficient / 1e6)
 *   quorumVotes = quorumBPS * supply / 10000
 *
 * Integer arithmetic throughout, truncating at every division. A
 * coefficient of 0 gives a flat quorum of minQuorumVotesBPS.
 */
export function requiredQuorum(
  totalVotingSupply: bigint,
  againstVotes: bigint,
  params: DynamicQuorumParams,
): bigint {
  if (totalVotingSupply <= 0n) return 0n;

  const againstVotesBPS = (againstVotes * BPS_DENOMINATOR) / totalVotingSupply;
  const adjustmentBPS = (againstVotesBPS * BigInt(params.quorumCoefficient)) / QUORUM_COEFFICIENT_SCALE;

  const minBPS = BigInt(params.minQuorumVotesBPS);
  const maxBPS = BigInt(params.maxQuorumVotesBPS);
  let quorumBPS = minBPS + adjustmentBPS;
  if (quorumBPS > maxBPS) quorumBPS = maxBPS;
  if (quorumBPS < minBPS) quorumBPS = minBPS;

  return (quorumBPS * totalVotingSupply) / BPS_DENOMINATOR;
}
