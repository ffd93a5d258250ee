// ─── Constants ───────────────────────────────────────────

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

/** 100% in basis points */
export const BPS_DENOMINATOR = 10_000n;

/** quorumCoefficient is fixed point with six decimals */
export const QUORUM_COEFFICIENT_SCALE = 1_000_000n;

/** Upper bound on actions per proposal */
export const MAX_PROPOSAL_ACTIONS = 10;

// Parameter bounds (blocks assume ~15s block time)
export const MIN_VOTING_PERIOD = 5_760n; // ~1 day
export const MAX_VOTING_PERIOD = 80_640n; // ~2 weeks
export const MIN_VOTING_DELAY = 1n;
export const MAX_VOTING_DELAY = 40_320n; // ~1 week
export const MIN_PROPOSAL_THRESHOLD_BPS = 1; // 0.01%
export const MAX_PROPOSAL_THRESHOLD_BPS = 1_000; // 10%
export const MIN_QUORUM_VOTES_BPS_LOWER_BOUND = 200; // 2%
export const MIN_QUORUM_VOTES_BPS_UPPER_BOUND = 2_000; // 20%
export const MAX_QUORUM_VOTES_BPS_UPPER_BOUND = 6_000; // 60%

/** Timelock grace period used when the executor does not report one (14 days) */
export const DEFAULT_GRACE_PERIOD_SECONDS = 1_209_600n;
