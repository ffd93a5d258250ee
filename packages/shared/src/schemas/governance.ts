import { z } from 'zod';
import { zAddress, zBps, zHexData, zUint } from './validators.js';

// ─── Governance Zod Schemas ─────────────────────────────

export const VoteSupportSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const DynamicQuorumParamsSchema = z
  .object({
    minQuorumVotesBPS: zBps,
    maxQuorumVotesBPS: zBps,
    quorumCoefficient: z.number().int().nonnegative(),
  })
  .refine((p) => p.minQuorumVotesBPS <= p.maxQuorumVotesBPS, {
    message: 'minQuorumVotesBPS must not exceed maxQuorumVotesBPS',
    path: ['minQuorumVotesBPS'],
  });

// ─── HTTP request bodies ────────────────────────────────

/** Every mutating request names the account it acts for. */
export const CallerRequestSchema = z.object({
  caller: zAddress,
});

export const ProposeRequestSchema = z.object({
  caller: zAddress,
  targets: z.array(zAddress),
  values: z.array(zUint),
  signatures: z.array(z.string()),
  calldatas: z.array(zHexData),
  description: z.string(),
});

export const CastVoteRequestSchema = z.object({
  caller: zAddress,
  support: VoteSupportSchema,
  reason: z.string().optional(),
});

export const PendingRoleRequestSchema = z.object({
  caller: zAddress,
  newPending: zAddress.nullable(),
});

export const UpdateParametersRequestSchema = z.object({
  caller: zAddress,
  votingDelay: zUint.optional(),
  votingPeriod: zUint.optional(),
  proposalThresholdBPS: zBps.optional(),
  quorumParams: DynamicQuorumParamsSchema.optional(),
});

// ─── Configuration ──────────────────────────────────────

export const GovernanceConfigSchema = z.object({
  chainId: z.number().int().positive(),
  rpcUrl: z.string(),
  timelock: zAddress,
  votingToken: zAddress,
  /** Account that custodies the treasury balance swept by withdraw. */
  custodian: zAddress,
  admin: zAddress,
  vetoer: zAddress.nullable(),
  votingPeriod: zUint,
  votingDelay: zUint,
  proposalThresholdBPS: zBps,
  quorumParams: DynamicQuorumParamsSchema,
});

export type GovernanceConfig = z.infer<typeof GovernanceConfigSchema>;
