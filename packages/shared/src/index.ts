// ─── @veto-governor/shared barrel export ─────────────────

// Types
export type {
  Address,
  Hex,
  VoteSupport,
  ProposalState,
  ProposalAction,
  ProposalCalls,
  DynamicQuorumParams,
  Proposal,
  ProposalView,
  VoteReceipt,
  VoteTotals,
  AuthorityState,
  GovernanceParams,
} from './types/governance.js';

export type {
  GovernanceEvent,
  GovernanceEventType,
  LogEventType,
  LogLevel,
  LogEvent,
} from './types/events.js';

// Schemas
export {
  VoteSupportSchema,
  DynamicQuorumParamsSchema,
  CallerRequestSchema,
  ProposeRequestSchema,
  CastVoteRequestSchema,
  PendingRoleRequestSchema,
  UpdateParametersRequestSchema,
  GovernanceConfigSchema,
} from './schemas/governance.js';
export type { GovernanceConfig } from './schemas/governance.js';

// ─── Validators ──────────────────────────────────────────
export {
  isAddressString,
  zAddress,
  zHexData,
  zUint,
  zBps,
} from './schemas/validators.js';

// Constants
export * from './constants/index.js';
