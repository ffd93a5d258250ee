/**
 * Named failure kinds for governance operations. Every check runs before
 * any state is written, so a thrown GovernanceError means nothing changed.
 */

export type GovernanceErrorCode =
  | 'BelowThreshold'
  | 'ActionsMismatch'
  | 'UnknownProposal'
  | 'AlreadyFinal'
  | 'ProposerAboveThreshold'
  | 'VotingClosed'
  | 'AlreadyVoted'
  | 'InvalidSupport'
  | 'VetoerOnly'
  | 'PendingVetoerOnly'
  | 'AdminOnly'
  | 'PendingAdminOnly'
  | 'CannotVetoExecuted'
  | 'VetoPowerBurned'
  | 'InvalidTransition'
  | 'InvalidParameter'
  | 'ActionAlreadyQueued'
  | 'ExecutorRejected';

export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;
  public readonly proposalId?: number;

  constructor(code: GovernanceErrorCode, message?: string, proposalId?: number) {
    super(message ? `${code}: ${message}` : code);
    this.name = 'GovernanceError';
    this.code = code;
    this.proposalId = proposalId;
  }
}

export function isGovernanceError(err: unknown): err is GovernanceError {
  return err instanceof GovernanceError;
}
