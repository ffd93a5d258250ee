/**
 * Governance configuration.
 * Loads from deployments/governance.json (or GOVERNANCE_CONFIG_PATH) with env overrides,
 * validates the shape with the shared zod schema and the parameter bounds
 * the engine enforces.
 *
 * Strict mode (GOVERNANCE_STRICT=true):
 *   Also rejects zero addresses for the timelock, voting token, custodian
 *   and admin. Intended for production / CI.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  GovernanceConfigSchema,
  ZERO_ADDRESS,
  type GovernanceConfig,
} from '@veto-governor/shared';
import { governanceParamsViolations } from '../governance/params.js';

export function isStrictMode(): boolean {
  return process.env.GOVERNANCE_STRICT === 'true';
}

/**
 * Thrown when the configuration cannot be used. Carries every violation
 * found, not just the first.
 */
export class GovernanceConfigError extends Error {
  public readonly violations: string[];
  constructor(violations: string[]) {
    const header = `Governance config is invalid (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(`${header}\n${body}`);
    this.name = 'GovernanceConfigError';
    this.violations = violations;
  }
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envNumber(name: string): number | undefined {
  const value = envString(name);
  return value === undefined ? undefined : Number(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(): Record<string, unknown> {
  const candidates = process.env.GOVERNANCE_CONFIG_PATH
    ? [process.env.GOVERNANCE_CONFIG_PATH]
    : [
        resolve(process.cwd(), 'deployments', 'governance.json'),
        resolve(process.cwd(), '..', '..', 'deployments', 'governance.json'),
      ];
  const path = candidates.find((p) => existsSync(p));
  if (!path) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new GovernanceConfigError([`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (!isRecord(parsed)) {
    throw new GovernanceConfigError([`${path} must contain a JSON object`]);
  }
  return parsed;
}

/** File values with environment overrides applied; not yet validated. */
export function rawGovernanceConfig(file: Record<string, unknown> = readConfigFile()): Record<string, unknown> {
  const fileQuorum = isRecord(file.quorumParams) ? file.quorumParams : {};
  const vetoerEnv = envString('GOVERNANCE_VETOER');
  return {
    ...file,
    chainId: envNumber('GOVERNANCE_CHAIN_ID') ?? file.chainId,
    rpcUrl: envString('GOVERNANCE_RPC_URL') ?? file.rpcUrl,
    timelock: envString('TIMELOCK_ADDRESS') ?? file.timelock,
    votingToken: envString('VOTING_TOKEN_ADDRESS') ?? file.votingToken,
    custodian: envString('GOVERNANCE_CUSTODIAN') ?? file.custodian,
    admin: envString('GOVERNANCE_ADMIN') ?? file.admin,
    vetoer: vetoerEnv === undefined ? file.vetoer ?? null : vetoerEnv === 'none' ? null : vetoerEnv,
    votingPeriod: envString('VOTING_PERIOD') ?? file.votingPeriod,
    votingDelay: envString('VOTING_DELAY') ?? file.votingDelay,
    proposalThresholdBPS: envNumber('PROPOSAL_THRESHOLD_BPS') ?? file.proposalThresholdBPS,
    quorumParams: {
      ...fileQuorum,
      minQuorumVotesBPS: envNumber('MIN_QUORUM_VOTES_BPS') ?? fileQuorum.minQuorumVotesBPS,
      maxQuorumVotesBPS: envNumber('MAX_QUORUM_VOTES_BPS') ?? fileQuorum.maxQuorumVotesBPS,
      quorumCoefficient: envNumber('QUORUM_COEFFICIENT') ?? fileQuorum.quorumCoefficient,
    },
  };
}

/**
 * Validate a raw config. Collects schema errors, parameter bound
 * violations and (in strict mode) zero addresses, and throws them together.
 */
export function parseGovernanceConfig(raw: Record<string, unknown>): GovernanceConfig {
  const parsed = GovernanceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GovernanceConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  const cfg = parsed.data;
  const violations = governanceParamsViolations({
    votingDelay: cfg.votingDelay,
    votingPeriod: cfg.votingPeriod,
    proposalThresholdBPS: cfg.proposalThresholdBPS,
    quorumParams: cfg.quorumParams,
  });

  if (isStrictMode()) {
    const addresses = {
      timelock: cfg.timelock,
      votingToken: cfg.votingToken,
      custodian: cfg.custodian,
      admin: cfg.admin,
    };
    for (const [name, value] of Object.entries(addresses)) {
      if (value.toLowerCase() === ZERO_ADDRESS) {
        violations.push(`${name} is the zero address`);
      }
    }
    if (cfg.rpcUrl.trim() === '') {
      violations.push('rpcUrl is empty. Set GOVERNANCE_RPC_URL.');
    }
  }

  if (violations.length > 0) {
    throw new GovernanceConfigError(violations);
  }
  return cfg;
}

let _config: GovernanceConfig | null = null;

/** Get the governance config (cached after first load). */
export function getGovernanceConfig(): GovernanceConfig {
  if (!_config) {
    _config = parseGovernanceConfig(rawGovernanceConfig());
  }
  return _config;
}

/** Force-reload the config. Useful in tests or after config changes. */
export function reloadGovernanceConfig(): GovernanceConfig {
  _config = null;
  return getGovernanceConfig();
}
