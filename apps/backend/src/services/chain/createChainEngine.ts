import type { GovernanceConfig } from '@veto-governor/shared';
import { GovernanceEngine } from '../../governance/engine.js';
import type { EventSink } from '../../governance/ports.js';
import { logGovernanceEvent } from '../../storage/logStore.js';
import { ChainClock, ChainLedger, ChainTimelock, ChainVotingToken } from './chainAdapters.js';
import {
  createGovernancePublicClient,
  createGovernanceWalletClient,
  getSigner,
  governanceChain,
} from './clients.js';

/** Engine wired to the configured chain. Read-only when no signer key is set. */
export function createChainEngine(cfg: GovernanceConfig, onEvent: EventSink = logGovernanceEvent): GovernanceEngine {
  const chain = governanceChain(cfg.chainId, cfg.rpcUrl);
  const publicClient = createGovernancePublicClient(chain);
  const signer = getSigner();
  const walletClient = signer ? createGovernanceWalletClient(chain, signer) : null;
  if (!signer) {
    console.warn('[chain] GOVERNANCE_SIGNER_PRIVATE_KEY not set; queue, execute and withdraw will fail');
  }

  return new GovernanceEngine({
    clock: new ChainClock(publicClient),
    votingToken: new ChainVotingToken(publicClient, cfg.votingToken),
    executor: new ChainTimelock(publicClient, walletClient, cfg.timelock),
    ledger: new ChainLedger(publicClient, walletClient),
    custodian: cfg.custodian,
    admin: cfg.admin,
    vetoer: cfg.vetoer,
    params: {
      votingDelay: cfg.votingDelay,
      votingPeriod: cfg.votingPeriod,
      proposalThresholdBPS: cfg.proposalThresholdBPS,
      quorumParams: cfg.quorumParams,
    },
    onEvent,
  });
}
