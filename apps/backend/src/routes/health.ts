import { Router } from 'express';
import { ZERO_ADDRESS } from '@veto-governor/shared';
import { getGovernanceConfig, isStrictMode } from '../config/governance.js';

/** Mask an address to first 6 + last 4 chars for public display. */
function maskAddress(addr: string): string {
  if (!addr || addr.toLowerCase() === ZERO_ADDRESS) return '(not configured)';
  if (addr.length < 12) return addr;
  return `${addr.slice(0, 6)}…${addr.slice(-4)}`;
}

export function createHealthRouter(): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    let config;
    try {
      const cfg = getGovernanceConfig();
      config = {
        chainId: cfg.chainId,
        strictMode: isStrictMode(),
        timelock: maskAddress(cfg.timelock),
        votingToken: maskAddress(cfg.votingToken),
        rpcUrl: cfg.rpcUrl.length > 0,
        signer: Boolean(process.env.GOVERNANCE_SIGNER_PRIVATE_KEY),
      };
    } catch (err) {
      config = {
        error: err instanceof Error ? err.message : 'Failed to load governance config',
      };
    }

    res.json({
      status: 'error' in config ? 'degraded' : 'ok',
      uptime: process.uptime(),
      service: 'veto-governor-backend',
      timestamp: new Date().toISOString(),
      config,
    });
  });

  return router;
}
