/**
 * viem clients for the chain the governance contracts live on.
 * The signer key comes from GOVERNANCE_SIGNER_PRIVATE_KEY; without it the
 * engine can read but not queue, execute or withdraw.
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  type Account,
  type Chain,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';

export type GovernanceWalletClient = WalletClient<Transport, Chain, Account>;
export type GovernancePublicClient = PublicClient<Transport, Chain>;

export function governanceChain(chainId: number, rpcUrl: string): Chain {
  return {
    id: chainId,
    name: `governance-${chainId}`,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: {
      default: { http: [rpcUrl] },
    },
  };
}

function isHex(value: string): value is Hex {
  return /^0x[0-9a-fA-F]*$/.test(value);
}

export function getSigner(): Account | null {
  const pk = process.env.GOVERNANCE_SIGNER_PRIVATE_KEY;
  if (!pk) return null;
  const hex = pk.startsWith('0x') ? pk : `0x${pk}`;
  if (!isHex(hex)) {
    console.error('[chain/clients] GOVERNANCE_SIGNER_PRIVATE_KEY is not hex; running read-only');
    return null;
  }
  return privateKeyToAccount(hex);
}

export function createGovernancePublicClient(chain: Chain): GovernancePublicClient {
  return createPublicClient({ chain, transport: http() });
}

export function createGovernanceWalletClient(chain: Chain, account: Account): GovernanceWalletClient {
  return createWalletClient({ account, chain, transport: http() });
}
