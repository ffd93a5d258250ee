import { encodeAbiParameters, keccak256, parseAbiParameters, type Hex } from 'viem';
import type { TimelockTransaction } from './ports.js';

const TX_PARAMS = parseAbiParameters('address target, uint256 value, string signature, bytes data, uint256 eta');

/** keccak256(abi.encode(target, value, signature, data, eta)), the timelock's queue key. */
export function timelockTxHash(tx: TimelockTransaction): Hex {
  return keccak256(encodeAbiParameters(TX_PARAMS, [tx.target, tx.value, tx.signature, tx.data, tx.eta]));
}
