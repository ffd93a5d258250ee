/**
 * Minimal Timelock ABI: delay, grace period, queue, cancel and execute.
 */
const TX_INPUTS = [
  { name: 'target', type: 'address' },
  { name: 'value', type: 'uint256' },
  { name: 'signature', type: 'string' },
  { name: 'data', type: 'bytes' },
  { name: 'eta', type: 'uint256' },
] as const;

export const TimelockAbi = [
  {
    inputs: [],
    name: 'delay',
    outputs: [{ name: '', type: 'uint256' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [],
    name: 'GRACE_PERIOD',
    outputs: [{ name: '', type: 'uint256' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [{ name: 'txHash', type: 'bytes32' }],
    name: 'queuedTransactions',
    outputs: [{ name: '', type: 'bool' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: TX_INPUTS,
    name: 'queueTransaction',
    outputs: [{ name: '', type: 'bytes32' }],
    stateMutability: 'nonpayable',
    type: 'function',
  },
  {
    inputs: TX_INPUTS,
    name: 'cancelTransaction',
    outputs: [],
    stateMutability: 'nonpayable',
    type: 'function',
  },
  {
    inputs: TX_INPUTS,
    name: 'executeTransaction',
    outputs: [{ name: '', type: 'bytes' }],
    stateMutability: 'payable',
    type: 'function',
  },
] as const;
