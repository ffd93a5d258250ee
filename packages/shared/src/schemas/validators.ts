import { z } from 'zod';

// ─── Hex / Address Validators ────────────────────────────
// Reusable Zod refinements for EVM-compatible data.

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const HEX_DATA_RE = /^0x([0-9a-fA-F]{2})*$/;

export function isAddressString(value: string): value is `0x${string}` {
  return ADDRESS_RE.test(value);
}

function isHexDataString(value: string): value is `0x${string}` {
  return HEX_DATA_RE.test(value);
}

/** Ethereum address: 0x + 40 hex chars */
export const zAddress = z
  .string()
  .refine(isAddressString, 'Invalid Ethereum address (expected 0x + 40 hex chars)');

/** Arbitrary hex data: 0x + even-length hex (calldata, etc.) */
export const zHexData = z
  .string()
  .refine(isHexDataString, 'Invalid hex data (expected 0x + even hex length)');

/** Unsigned integer given as a decimal string or a safe JSON number. */
export const zUint = z
  .union([
    z.string().regex(/^\d+$/, 'Invalid unsigned integer (expected decimal digits)'),
    z.number().int().nonnegative(),
  ])
  .transform((v) => BigInt(v));

/** Basis points, 0–10000 */
export const zBps = z.number().int().min(0).max(10_000);
