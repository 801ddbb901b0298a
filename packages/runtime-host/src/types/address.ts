/**
 * Tollgate Runtime Host — Address, Selector and Hex Types
 *
 * Branded hex strings used as identifiers throughout the host and kernel.
 * Values are always lowercase and `0x`-prefixed; construction goes through
 * the `to*` validators so a plain string never stands in for one of these.
 */

import { createHash } from 'node:crypto';

// ---------------------------------------------------------------------------
// Branded Types
// ---------------------------------------------------------------------------

declare const __addressBrand: unique symbol;
declare const __selectorBrand: unique symbol;
declare const __bytes32Brand: unique symbol;

/** A 20-byte account or contract address: `0x` + 40 lowercase hex chars. */
export type Address = string & { readonly [__addressBrand]: 'Address' };

/** A 4-byte function selector: `0x` + 8 lowercase hex chars. */
export type Selector = string & { readonly [__selectorBrand]: 'Selector' };

/** A 32-byte word: `0x` + 64 lowercase hex chars. */
export type Bytes32 = string & { readonly [__bytes32Brand]: 'Bytes32' };

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;
const SELECTOR_PATTERN = /^0x[0-9a-f]{8}$/;
const BYTES32_PATTERN = /^0x[0-9a-f]{64}$/;
const HEX_PATTERN = /^(0x)?([0-9a-fA-F]{2})*$/;

export function isAddress(value: string): value is Address {
  return ADDRESS_PATTERN.test(value);
}

export function isSelector(value: string): value is Selector {
  return SELECTOR_PATTERN.test(value);
}

export function isBytes32(value: string): value is Bytes32 {
  return BYTES32_PATTERN.test(value);
}

/**
 * Validate and normalize an address string.
 *
 * @throws {TypeError} If the value is not 20 bytes of hex
 */
export function toAddress(raw: string): Address {
  const lower = raw.toLowerCase();
  if (!isAddress(lower)) {
    throw new TypeError(`Invalid address: ${raw}`);
  }
  return lower;
}

export function toSelector(raw: string): Selector {
  const lower = raw.toLowerCase();
  if (!isSelector(lower)) {
    throw new TypeError(`Invalid selector: ${raw}`);
  }
  return lower;
}

export function toBytes32(raw: string): Bytes32 {
  const lower = raw.toLowerCase();
  if (!isBytes32(lower)) {
    throw new TypeError(`Invalid bytes32: ${raw}`);
  }
  return lower;
}

export const ZERO_ADDRESS: Address = toAddress('0x' + '0'.repeat(40));

// ---------------------------------------------------------------------------
// Hex helpers
// ---------------------------------------------------------------------------

export function bytesToHex(bytes: Uint8Array): string {
  return '0x' + Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

/**
 * Decode a hex string (with or without `0x`) into bytes.
 *
 * @throws {TypeError} On odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!HEX_PATTERN.test(hex)) {
    throw new TypeError(`Invalid hex string: ${hex}`);
  }
  const body = hex.startsWith('0x') ? hex.slice(2) : hex;
  return new Uint8Array(Buffer.from(body, 'hex'));
}

// ---------------------------------------------------------------------------
// Derivation
// ---------------------------------------------------------------------------

/**
 * Derive a contract address from its deployer and the deployer's nonce.
 * Deterministic: the same (deployer, nonce) always yields the same address.
 */
export function deriveAddress(deployer: Address, nonce: number): Address {
  const digest = createHash('sha256').update(`${deployer}:${nonce}`).digest('hex');
  return toAddress('0x' + digest.slice(-40));
}

/** Derive an externally-owned account address from a human label. */
export function accountAddress(label: string): Address {
  const digest = createHash('sha3-256').update(`account:${label}`).digest('hex');
  return toAddress('0x' + digest.slice(-40));
}
