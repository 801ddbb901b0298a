/**
 * Tollgate Runtime Host — Call-Data Codec
 *
 * Wire format:
 *
 *   calldata := selector(4) ‖ arg*
 *   arg      := length(4, big-endian) ‖ content
 *
 * Array content is `count(4) ‖ arg*` with every element length-prefixed.
 * Because each argument carries its content last, a trailing `bytes`
 * argument occupies exactly the final `len(bytes)` bytes of the call data;
 * the router relies on this to recover a protected payload from the full
 * invocation data given only its length.
 *
 * Decoding is strict: wrong widths, out-of-range integers, truncated input
 * and trailing bytes all fail with MalformedCalldata.
 */

import { HostErrorCode, RevertError } from '../errors.js';
import { bytesToHex, hexToBytes, isAddress, isBytes32, isSelector } from '../types/address.js';
import type { Selector } from '../types/address.js';
import { parseSignature } from './signature.js';
import { elementType, isScalarType, isScalarValue } from './types.js';
import type { AbiScalar, AbiType, AbiValue, ScalarType } from './types.js';

const UINT256_MAX = (1n << 256n) - 1n;
const UINT64_MAX = (1n << 64n) - 1n;

const FIXED_WIDTHS: Partial<Record<ScalarType, number>> = {
  address: 20,
  uint256: 32,
  uint64: 8,
  uint8: 1,
  bool: 1,
  bytes4: 4,
  bytes32: 32,
};

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/** Encode a call to `signature` with `args`. */
export function encodeCall(signature: string, args: ReadonlyArray<AbiValue> = []): Uint8Array {
  const parsed = parseSignature(signature);
  return encodeWithSelector(parsed.selector, parsed.params, args);
}

/** Encode arguments behind an explicit selector (used for marker-routed calls). */
export function encodeWithSelector(
  selector: Selector,
  types: ReadonlyArray<AbiType>,
  args: ReadonlyArray<AbiValue>,
): Uint8Array {
  return concat([hexToBytes(selector), encodeArgs(types, args)]);
}

export function encodeArgs(types: ReadonlyArray<AbiType>, args: ReadonlyArray<AbiValue>): Uint8Array {
  if (types.length !== args.length) {
    throw invalid(`expected ${types.length} arguments, got ${args.length}`);
  }
  const parts: Uint8Array[] = [];
  types.forEach((type, i) => {
    const value = args[i];
    if (value === undefined) throw invalid(`missing argument ${i}`);
    parts.push(framed(encodeValue(type, value)));
  });
  return concat(parts);
}

function encodeValue(type: AbiType, value: AbiValue): Uint8Array {
  if (isScalarType(type)) {
    if (!isScalarValue(value)) throw invalid(`expected ${type}, got array`);
    return encodeScalar(type, value);
  }
  const inner = elementType(type);
  if (inner === null || isScalarValue(value)) throw invalid(`expected ${type}`);
  return concat([u32(value.length), ...value.map((item) => framed(encodeScalar(inner, item)))]);
}

function encodeScalar(type: ScalarType, value: AbiScalar): Uint8Array {
  switch (type) {
    case 'address':
      if (typeof value !== 'string' || !isAddress(value)) throw invalid(`expected address, got ${String(value)}`);
      return hexToBytes(value);
    case 'bytes4':
      if (typeof value !== 'string' || !isSelector(value)) throw invalid(`expected bytes4, got ${String(value)}`);
      return hexToBytes(value);
    case 'bytes32':
      if (typeof value !== 'string' || !isBytes32(value)) throw invalid(`expected bytes32, got ${String(value)}`);
      return hexToBytes(value);
    case 'string':
      if (typeof value !== 'string') throw invalid('expected string');
      return new TextEncoder().encode(value);
    case 'bytes':
      if (!(value instanceof Uint8Array)) throw invalid('expected bytes');
      return value;
    case 'bool':
      if (typeof value !== 'boolean') throw invalid('expected bool');
      return Uint8Array.of(value ? 1 : 0);
    case 'uint8':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 255) {
        throw invalid(`expected uint8, got ${String(value)}`);
      }
      return Uint8Array.of(value);
    case 'uint64':
      return uintBytes(value, 8, UINT64_MAX, type);
    case 'uint256':
      return uintBytes(value, 32, UINT256_MAX, type);
  }
}

function uintBytes(value: AbiScalar, width: number, max: bigint, type: ScalarType): Uint8Array {
  if (typeof value !== 'bigint' || value < 0n || value > max) {
    throw invalid(`expected ${type}, got ${String(value)}`);
  }
  const out = new Uint8Array(width);
  let v = value;
  for (let i = width - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export function decodeArgs(types: ReadonlyArray<AbiType>, data: Uint8Array): AbiValue[] {
  const reader = new Cursor(data);
  const values = types.map((type) => decodeValue(type, reader.frame()));
  if (!reader.done()) {
    throw malformed(`${data.length - reader.offset} trailing bytes`);
  }
  return values;
}

function decodeValue(type: AbiType, content: Uint8Array): AbiValue {
  if (isScalarType(type)) {
    return decodeScalar(type, content);
  }
  const inner = elementType(type);
  if (inner === null) throw malformed(`unsupported type ${type}`);
  const reader = new Cursor(content);
  const count = reader.u32();
  const items: AbiScalar[] = [];
  for (let i = 0; i < count; i++) {
    items.push(decodeScalar(inner, reader.frame()));
  }
  if (!reader.done()) throw malformed(`trailing bytes in ${type}`);
  return items;
}

function decodeScalar(type: ScalarType, content: Uint8Array): AbiScalar {
  const width = FIXED_WIDTHS[type];
  if (width !== undefined && content.length !== width) {
    throw malformed(`${type} must be ${width} bytes, got ${content.length}`);
  }
  switch (type) {
    case 'address':
    case 'bytes4':
    case 'bytes32':
      return bytesToHex(content);
    case 'string':
      return new TextDecoder('utf-8', { fatal: true }).decode(content);
    case 'bytes':
      return content.slice();
    case 'bool': {
      const flag = content[0];
      if (flag !== 0 && flag !== 1) throw malformed('bool must be 0 or 1');
      return flag === 1;
    }
    case 'uint8':
      return content[0] ?? 0;
    case 'uint64':
    case 'uint256': {
      let v = 0n;
      for (const byte of content) v = (v << 8n) | BigInt(byte);
      return v;
    }
  }
}

/** Split call data into its selector and argument bytes. */
export function splitCalldata(data: Uint8Array): { selector: Selector; body: Uint8Array } {
  if (data.length < 4) {
    throw malformed(`call data shorter than a selector (${data.length} bytes)`);
  }
  const selector = bytesToHex(data.subarray(0, 4));
  if (!isSelector(selector)) throw malformed('bad selector');
  return { selector, body: data.subarray(4) };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

class Cursor {
  offset = 0;

  constructor(private readonly data: Uint8Array) {}

  u32(): number {
    if (this.offset + 4 > this.data.length) throw malformed('truncated length prefix');
    const view = new DataView(this.data.buffer, this.data.byteOffset + this.offset, 4);
    this.offset += 4;
    return view.getUint32(0, false);
  }

  frame(): Uint8Array {
    const length = this.u32();
    if (this.offset + length > this.data.length) throw malformed('truncated argument');
    const out = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  done(): boolean {
    return this.offset === this.data.length;
  }
}

function u32(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, false);
  return out;
}

function framed(content: Uint8Array): Uint8Array {
  return concat([u32(content.length), content]);
}

export function concat(parts: ReadonlyArray<Uint8Array>): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function invalid(detail: string): RevertError {
  return new RevertError(HostErrorCode.InvalidArgument, { detail });
}

function malformed(detail: string): RevertError {
  return new RevertError(HostErrorCode.MalformedCalldata, { detail });
}
