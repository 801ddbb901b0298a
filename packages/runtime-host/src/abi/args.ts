/**
 * Tollgate Runtime Host — Typed Argument Reader
 *
 * Contract handlers receive decoded arguments through an Args instance and
 * read each position with the accessor matching its declared type. The
 * codec has already validated widths; the accessors re-check the runtime
 * shape so a handler never sees a value of the wrong kind.
 */

import { HostErrorCode, RevertError } from '../errors.js';
import { isAddress, isBytes32, isSelector } from '../types/address.js';
import type { Address, Bytes32, Selector } from '../types/address.js';
import { isScalarValue } from './types.js';
import type { AbiScalar, AbiValue } from './types.js';

export class Args {
  constructor(
    private readonly signature: string,
    private readonly values: ReadonlyArray<AbiValue>,
  ) {}

  get length(): number {
    return this.values.length;
  }

  address(index: number): Address {
    return asAddress(this.scalar(index), this.where(index));
  }

  uint(index: number): bigint {
    const value = this.scalar(index);
    if (typeof value !== 'bigint') throw this.mismatch(index, 'uint');
    return value;
  }

  uint8(index: number): number {
    const value = this.scalar(index);
    if (typeof value !== 'number') throw this.mismatch(index, 'uint8');
    return value;
  }

  bool(index: number): boolean {
    const value = this.scalar(index);
    if (typeof value !== 'boolean') throw this.mismatch(index, 'bool');
    return value;
  }

  bytes(index: number): Uint8Array {
    const value = this.scalar(index);
    if (!(value instanceof Uint8Array)) throw this.mismatch(index, 'bytes');
    return value;
  }

  bytes4(index: number): Selector {
    const value = this.scalar(index);
    if (typeof value !== 'string' || !isSelector(value)) throw this.mismatch(index, 'bytes4');
    return value;
  }

  bytes32(index: number): Bytes32 {
    const value = this.scalar(index);
    if (typeof value !== 'string' || !isBytes32(value)) throw this.mismatch(index, 'bytes32');
    return value;
  }

  string(index: number): string {
    const value = this.scalar(index);
    if (typeof value !== 'string') throw this.mismatch(index, 'string');
    return value;
  }

  addresses(index: number): Address[] {
    return this.array(index).map((v) => asAddress(v, this.where(index)));
  }

  bytes4s(index: number): Selector[] {
    return this.array(index).map((v) => {
      if (typeof v !== 'string' || !isSelector(v)) throw this.mismatch(index, 'bytes4[]');
      return v;
    });
  }

  bools(index: number): boolean[] {
    return this.array(index).map((v) => {
      if (typeof v !== 'boolean') throw this.mismatch(index, 'bool[]');
      return v;
    });
  }

  uint8s(index: number): number[] {
    return this.array(index).map((v) => {
      if (typeof v !== 'number') throw this.mismatch(index, 'uint8[]');
      return v;
    });
  }

  private scalar(index: number): AbiScalar {
    const value = this.values[index];
    if (value === undefined || !isScalarValue(value)) throw this.mismatch(index, 'scalar');
    return value;
  }

  private array(index: number): ReadonlyArray<AbiScalar> {
    const value = this.values[index];
    if (value === undefined || isScalarValue(value)) throw this.mismatch(index, 'array');
    return value;
  }

  private where(index: number): string {
    return `${this.signature}[${index}]`;
  }

  private mismatch(index: number, expected: string): RevertError {
    return new RevertError(HostErrorCode.InvalidArgument, { at: this.where(index), expected });
  }
}

function asAddress(value: AbiScalar, where: string): Address {
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new RevertError(HostErrorCode.InvalidArgument, { at: where, expected: 'address' });
  }
  return value;
}

// ---------------------------------------------------------------------------
// Return-value narrowing
// ---------------------------------------------------------------------------

/** Narrow a call result to a boolean, or fail with UnexpectedReturn. */
export function expectBool(value: AbiValue | undefined, from: string): boolean {
  if (typeof value !== 'boolean') throw unexpected(from, 'bool');
  return value;
}

export function expectAddress(value: AbiValue | undefined, from: string): Address {
  if (typeof value !== 'string' || !isAddress(value)) throw unexpected(from, 'address');
  return value;
}

export function expectBytes32(value: AbiValue | undefined, from: string): Bytes32 {
  if (typeof value !== 'string' || !isBytes32(value)) throw unexpected(from, 'bytes32');
  return value;
}

export function expectUint(value: AbiValue | undefined, from: string): bigint {
  if (typeof value !== 'bigint') throw unexpected(from, 'uint');
  return value;
}

export function expectUint8(value: AbiValue | undefined, from: string): number {
  if (typeof value !== 'number') throw unexpected(from, 'uint8');
  return value;
}

export function expectBools(value: AbiValue | undefined, from: string): boolean[] {
  if (value === undefined || isScalarValue(value)) throw unexpected(from, 'bool[]');
  return value.map((v) => {
    if (typeof v !== 'boolean') throw unexpected(from, 'bool[]');
    return v;
  });
}

function unexpected(from: string, expected: string): RevertError {
  return new RevertError(HostErrorCode.UnexpectedReturn, { from, expected });
}
