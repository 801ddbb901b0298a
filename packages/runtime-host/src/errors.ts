/**
 * Tollgate Runtime Host — Revert Errors
 *
 * A RevertError is the only structured failure a contract can raise.
 * `reason` is a stable code that callers match on; `args` carries the
 * named values that explain it. Anything else thrown from contract code is
 * an unstructured failure and is propagated untouched after rollback.
 */

import { isScalarValue } from './abi/types.js';
import type { AbiValue } from './abi/types.js';

/** Failure codes raised by the host itself (not by contract logic). */
export enum HostErrorCode {
  NoCode = 'NoCode',
  UnknownFunction = 'UnknownFunction',
  NonPayable = 'NonPayable',
  MalformedCalldata = 'MalformedCalldata',
  InvalidArgument = 'InvalidArgument',
  StaticStateChange = 'StaticStateChange',
  CallDepthExceeded = 'CallDepthExceeded',
  UnexpectedReturn = 'UnexpectedReturn',
  InvalidSignature = 'InvalidSignature',
  AlreadyInitialized = 'AlreadyInitialized',
  InvalidImplementation = 'InvalidImplementation',
  UUPSUnauthorizedCallContext = 'UUPSUnauthorizedCallContext',
  ProxyDeniedAdminAccess = 'ProxyDeniedAdminAccess',
  NotBeaconOwner = 'NotBeaconOwner',
}

export type RevertArgs = Readonly<Record<string, AbiValue>>;

export class RevertError extends Error {
  constructor(
    public readonly reason: string,
    public readonly args: RevertArgs = {},
    options?: { cause?: unknown },
  ) {
    super(formatRevert(reason, args), options);
    this.name = 'RevertError';
  }
}

/** True if `err` is a RevertError carrying the given reason. */
export function isRevert(err: unknown, reason?: string): err is RevertError {
  return err instanceof RevertError && (reason === undefined || err.reason === reason);
}

function formatRevert(reason: string, args: RevertArgs): string {
  const keys = Object.keys(args);
  if (keys.length === 0) return `reverted: ${reason}`;
  const detail = keys.map((k) => `${k}=${displayValue(args[k])}`).join(', ');
  return `reverted: ${reason}(${detail})`;
}

function displayValue(value: AbiValue | undefined): string {
  if (value === undefined) return 'undefined';
  if (!isScalarValue(value)) return `[${value.map((v) => displayValue(v)).join(',')}]`;
  if (value instanceof Uint8Array) return `bytes[${value.length}]`;
  return String(value);
}
