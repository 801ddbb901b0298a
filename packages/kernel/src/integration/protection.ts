/**
 * Tollgate Kernel — Protected-Call Guard
 *
 * Shared by both Integration variants. A guarded operation declares a
 * trailing `bytes` parameter that carries the security payload; once the
 * operation's flag is on, the guard hands the full invocation to the
 * Router and runs the body only on a `true` verdict.
 */

import { expectBool, isRevert, parseSignature } from '@tollgate/runtime-host';
import type { Address, CallContext, Mutability, ParsedSignature } from '@tollgate/runtime-host';
import { MIN_PAYLOAD_LENGTH, ROUTER } from '../configuration/protocol.js';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';

/** Guarded operations always change state. */
export type ProtectedMutability = Exclude<Mutability, 'view'>;

/**
 * Parse a guarded operation's signature.
 *
 * @throws {Error} If its last parameter is not `bytes`
 */
export function protectedSignature(signature: string): ParsedSignature {
  const parsed = parseSignature(signature);
  if (parsed.params[parsed.params.length - 1] !== 'bytes') {
    throw new Error(`Protected function ${parsed.canonical} must take the payload as its last (bytes) parameter`);
  }
  return parsed;
}

export interface GuardTarget {
  readonly router: Address;
  /** The logic unit's own address; `ctx.address` is the integration. */
  readonly implementation: Address;
}

/**
 * Ask the Router to validate `payload` for the current invocation.
 *
 * Router reverts reach the caller unchanged. Any other failure is wrapped
 * in DispatchFailed.
 *
 * @throws {RevertError} PayloadTooShort below MIN_PAYLOAD_LENGTH
 * @throws {RevertError} ModuleDenied on a `false` verdict
 */
export function guardProtectedCall(ctx: CallContext, target: GuardTarget, payload: Uint8Array): void {
  if (payload.length < MIN_PAYLOAD_LENGTH) {
    throw protocolError(ProtocolErrorCode.PayloadTooShort, { length: BigInt(payload.length) });
  }

  let verdict: boolean;
  try {
    verdict = expectBool(
      ctx.call(target.router, ROUTER.dispatchProtectedCall, [
        ctx.sender,
        target.implementation,
        ctx.value,
        BigInt(payload.length),
        ctx.data,
      ]),
      ROUTER.dispatchProtectedCall,
    );
  } catch (err) {
    if (isRevert(err)) throw err;
    throw protocolError(ProtocolErrorCode.DispatchFailed, { router: target.router }, err);
  }

  if (!verdict) {
    throw protocolError(ProtocolErrorCode.ModuleDenied, { caller: ctx.sender, implementation: target.implementation });
  }
}
