/**
 * Tollgate Runtime Host — Minimal Clone
 *
 * A fixed forwarder: the implementation is set at creation and can never
 * change. Factories stamp these out with `ctx.create()`.
 */

import type { AbiValue } from '../abi/types.js';
import { Contract } from '../contract.js';
import type { CallContext } from '../contract.js';
import { HostErrorCode, RevertError } from '../errors.js';
import type { Address } from '../types/address.js';

export class MinimalClone extends Contract {
  constructor(ctx: CallContext, readonly implementation: Address) {
    super(ctx);
    if (!ctx.hasCode(implementation)) {
      throw new RevertError(HostErrorCode.InvalidImplementation, { implementation });
    }
  }

  override fallback(ctx: CallContext): AbiValue | void {
    return ctx.delegateCall(this.implementation);
  }
}

/** Deploy a clone of `implementation` from the calling contract. */
export function cloneOf(ctx: CallContext, implementation: Address): Address {
  return ctx.create((c) => new MinimalClone(c, implementation)).address;
}
