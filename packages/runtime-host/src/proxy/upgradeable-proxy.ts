/**
 * Tollgate Runtime Host — Upgradeable Proxy
 *
 * Forwards every call to the implementation recorded in its storage. The
 * proxy exposes no functions of its own; upgrades arrive through the
 * implementation's UUPS entry point.
 */

import { Contract } from '../contract.js';
import type { CallContext } from '../contract.js';
import type { AbiValue } from '../abi/types.js';
import { HostErrorCode, RevertError } from '../errors.js';
import type { Address } from '../types/address.js';
import { getImplementation, upgradeToAndCall } from './slots.js';

export class UpgradeableProxy extends Contract {
  /**
   * @param implementation - Initial logic unit
   * @param data - Call data run against the implementation once installed, typically an initializer
   */
  constructor(ctx: CallContext, implementation: Address, data: Uint8Array = new Uint8Array(0)) {
    super(ctx);
    upgradeToAndCall(ctx, implementation, data);
  }

  override fallback(ctx: CallContext): AbiValue | void {
    return ctx.delegateCall(requireImplementation(ctx));
  }
}

export function requireImplementation(ctx: CallContext): Address {
  const implementation = getImplementation(ctx.storage);
  if (implementation === undefined) {
    throw new RevertError(HostErrorCode.NoCode, { address: ctx.address });
  }
  return implementation;
}
