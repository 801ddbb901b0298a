/**
 * Tollgate Runtime Host — UUPS Upgradeable Logic Units
 *
 * Under the UUPS pattern the upgrade entry point lives in the logic unit,
 * not the proxy; the proxy it sits behind stays a plain forwarder (see
 * UpgradeableProxy). Subclasses decide who may upgrade by implementing
 * authorizeUpgrade().
 */

import { Contract } from '../contract.js';
import type { CallContext } from '../contract.js';
import { HostErrorCode, isRevert, RevertError } from '../errors.js';
import type { AbiValue } from '../abi/types.js';
import type { Address } from '../types/address.js';
import { getImplementation, PROXIABLE_UUID, upgradeToAndCall } from './slots.js';

export const UPGRADE_TO_AND_CALL = 'upgradeToAndCall(address,bytes)';
export const PROXIABLE_UUID_SIGNATURE = 'proxiableUUID()';

export abstract class UupsUpgradeable extends Contract {
  constructor(ctx: CallContext) {
    super(ctx);
    this.expose(PROXIABLE_UUID_SIGNATURE, 'view', (c) => {
      notDelegated(c, this.address);
      return PROXIABLE_UUID;
    });
    this.expose(UPGRADE_TO_AND_CALL, 'payable', (c, args) => {
      this.upgradeToAndCall(c, args.address(0), args.bytes(1));
    });
  }

  /** Revert unless `ctx.sender` may upgrade the proxy `ctx` runs behind. */
  protected abstract authorizeUpgrade(ctx: CallContext, newImplementation: Address): void;

  /**
   * Upgrade the calling proxy to `newImplementation`, then run `data` on it.
   *
   * The new logic unit must itself answer `proxiableUUID()` with
   * PROXIABLE_UUID, otherwise the proxy could be stranded on code with no
   * way to upgrade again.
   *
   * @throws {RevertError} UUPSUnauthorizedCallContext outside a proxy
   * @throws {RevertError} InvalidImplementation if the target is not UUPS-capable
   */
  protected upgradeToAndCall(ctx: CallContext, newImplementation: Address, data: Uint8Array): void {
    onlyProxy(ctx, this.address);
    this.authorizeUpgrade(ctx, newImplementation);
    if (!ctx.hasCode(newImplementation)) {
      throw new RevertError(HostErrorCode.InvalidImplementation, { implementation: newImplementation });
    }
    if (proxiableUuidOf(ctx, newImplementation) !== PROXIABLE_UUID) {
      throw new RevertError(HostErrorCode.InvalidImplementation, { implementation: newImplementation });
    }
    upgradeToAndCall(ctx, newImplementation, data);
  }
}

/**
 * Revert unless the call reached `self` through a proxy that currently
 * points at it.
 */
export function onlyProxy(ctx: CallContext, self: Address): void {
  if (ctx.address === self || getImplementation(ctx.storage) !== self) {
    throw new RevertError(HostErrorCode.UUPSUnauthorizedCallContext, { context: ctx.address });
  }
}

/** Revert if the call is running behind a proxy. */
export function notDelegated(ctx: CallContext, self: Address): void {
  if (ctx.address !== self) {
    throw new RevertError(HostErrorCode.UUPSUnauthorizedCallContext, { context: ctx.address });
  }
}

function proxiableUuidOf(ctx: CallContext, implementation: Address): AbiValue | undefined {
  try {
    return ctx.staticCall(implementation, PROXIABLE_UUID_SIGNATURE);
  } catch (err) {
    if (!isRevert(err)) throw err;
    throw new RevertError(HostErrorCode.InvalidImplementation, { implementation }, { cause: err });
  }
}
