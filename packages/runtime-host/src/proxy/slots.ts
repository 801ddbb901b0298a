/**
 * Tollgate Runtime Host — Proxy Storage Slots
 *
 * Well-known storage keys that every proxy kind uses for its
 * implementation, admin and beacon. Keeping them under fixed names means
 * logic units, proxies and tooling agree on where to look.
 */

import { createHash } from 'node:crypto';
import { expectAddress } from '../abi/args.js';
import type { CallContext } from '../contract.js';
import { HostErrorCode, RevertError } from '../errors.js';
import type { Storage } from '../state/storage.js';
import { toBytes32, ZERO_ADDRESS } from '../types/address.js';
import type { Address, Bytes32 } from '../types/address.js';

export const IMPLEMENTATION_SLOT = 'proxy.implementation';
export const ADMIN_SLOT = 'proxy.admin';
export const BEACON_SLOT = 'proxy.beacon';

/** Identifier a UUPS logic unit returns from `proxiableUUID()`. */
export const PROXIABLE_UUID: Bytes32 = toBytes32(
  '0x' + createHash('sha3-256').update(IMPLEMENTATION_SLOT).digest('hex'),
);

export function getImplementation(storage: Storage): Address | undefined {
  return storage.getAddress(IMPLEMENTATION_SLOT);
}

export function getAdmin(storage: Storage): Address | undefined {
  return storage.getAddress(ADMIN_SLOT);
}

export function getBeacon(storage: Storage): Address | undefined {
  return storage.getAddress(BEACON_SLOT);
}

/**
 * Point the current proxy at `implementation`, then run `data` against it.
 *
 * @throws {RevertError} InvalidImplementation if nothing is deployed at `implementation`
 */
export function upgradeToAndCall(ctx: CallContext, implementation: Address, data: Uint8Array): void {
  if (!ctx.hasCode(implementation)) {
    throw new RevertError(HostErrorCode.InvalidImplementation, { implementation });
  }
  ctx.storage.set(IMPLEMENTATION_SLOT, implementation);
  ctx.emit('Upgraded', { implementation });
  if (data.length > 0) {
    ctx.delegateCall(implementation, data);
  }
}

export function changeAdmin(ctx: CallContext, admin: Address): void {
  ctx.emit('AdminChanged', { previousAdmin: getAdmin(ctx.storage) ?? ZERO_ADDRESS, newAdmin: admin });
  ctx.storage.set(ADMIN_SLOT, admin);
}

/**
 * Point the current proxy at `beacon`, then run `data` against the beacon's
 * implementation.
 */
export function upgradeBeaconToAndCall(ctx: CallContext, beacon: Address, data: Uint8Array): void {
  if (!ctx.hasCode(beacon)) {
    throw new RevertError(HostErrorCode.InvalidImplementation, { beacon });
  }
  ctx.storage.set(BEACON_SLOT, beacon);
  ctx.emit('BeaconUpgraded', { beacon });
  if (data.length > 0) {
    ctx.delegateCall(beaconImplementation(ctx, beacon), data);
  }
}

export function beaconImplementation(ctx: CallContext, beacon: Address): Address {
  return expectAddress(ctx.staticCall(beacon, 'implementation()'), 'implementation()');
}
