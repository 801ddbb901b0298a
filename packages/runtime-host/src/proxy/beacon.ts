/**
 * Tollgate Runtime Host — Beacon and Beacon Proxy
 *
 * Many BeaconProxy instances share one UpgradeableBeacon; upgrading the
 * beacon moves every proxy to the new implementation at once.
 */

import type { AbiValue } from '../abi/types.js';
import { Contract } from '../contract.js';
import type { CallContext } from '../contract.js';
import { HostErrorCode, RevertError } from '../errors.js';
import { ZERO_ADDRESS } from '../types/address.js';
import type { Address } from '../types/address.js';
import { beaconImplementation, getBeacon, upgradeBeaconToAndCall } from './slots.js';

const IMPLEMENTATION_KEY = 'beacon.implementation';
const OWNER_KEY = 'beacon.owner';

export class UpgradeableBeacon extends Contract {
  constructor(ctx: CallContext, implementation: Address, owner: Address) {
    super(ctx);
    this.setImplementation(ctx, implementation);
    ctx.storage.set(OWNER_KEY, owner);

    this.expose('implementation()', 'view', (c) => this.implementationOf(c));
    this.expose('owner()', 'view', (c) => this.ownerOf(c));
    this.expose('upgradeTo(address)', 'nonpayable', (c, args) => {
      this.onlyOwner(c);
      this.setImplementation(c, args.address(0));
    });
    this.expose('transferOwnership(address)', 'nonpayable', (c, args) => {
      this.onlyOwner(c);
      const previousOwner = this.ownerOf(c);
      c.storage.set(OWNER_KEY, args.address(0));
      c.emit('OwnershipTransferred', { previousOwner, newOwner: args.address(0) });
    });
  }

  private implementationOf(ctx: CallContext): Address {
    const implementation = ctx.storage.getAddress(IMPLEMENTATION_KEY);
    if (implementation === undefined) {
      throw new RevertError(HostErrorCode.InvalidImplementation, { beacon: ctx.address });
    }
    return implementation;
  }

  private ownerOf(ctx: CallContext): Address {
    return ctx.storage.getAddress(OWNER_KEY) ?? ZERO_ADDRESS;
  }

  private onlyOwner(ctx: CallContext): void {
    if (ctx.sender !== ctx.storage.getAddress(OWNER_KEY)) {
      throw new RevertError(HostErrorCode.NotBeaconOwner, { account: ctx.sender });
    }
  }

  private setImplementation(ctx: CallContext, implementation: Address): void {
    if (!ctx.hasCode(implementation)) {
      throw new RevertError(HostErrorCode.InvalidImplementation, { implementation });
    }
    ctx.storage.set(IMPLEMENTATION_KEY, implementation);
    ctx.emit('Upgraded', { implementation });
  }
}

export class BeaconProxy extends Contract {
  constructor(ctx: CallContext, beacon: Address, data: Uint8Array = new Uint8Array(0)) {
    super(ctx);
    upgradeBeaconToAndCall(ctx, beacon, data);
  }

  override fallback(ctx: CallContext): AbiValue | void {
    const beacon = getBeacon(ctx.storage);
    if (beacon === undefined) {
      throw new RevertError(HostErrorCode.NoCode, { address: ctx.address });
    }
    return ctx.delegateCall(beaconImplementation(ctx, beacon));
  }
}
