/**
 * Tollgate Runtime Host — Proxy Tests
 *
 *   PRX-U1: UUPS proxy initializes once and runs the logic unit on its own storage
 *   PRX-U2: UUPS upgrades are authorized by the logic unit and keep state
 *   PRX-U3: UUPS upgrade entry point refuses direct calls and non-UUPS targets
 *   PRX-U4: transparent proxy gives its admin only the upgrade function
 *   PRX-U5: one beacon upgrade moves every beacon proxy
 *   PRX-U6: minimal clones forward to a fixed implementation
 *   PRX-U7: beacon ownership can be handed on, by the owner only
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { expectAddress } from '../src/abi/args.js';
import { encodeCall } from '../src/abi/codec.js';
import { HostErrorCode } from '../src/errors.js';
import { Host } from '../src/host.js';
import { BeaconProxy, UpgradeableBeacon } from '../src/proxy/beacon.js';
import { IMPLEMENTATION_SLOT } from '../src/proxy/slots.js';
import { MinimalClone } from '../src/proxy/minimal-clone.js';
import { TransparentProxy } from '../src/proxy/transparent-proxy.js';
import { UpgradeableProxy } from '../src/proxy/upgradeable-proxy.js';
import { deriveAddress } from '../src/types/address.js';
import type { Address } from '../src/types/address.js';
import { CloneFactory, Counter, CounterV1, CounterV2, revertReason } from './fixtures/contracts.js';

const EMPTY = new Uint8Array(0);

let host: Host;
let owner: Address;
let user: Address;

beforeEach(() => {
  host = new Host({ timestamp: 1_700_000_000n });
  owner = host.accountFor('owner');
  user = host.accountFor('user');
});

function increment(target: Address, from: Address = user): void {
  host.send({ from, to: target, signature: 'increment()' });
}

function countOf(target: Address): unknown {
  return host.read({ to: target, signature: 'count()' });
}

describe('UUPS proxy', () => {
  let v1: Address;
  let proxy: Address;

  beforeEach(() => {
    v1 = host.deploy(owner, (ctx) => new CounterV1(ctx)).address;
    const initData = encodeCall('initialize(address)', [owner]);
    proxy = host.deploy(owner, (ctx) => new UpgradeableProxy(ctx, v1, initData)).address;
  });

  it('PRX-U1: keeps state in the proxy and reports both identities', () => {
    increment(proxy);
    expect(countOf(proxy)).toBe(1n);
    expect(countOf(v1)).toBe(0n);
    expect(host.read({ to: proxy, signature: 'self()' })).toEqual([proxy, v1]);
  });

  it('PRX-U1: refuses a second initialization, on the proxy and on the bare logic unit', () => {
    const data = { signature: 'initialize(address)', args: [user] };
    expect(revertReason(() => host.send({ from: user, to: proxy, ...data }))).toBe(HostErrorCode.AlreadyInitialized);
    expect(revertReason(() => host.send({ from: user, to: v1, ...data }))).toBe(HostErrorCode.AlreadyInitialized);
  });

  it('PRX-U2: the owner upgrades and state survives', () => {
    increment(proxy);
    const v2 = host.deploy(owner, (ctx) => new CounterV2(ctx)).address;

    const receipt = host.send({ from: owner, to: proxy, signature: 'upgradeToAndCall(address,bytes)', args: [v2, EMPTY] });

    expect(receipt.events).toEqual([{ address: proxy, name: 'Upgraded', fields: { implementation: v2 } }]);
    expect(host.read({ to: proxy, signature: 'version()' })).toBe(2n);
    expect(countOf(proxy)).toBe(1n);
  });

  it('PRX-U2: anyone else is refused by the logic unit', () => {
    const v2 = host.deploy(owner, (ctx) => new CounterV2(ctx)).address;
    expect(
      revertReason(() =>
        host.send({ from: user, to: proxy, signature: 'upgradeToAndCall(address,bytes)', args: [v2, EMPTY] }),
      ),
    ).toBe('NotOwner');
  });

  it('PRX-U3: the logic unit refuses upgrades called on it directly', () => {
    const v2 = host.deploy(owner, (ctx) => new CounterV2(ctx)).address;
    expect(
      revertReason(() =>
        host.send({ from: owner, to: v1, signature: 'upgradeToAndCall(address,bytes)', args: [v2, EMPTY] }),
      ),
    ).toBe(HostErrorCode.UUPSUnauthorizedCallContext);
  });

  it('PRX-U3: refuses targets that cannot upgrade again', () => {
    const plain = host.deploy(owner, (ctx) => new Counter(ctx)).address;
    for (const target of [plain, user]) {
      expect(
        revertReason(() =>
          host.send({ from: owner, to: proxy, signature: 'upgradeToAndCall(address,bytes)', args: [target, EMPTY] }),
        ),
      ).toBe(HostErrorCode.InvalidImplementation);
    }
    expect(host.read({ to: proxy, signature: 'version()' })).toBe(1n);
  });

  it('PRX-U3: records the implementation under the well-known slot name', () => {
    expect(IMPLEMENTATION_SLOT).toBe('proxy.implementation');
  });
});

describe('Transparent proxy', () => {
  let impl: Address;
  let proxy: Address;

  beforeEach(() => {
    impl = host.deploy(owner, (ctx) => new Counter(ctx)).address;
    proxy = host.deploy(owner, (ctx) => new TransparentProxy(ctx, impl, owner)).address;
  });

  it('PRX-U4: forwards users and denies the admin everything but upgrades', () => {
    increment(proxy);
    expect(countOf(proxy)).toBe(1n);
    expect(revertReason(() => increment(proxy, owner))).toBe(HostErrorCode.ProxyDeniedAdminAccess);
  });

  it('PRX-U4: the admin upgrades without touching state', () => {
    increment(proxy);
    const next = host.deploy(owner, (ctx) => new Counter(ctx)).address;

    host.send({ from: owner, to: proxy, signature: 'upgradeToAndCall(address,bytes)', args: [next, EMPTY] });

    expect(host.read({ from: user, to: proxy, signature: 'whoami()' })).toEqual([proxy, next, user]);
    expect(countOf(proxy)).toBe(1n);
  });
});

describe('Beacon proxy', () => {
  it('PRX-U5: the beacon owner moves all proxies at once', () => {
    const impl = host.deploy(owner, (ctx) => new Counter(ctx)).address;
    const beacon = host.deploy(owner, (ctx) => new UpgradeableBeacon(ctx, impl, owner)).address;
    const a = host.deploy(owner, (ctx) => new BeaconProxy(ctx, beacon)).address;
    const b = host.deploy(owner, (ctx) => new BeaconProxy(ctx, beacon)).address;
    increment(a);
    const next = host.deploy(owner, (ctx) => new Counter(ctx)).address;

    expect(revertReason(() => host.send({ from: user, to: beacon, signature: 'upgradeTo(address)', args: [next] }))).toBe(
      HostErrorCode.NotBeaconOwner,
    );
    host.send({ from: owner, to: beacon, signature: 'upgradeTo(address)', args: [next] });

    expect(host.read({ from: user, to: a, signature: 'whoami()' })).toEqual([a, next, user]);
    expect(host.read({ from: user, to: b, signature: 'whoami()' })).toEqual([b, next, user]);
    expect(countOf(a)).toBe(1n);
    expect(countOf(b)).toBe(0n);
  });

  it('PRX-U7: only the owner hands the beacon on, and the new owner takes over upgrades', () => {
    const impl = host.deploy(owner, (ctx) => new Counter(ctx)).address;
    const beacon = host.deploy(owner, (ctx) => new UpgradeableBeacon(ctx, impl, owner)).address;
    const next = host.deploy(owner, (ctx) => new Counter(ctx)).address;

    expect(
      revertReason(() => host.send({ from: user, to: beacon, signature: 'transferOwnership(address)', args: [user] })),
    ).toBe(HostErrorCode.NotBeaconOwner);

    const receipt = host.send({ from: owner, to: beacon, signature: 'transferOwnership(address)', args: [user] });
    expect(receipt.events).toEqual([
      { address: beacon, name: 'OwnershipTransferred', fields: { previousOwner: owner, newOwner: user } },
    ]);
    expect(host.read({ to: beacon, signature: 'owner()' })).toBe(user);

    expect(revertReason(() => host.send({ from: owner, to: beacon, signature: 'upgradeTo(address)', args: [next] }))).toBe(
      HostErrorCode.NotBeaconOwner,
    );
    host.send({ from: user, to: beacon, signature: 'upgradeTo(address)', args: [next] });
    expect(host.read({ to: beacon, signature: 'implementation()' })).toBe(next);
  });
});

describe('Minimal clone', () => {
  it('PRX-U6: forwards to its implementation with its own storage', () => {
    const impl = host.deploy(owner, (ctx) => new Counter(ctx)).address;
    const clone = host.deploy(owner, (ctx) => new MinimalClone(ctx, impl));

    increment(clone.address);

    expect(clone.contract.implementation).toBe(impl);
    expect(countOf(clone.address)).toBe(1n);
    expect(countOf(impl)).toBe(0n);
  });

  it('PRX-U6: factories create clones from contract code', () => {
    const impl = host.deploy(owner, (ctx) => new Counter(ctx)).address;
    const factory = host.deploy(owner, (ctx) => new CloneFactory(ctx, impl)).address;

    const first = expectAddress(host.send({ from: user, to: factory, signature: 'clone()' }).returnValue, 'clone()');
    const second = expectAddress(host.send({ from: user, to: factory, signature: 'clone()' }).returnValue, 'clone()');

    expect(first).toBe(deriveAddress(factory, 0));
    expect(second).toBe(deriveAddress(factory, 1));
    increment(second);
    expect(countOf(second)).toBe(1n);
    expect(countOf(first)).toBe(0n);
  });
});
