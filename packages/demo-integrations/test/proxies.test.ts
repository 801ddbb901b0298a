/**
 * Tollgate Demo Proxy Scenarios
 *
 *   DEMO-P1: the upgradeable collection registers and guards behind UUPS and transparent proxies
 *   DEMO-P2: beacon proxies are separate identities that move to a new logic unit together
 *   DEMO-P3: clone wallets are one identity per owner
 *   DEMO-P4: a UUPS upgrade with preAuthorize + finalizeUpgrade keeps the collection registered
 *   DEMO-P5: an unfinalized upgrade blocks minting until finalized or repaired by override
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BeaconProxy,
  encodeCall,
  expectAddress,
  HostErrorCode,
  selectorOf,
  TransparentProxy,
  UpgradeableBeacon,
  UpgradeableProxy,
  UPGRADE_TO_AND_CALL,
} from '@tollgate/runtime-host';
import type { Address } from '@tollgate/runtime-host';
import {
  AuthorizationStatus,
  GATEKEEPER,
  INTEGRATION,
  ProtocolErrorCode,
  RegistrationStatus,
  ROUTER,
} from '@tollgate/kernel';
import { DemoCollectionUpgradeable } from '../src/collection-upgradeable.js';
import { DemoErrorCode } from '../src/errors.js';
import { COLLECTION, WALLET, WALLET_FACTORY } from '../src/signatures.js';
import { DemoWallet, DemoWalletFactory } from '../src/wallet.js';
import { approval, approvalCalls, deployDemo, register, revertReason } from './fixtures/protocol.js';
import type { Demo } from './fixtures/protocol.js';

const SAFE_MINT = selectorOf(COLLECTION.safeMint);
const SET_LIMIT = selectorOf(WALLET.setLimit);
const FINALIZE = encodeCall(INTEGRATION.finalizeUpgrade);

let demo: Demo;
let admin: Address;
let user: Address;
let v1: Address;
let v2: Address;

beforeEach(() => {
  demo = deployDemo();
  admin = demo.host.accountFor('collection-admin');
  user = demo.host.accountFor('user');
  const options = { router: demo.router, gateKeeper: demo.gateKeeper };
  v1 = demo.host.deploy(admin, (c) => new DemoCollectionUpgradeable(c, options)).address;
  v2 = demo.host.deploy(admin, (c) => new DemoCollectionUpgradeable(c, options)).address;
});

function initialize(name: string): Uint8Array {
  return encodeCall(COLLECTION.initialize, [admin, name]);
}

function mint(proxy: Address, payload: Uint8Array, from: Address = user): void {
  demo.host.send({ from, to: proxy, signature: COLLECTION.safeMint, args: [1n, payload] });
}

function balanceOf(proxy: Address, owner: Address = user): unknown {
  return demo.host.read({ to: proxy, signature: COLLECTION.balanceOf, args: [owner] });
}

function ledger(signature: string, proxy: Address, implementation: Address): unknown {
  return demo.host.read({ to: demo.gateKeeper, signature, args: [proxy, implementation] });
}

function preAuthorize(proxy: Address, next: Address): void {
  demo.host.send({ from: admin, to: proxy, signature: INTEGRATION.preAuthorizeNewImplementation, args: [next] });
}

function protect(proxy: Address, selectors: string[], flags: boolean[]): void {
  demo.host.send({ from: admin, to: proxy, signature: INTEGRATION.setFunctionProtectionStatus, args: [selectors, flags] });
}

describe('DEMO-P1: UUPS and transparent proxies', () => {
  it('guards minting behind a UUPS proxy', () => {
    const proxy = demo.host.deploy(admin, (c) => new UpgradeableProxy(c, v1, initialize('Alpha'))).address;

    expect(demo.host.read({ to: proxy, signature: COLLECTION.name })).toBe('Alpha');
    expect(demo.host.read({ to: proxy, signature: INTEGRATION.self })).toEqual([proxy, v1]);
    expect(ledger(GATEKEEPER.registrationStatus, proxy, v1)).toBe(RegistrationStatus.PENDING);

    register(demo, proxy, v1, admin, [SAFE_MINT]);

    expect(revertReason(() => mint(proxy, approval(demo, { allow: false })))).toBe(ProtocolErrorCode.ModuleDenied);
    mint(proxy, approval(demo));
    expect(balanceOf(proxy)).toBe(1n);
  });

  it('keeps the bare logic unit out of the ledger', () => {
    expect(ledger(GATEKEEPER.registrationStatus, v1, v1)).toBe(RegistrationStatus.UNREGISTERED);
    expect(revertReason(() => mint(v1, approval(demo)))).toBe(ProtocolErrorCode.IntegrationNotRegistered);
  });

  it('guards minting behind a transparent proxy and keeps its admin out', () => {
    const proxyAdmin = demo.host.accountFor('proxy-admin');
    const proxy = demo.host.deploy(admin, (c) => new TransparentProxy(c, v1, proxyAdmin, initialize('Beta'))).address;
    register(demo, proxy, v1, admin, [SAFE_MINT]);

    mint(proxy, approval(demo));

    expect(balanceOf(proxy)).toBe(1n);
    expect(revertReason(() => mint(proxy, approval(demo), proxyAdmin))).toBe(HostErrorCode.ProxyDeniedAdminAccess);
  });

  it('credits the same logic unit separately per proxy', () => {
    const a = demo.host.deploy(admin, (c) => new UpgradeableProxy(c, v1, initialize('A'))).address;
    const b = demo.host.deploy(admin, (c) => new UpgradeableProxy(c, v1, initialize('B'))).address;
    register(demo, a, v1, admin, [SAFE_MINT]);

    mint(a, approval(demo));
    mint(b, new Uint8Array(0));

    expect(balanceOf(a)).toBe(1n);
    expect(balanceOf(b)).toBe(1n);
    expect(approvalCalls(demo)).toBe(1n);
  });
});

describe('DEMO-P2: beacon proxies', () => {
  let beacon: Address;
  let beaconOwner: Address;
  let a: Address;
  let b: Address;

  beforeEach(() => {
    beaconOwner = demo.host.accountFor('beacon-owner');
    beacon = demo.host.deploy(beaconOwner, (c) => new UpgradeableBeacon(c, v1, beaconOwner)).address;
    a = demo.host.deploy(admin, (c) => new BeaconProxy(c, beacon, initialize('A'))).address;
    b = demo.host.deploy(admin, (c) => new BeaconProxy(c, beacon, initialize('B'))).address;
    register(demo, a, v1, admin, [SAFE_MINT]);
    register(demo, b, v1, admin, [SAFE_MINT]);
  });

  it('registers each proxy as its own identity', () => {
    expect(ledger(GATEKEEPER.registrationStatus, a, v1)).toBe(RegistrationStatus.REGISTERED);
    expect(ledger(GATEKEEPER.registrationStatus, b, v1)).toBe(RegistrationStatus.REGISTERED);
    mint(a, approval(demo));
    expect(balanceOf(a)).toBe(1n);
    expect(balanceOf(b)).toBe(0n);
  });

  it('blocks every proxy after a beacon upgrade until each one finalizes', () => {
    preAuthorize(a, v2);
    preAuthorize(b, v2);
    demo.host.send({ from: beaconOwner, to: beacon, signature: 'upgradeTo(address)', args: [v2] });

    expect(revertReason(() => mint(a, approval(demo)))).toBe(ProtocolErrorCode.IntegrationNotRegistered);
    expect(revertReason(() => mint(b, approval(demo)))).toBe(ProtocolErrorCode.IntegrationNotRegistered);

    demo.host.send({ from: admin, to: a, signature: INTEGRATION.finalizeUpgrade });

    expect(ledger(GATEKEEPER.registrationStatus, a, v2)).toBe(RegistrationStatus.REGISTERED);
    expect(ledger(GATEKEEPER.authorizationStatus, a, v2)).toBe(AuthorizationStatus.ACTIVE);
    expect(demo.host.read({ to: a, signature: INTEGRATION.self })).toEqual([a, v2]);
    expect(revertReason(() => mint(b, approval(demo)))).toBe(ProtocolErrorCode.IntegrationNotRegistered);
  });

  it('does not carry flags to the new logic unit', () => {
    preAuthorize(a, v2);
    demo.host.send({ from: beaconOwner, to: beacon, signature: 'upgradeTo(address)', args: [v2] });
    demo.host.send({ from: admin, to: a, signature: INTEGRATION.finalizeUpgrade });

    expect(demo.host.read({ to: a, signature: INTEGRATION.isFunctionProtectionEnabled, args: [SAFE_MINT] })).toBe(false);

    protect(a, [SAFE_MINT], [true]);
    expect(revertReason(() => mint(a, approval(demo, { allow: false })))).toBe(ProtocolErrorCode.ModuleDenied);
  });
});

describe('DEMO-P3: clone wallets', () => {
  let walletLogic: Address;
  let factory: Address;
  let alice: Address;
  let bob: Address;
  let aliceWallet: Address;
  let bobWallet: Address;

  beforeEach(() => {
    const deployer = demo.host.accountFor('wallet-deployer');
    alice = demo.host.accountFor('alice');
    bob = demo.host.accountFor('bob');
    walletLogic = demo.host.deploy(
      deployer,
      (c) => new DemoWallet(c, { router: demo.router, gateKeeper: demo.gateKeeper }),
    ).address;
    factory = demo.host.deploy(deployer, (c) => new DemoWalletFactory(c, walletLogic)).address;

    demo.host.send({ from: alice, to: factory, signature: WALLET_FACTORY.createWallet, args: [alice] });
    demo.host.send({ from: bob, to: factory, signature: WALLET_FACTORY.createWallet, args: [bob] });
    aliceWallet = walletOf(alice);
    bobWallet = walletOf(bob);
  });

  function walletOf(owner: Address): Address {
    return expectAddress(demo.host.read({ to: factory, signature: WALLET_FACTORY.walletOf, args: [owner] }), WALLET_FACTORY.walletOf);
  }

  function setLimit(wallet: Address, limit: bigint, payload: Uint8Array, from: Address): void {
    demo.host.send({ from, to: wallet, signature: WALLET.setLimit, args: [limit, payload] });
  }

  it('gives every owner a distinct clone pre-registered against the shared logic unit', () => {
    expect(aliceWallet).not.toBe(bobWallet);
    expect(demo.host.read({ to: aliceWallet, signature: INTEGRATION.self })).toEqual([aliceWallet, walletLogic]);
    expect(demo.host.read({ to: aliceWallet, signature: INTEGRATION.securityAdmin })).toBe(alice);
    expect(ledger(GATEKEEPER.registrationStatus, aliceWallet, walletLogic)).toBe(RegistrationStatus.PENDING);
    expect(ledger(GATEKEEPER.registrationStatus, bobWallet, walletLogic)).toBe(RegistrationStatus.PENDING);
  });

  it('guards each wallet under its own registration', () => {
    register(demo, aliceWallet, walletLogic, alice, [SET_LIMIT]);

    expect(revertReason(() => setLimit(aliceWallet, 100n, approval(demo, { length: 63 }), alice))).toBe(
      ProtocolErrorCode.PayloadTooShort,
    );
    setLimit(aliceWallet, 100n, approval(demo), alice);
    setLimit(bobWallet, 5n, new Uint8Array(0), bob);

    expect(demo.host.read({ to: aliceWallet, signature: WALLET.limit })).toBe(100n);
    expect(demo.host.read({ to: bobWallet, signature: WALLET.limit })).toBe(5n);
  });

  it('still requires the owner after the payload is accepted', () => {
    register(demo, aliceWallet, walletLogic, alice, [SET_LIMIT]);
    expect(revertReason(() => setLimit(aliceWallet, 1n, approval(demo), bob))).toBe(ProtocolErrorCode.NotSecurityAdmin);
  });

  it('creates one wallet per owner', () => {
    expect(
      revertReason(() => demo.host.send({ from: alice, to: factory, signature: WALLET_FACTORY.createWallet, args: [alice] })),
    ).toBe(DemoErrorCode.WalletExists);
  });

  it('cannot upgrade a clone', () => {
    expect(
      revertReason(() =>
        demo.host.send({ from: alice, to: aliceWallet, signature: UPGRADE_TO_AND_CALL, args: [walletLogic, new Uint8Array(0)] }),
      ),
    ).toBe(HostErrorCode.UUPSUnauthorizedCallContext);
  });
});

describe('DEMO-P4: upgrading a UUPS collection', () => {
  it('carries registration and authorization across preAuthorize + finalizeUpgrade', () => {
    const proxy = demo.host.deploy(admin, (c) => new UpgradeableProxy(c, v1, initialize('Alpha'))).address;
    register(demo, proxy, v1, admin, [SAFE_MINT]);
    mint(proxy, approval(demo));

    preAuthorize(proxy, v2);
    expect(ledger(GATEKEEPER.upgradePreAuthorization, proxy, v2)).toBe(v1);
    demo.host.send({ from: admin, to: proxy, signature: UPGRADE_TO_AND_CALL, args: [v2, FINALIZE] });

    expect(ledger(GATEKEEPER.registrationStatus, proxy, v2)).toBe(RegistrationStatus.REGISTERED);
    expect(ledger(GATEKEEPER.authorizationStatus, proxy, v2)).toBe(AuthorizationStatus.ACTIVE);
    expect(demo.host.read({ to: proxy, signature: COLLECTION.name })).toBe('Alpha');
    expect(balanceOf(proxy)).toBe(1n);

    protect(proxy, [SAFE_MINT], [true]);
    mint(proxy, approval(demo));
    expect(balanceOf(proxy)).toBe(2n);
  });

  it('refuses an upgrade from anyone but the Security Admin', () => {
    const proxy = demo.host.deploy(admin, (c) => new UpgradeableProxy(c, v1, initialize('Alpha'))).address;
    expect(
      revertReason(() => demo.host.send({ from: user, to: proxy, signature: UPGRADE_TO_AND_CALL, args: [v2, FINALIZE] })),
    ).toBe(ProtocolErrorCode.NotSecurityAdmin);
  });
});

describe('DEMO-P5: unfinalized upgrades', () => {
  let proxy: Address;

  beforeEach(() => {
    proxy = demo.host.deploy(admin, (c) => new UpgradeableProxy(c, v1, initialize('Alpha'))).address;
    register(demo, proxy, v1, admin, [SAFE_MINT]);
    demo.host.send({ from: admin, to: proxy, signature: UPGRADE_TO_AND_CALL, args: [v2, new Uint8Array(0)] });
  });

  it('leaves the new identity unregistered', () => {
    expect(ledger(GATEKEEPER.registrationStatus, proxy, v2)).toBe(RegistrationStatus.UNREGISTERED);
    expect(revertReason(() => mint(proxy, approval(demo)))).toBe(ProtocolErrorCode.IntegrationNotRegistered);
  });

  it('cannot be finalized without a pre-authorization', () => {
    expect(revertReason(() => demo.host.send({ from: admin, to: proxy, signature: INTEGRATION.finalizeUpgrade }))).toBe(
      ProtocolErrorCode.UpgradeNotPreAuthorized,
    );
  });

  it('is repaired by a Protocol Admin override', () => {
    demo.host.send({
      from: demo.protocolAdmin,
      to: demo.router,
      signature: ROUTER.setIntegrationRegistrationStatus,
      args: [proxy, v2, RegistrationStatus.REGISTERED],
    });
    demo.host.send({
      from: demo.protocolAdmin,
      to: demo.router,
      signature: ROUTER.setIntegrationAuthorizationStatus,
      args: [proxy, v2, AuthorizationStatus.ACTIVE],
    });
    protect(proxy, [SAFE_MINT], [true]);

    expect(revertReason(() => mint(proxy, approval(demo, { allow: false })))).toBe(ProtocolErrorCode.ModuleDenied);
    mint(proxy, approval(demo));
    expect(balanceOf(proxy)).toBe(1n);
  });
});
