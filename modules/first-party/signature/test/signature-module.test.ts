/**
 * Tollgate Signature Module Tests
 *
 *   SIG-U1: a payload signed for the exact invocation is accepted once
 *   SIG-U2: expired, out-of-sequence and wrongly signed payloads are denied
 *   SIG-U3: a payload is bound to its caller, arguments and value
 *   SIG-U4: any payload length other than 116 bytes reverts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import type { KeyPairKeyObjectResult } from 'node:crypto';
import { concat, Host, isRevert, selectorOf } from '@tollgate/runtime-host';
import type { Address, CallContext, Receipt } from '@tollgate/runtime-host';
import {
  deployProtocol,
  Ed25519CredentialVerifier,
  Integration,
  INTEGRATION,
  installSecurityModule,
  issueRegistrationCredential,
  ProtocolErrorCode,
} from '@tollgate/kernel';
import type { IntegrationOptions } from '@tollgate/kernel';
import { NONCE_OF, SIGNATURE_MARKER, SIGNATURE_MODULE_ID } from '../src/manifest.js';
import { issueSecurePayload } from '../src/payload.js';
import type { SecurePayloadRequest } from '../src/payload.js';
import { SignatureModule } from '../src/signature-module.js';

const T0 = 1_700_000_000n;
const STORE = 'store(uint256,bytes)';

class Vault extends Integration {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);
    this.exposeProtected(STORE, 'payable', (c, args) => {
      c.storage.set('stored', args.uint(0));
    });
    this.expose('stored()', 'view', (c) => c.storage.getBigInt('stored'));
  }
}

let host: Host;
let signer: KeyPairKeyObjectResult;
let module: SignatureModule;
let vault: Address;
let user: Address;

beforeEach(() => {
  host = new Host({ timestamp: T0 });
  const registrar = generateKeyPairSync('ed25519');
  signer = generateKeyPairSync('ed25519');
  const deployer = host.accountFor('deployer');
  const deployment = deployProtocol(host, {
    deployer,
    protocolAdmin: host.accountFor('protocol-admin'),
    verifier: new Ed25519CredentialVerifier(registrar.publicKey),
  });
  module = installSecurityModule(
    host,
    deployment,
    deployer,
    (c) => new SignatureModule(c, deployment.router, signer.publicKey),
  );

  const admin = host.accountFor('vault-admin');
  user = host.accountFor('user');
  vault = host.deploy(admin, (c) => new Vault(c, { router: deployment.router, gateKeeper: deployment.gateKeeper }))
    .address;
  const credential = issueRegistrationCredential({ integration: vault, implementation: vault, admin }, registrar.privateKey);
  host.send({ from: admin, to: vault, signature: INTEGRATION.registerWithDefaults, args: [credential, [selectorOf(STORE)]] });
});

function signed(overrides: Partial<SecurePayloadRequest> = {}, key = signer.privateKey): Uint8Array {
  return issueSecurePayload(
    {
      integration: vault,
      caller: user,
      implementation: vault,
      signature: STORE,
      args: [42n],
      marker: SIGNATURE_MARKER,
      moduleId: SIGNATURE_MODULE_ID,
      expiry: T0 + 60n,
      nonce: 0n,
      ...overrides,
    },
    key,
  );
}

function store(amount: bigint, payload: Uint8Array, options: { from?: Address; value?: bigint } = {}): Receipt {
  return host.send({
    from: options.from ?? user,
    to: vault,
    signature: STORE,
    args: [amount, payload],
    value: options.value ?? 0n,
  });
}

function storeFails(amount: bigint, payload: Uint8Array, options: { from?: Address; value?: bigint } = {}): string {
  try {
    store(amount, payload, options);
  } catch (err) {
    if (isRevert(err)) return err.reason;
    throw err;
  }
  throw new Error('expected a revert');
}

function nonceOf(caller: Address = user): unknown {
  return host.read({ to: module.address, signature: NONCE_OF, args: [vault, caller] });
}

function stored(): unknown {
  return host.read({ to: vault, signature: 'stored()' });
}

describe('SIG-U1: accepted payloads', () => {
  it('answers to the published marker and module id', () => {
    expect(module.marker).toBe(SIGNATURE_MARKER);
    expect(module.moduleId).toBe(SIGNATURE_MODULE_ID);
  });

  it('runs the operation and consumes the nonce', () => {
    const receipt = store(42n, signed());

    expect(stored()).toBe(42n);
    expect(nonceOf()).toBe(1n);
    expect(receipt.events.filter((e) => e.name === 'NonceConsumed')).toEqual([
      { address: module.address, name: 'NonceConsumed', fields: { integration: vault, caller: user, nonce: 0n } },
    ]);
  });

  it('refuses to accept the same payload twice', () => {
    store(42n, signed());
    expect(storeFails(42n, signed())).toBe(ProtocolErrorCode.ModuleDenied);
    expect(nonceOf()).toBe(1n);
  });

  it('accepts the next nonce', () => {
    store(42n, signed());
    store(42n, signed({ nonce: 1n }));
    expect(nonceOf()).toBe(2n);
  });
});

describe('SIG-U2: denied payloads', () => {
  it('denies a payload past its expiry', () => {
    expect(storeFails(42n, signed({ expiry: T0 - 1n }))).toBe(ProtocolErrorCode.ModuleDenied);

    const payload = signed();
    host.warp(61n);
    expect(storeFails(42n, payload)).toBe(ProtocolErrorCode.ModuleDenied);
  });

  it('accepts a payload in the second of its expiry', () => {
    store(42n, signed({ expiry: T0 }));
    expect(stored()).toBe(42n);
  });

  it('denies an out-of-sequence nonce', () => {
    expect(storeFails(42n, signed({ nonce: 1n }))).toBe(ProtocolErrorCode.ModuleDenied);
    expect(nonceOf()).toBe(0n);
  });

  it('denies a payload signed by another key', () => {
    const other = generateKeyPairSync('ed25519');
    expect(storeFails(42n, signed({}, other.privateKey))).toBe(ProtocolErrorCode.ModuleDenied);
  });
});

describe('SIG-U3: binding', () => {
  it('denies a payload presented with different arguments', () => {
    expect(storeFails(43n, signed())).toBe(ProtocolErrorCode.ModuleDenied);
    expect(stored()).toBe(0n);
  });

  it('denies a payload presented by another caller', () => {
    const mallory = host.accountFor('mallory');
    expect(storeFails(42n, signed(), { from: mallory })).toBe(ProtocolErrorCode.ModuleDenied);
  });

  it('binds the call value', () => {
    expect(storeFails(42n, signed(), { value: 5n })).toBe(ProtocolErrorCode.ModuleDenied);
    store(42n, signed({ value: 5n }), { value: 5n });
    expect(stored()).toBe(42n);
  });

  it('keeps a separate nonce per caller', () => {
    const other = host.accountFor('other-user');
    store(42n, signed());
    store(42n, signed({ caller: other }), { from: other });

    expect(nonceOf()).toBe(1n);
    expect(nonceOf(other)).toBe(1n);
  });
});

describe('SIG-U4: payload length', () => {
  it('reverts on a truncated payload', () => {
    expect(storeFails(42n, signed().subarray(0, 115))).toBe(ProtocolErrorCode.InvalidPayloadLength);
  });

  it('reverts on an extended payload', () => {
    expect(storeFails(42n, concat([signed(), new Uint8Array(4)]))).toBe(ProtocolErrorCode.InvalidPayloadLength);
  });
});
