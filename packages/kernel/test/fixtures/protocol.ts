/**
 * Shared protocol deployment and test contracts for the kernel suites.
 */

import { generateKeyPairSync } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import {
  Host,
  hexToBytes,
  initializer,
  MemoryEventSink,
  RevertError,
  selectorOf,
  ZERO_ADDRESS,
} from '@tollgate/runtime-host';
import type { Address, Bytes32, CallContext, Receipt, Selector } from '@tollgate/runtime-host';
import { MIN_PAYLOAD_LENGTH, MODULE_ID_END, MODULE_ID_OFFSET, INTEGRATION } from '../../src/configuration/protocol.js';
import { deployProtocol as deployTollgate, installSecurityModule } from '../../src/deployment/deploy.js';
import { Integration } from '../../src/integration/integration.js';
import type { IntegrationOptions } from '../../src/integration/integration.js';
import { IntegrationUpgradeable } from '../../src/integration/integration-upgradeable.js';
import { DecisionLogger, MemoryDecisionSink } from '../../src/logging/decision-log.js';
import { SecurityModule } from '../../src/modules/security-module.js';
import { Ed25519CredentialVerifier, issueRegistrationCredential } from '../../src/router/credential.js';

export const T0 = 1_700_000_000n;
export const T0_ISO = '2023-11-14T22:13:20.000Z';

// ---------------------------------------------------------------------------
// Security module
// ---------------------------------------------------------------------------

/**
 * Accepts a payload whose first module-data byte is 1. Also carries a
 * validator that crashes and one that reverts.
 */
export class VerdictModule extends SecurityModule {
  readonly allowMarker: Selector;
  readonly crashMarker: Selector;
  readonly refuseMarker: Selector;

  constructor(ctx: CallContext, router: Address, version = '1.0.0') {
    super(ctx, router, 'verdict', version);
    this.allowMarker = this.exposeValidator('checkVerdict', (c, request) => {
      c.storage.set('calls', c.storage.getBigInt('calls') + 1n);
      c.storage.set('lastCaller', request.caller);
      c.storage.set('lastValue', request.value);
      return request.payload[MODULE_ID_END] === 1;
    });
    this.crashMarker = this.exposeValidator('crash', () => {
      throw new Error('validator crashed');
    });
    this.refuseMarker = this.exposeValidator('refuse', () => {
      throw new RevertError('Refused', { code: 7n });
    });
    this.expose('calls()', 'view', (c) => c.storage.getBigInt('calls'));
    this.expose('lastCall()', 'view', (c) => [
      c.storage.getAddress('lastCaller') ?? ZERO_ADDRESS,
      c.storage.getBigInt('lastValue'),
    ]);
  }
}

/** Payload for `marker` on `moduleId`; byte 36 carries the verdict. */
export function payload(
  marker: Selector,
  moduleId: Bytes32,
  options: { allow?: boolean; length?: number } = {},
): Uint8Array {
  const out = new Uint8Array(options.length ?? MIN_PAYLOAD_LENGTH);
  out.set(hexToBytes(marker), 0);
  out.set(hexToBytes(moduleId), MODULE_ID_OFFSET);
  out[MODULE_ID_END] = options.allow === false ? 0 : 1;
  return out;
}

// ---------------------------------------------------------------------------
// Integrations
// ---------------------------------------------------------------------------

export const INCREMENT = 'increment(bytes)';
export const DEPOSIT = 'deposit(bytes)';
export const INCREMENT_SELECTOR = selectorOf(INCREMENT);
export const DEPOSIT_SELECTOR = selectorOf(DEPOSIT);

export class GuardedCounter extends Integration {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);
    this.exposeProtected(INCREMENT, 'nonpayable', (c) => {
      c.storage.set('count', c.storage.getBigInt('count') + 1n);
    });
    this.exposeProtected(DEPOSIT, 'payable', (c) => {
      c.storage.set('deposits', c.storage.getBigInt('deposits') + c.value);
    });
    this.expose('count()', 'view', (c) => c.storage.getBigInt('count'));
    this.expose('deposits()', 'view', (c) => c.storage.getBigInt('deposits'));
  }
}

/** Declares a guarded operation without a trailing payload parameter. */
export class MisdeclaredIntegration extends Integration {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);
    this.exposeProtected('increment(uint256)', 'nonpayable', () => undefined);
  }
}

export class GuardedCounterUpgradeable extends IntegrationUpgradeable {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);
    this.expose('initialize(address)', 'nonpayable', (c, args) => {
      initializer(c);
      this.initializeIntegration(c, args.address(0));
    });
    this.exposeProtected(INCREMENT, 'nonpayable', (c) => {
      c.storage.set('count', c.storage.getBigInt('count') + 1n);
    });
    this.expose('count()', 'view', (c) => c.storage.getBigInt('count'));
    this.expose('version()', 'view', () => this.version());
  }

  protected version(): bigint {
    return 1n;
  }
}

export class GuardedCounterUpgradeableV2 extends GuardedCounterUpgradeable {
  protected override version(): bigint {
    return 2n;
  }
}

// ---------------------------------------------------------------------------
// Protocol deployment
// ---------------------------------------------------------------------------

export interface Protocol {
  readonly host: Host;
  readonly events: MemoryEventSink;
  readonly decisions: MemoryDecisionSink;
  readonly registrarKey: KeyObject;
  readonly deployer: Address;
  readonly protocolAdmin: Address;
  readonly routerImplementation: Address;
  readonly router: Address;
  readonly gateKeeper: Address;
  readonly module: VerdictModule;
}

/**
 * Router behind an UpgradeableProxy, its GateKeeper, and one installed
 * VerdictModule. The event sink is cleared afterwards.
 */
export function deployProtocol(): Protocol {
  const events = new MemoryEventSink();
  const decisions = new MemoryDecisionSink();
  const host = new Host({ eventSink: events, timestamp: T0 });
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const deployer = host.accountFor('deployer');

  const deployment = deployTollgate(host, {
    deployer,
    protocolAdmin: host.accountFor('protocol-admin'),
    verifier: new Ed25519CredentialVerifier(publicKey),
    decisionLogger: new DecisionLogger(decisions),
  });
  const module = installSecurityModule(host, deployment, deployer, (c) => new VerdictModule(c, deployment.router));

  events.clear();
  return { ...deployment, host, events, decisions, registrarKey: privateKey, deployer, module };
}

export function credentialFor(
  protocol: Protocol,
  integration: Address,
  implementation: Address,
  admin: Address,
): Uint8Array {
  return issueRegistrationCredential({ integration, implementation, admin }, protocol.registrarKey);
}

/** Complete registration for (integration, implementation) and enable `selectors`. */
export function register(
  protocol: Protocol,
  integration: Address,
  implementation: Address,
  admin: Address,
  selectors: ReadonlyArray<Selector>,
): Receipt {
  return protocol.host.send({
    from: admin,
    to: integration,
    signature: INTEGRATION.registerWithDefaults,
    args: [credentialFor(protocol, integration, implementation, admin), selectors],
  });
}

// ---------------------------------------------------------------------------
// Revert helpers
// ---------------------------------------------------------------------------

export function catchRevert(fn: () => unknown): RevertError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RevertError) return err;
    throw err;
  }
  throw new Error('expected a revert');
}

export function revertReason(fn: () => unknown): string {
  return catchRevert(fn).reason;
}
