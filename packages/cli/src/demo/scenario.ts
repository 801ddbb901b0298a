/**
 * Tollgate CLI — End-to-End Demo Scenario
 *
 * Stands up a full protocol on an in-process Host and walks one
 * integration of each hosting kind through registration, protection and
 * (for the proxy) an upgrade. Guarded calls are authorized by the
 * first-party signature module.
 *
 * A step that reverts is recorded with its reason and the scenario moves
 * on; anything else thrown aborts the run.
 */

import { generateKeyPairSync } from 'node:crypto';
import {
  encodeCall,
  expectAddress,
  expectUint,
  expectUint8,
  Host,
  isRevert,
  selectorOf,
  UpgradeableProxy,
  UPGRADE_TO_AND_CALL,
} from '@tollgate/runtime-host';
import type { Address, EventSink, Selector } from '@tollgate/runtime-host';
import {
  AuthorizationStatus,
  DecisionLogger,
  deployProtocol,
  Ed25519CredentialVerifier,
  GATEKEEPER,
  INTEGRATION,
  installSecurityModule,
  issueRegistrationCredential,
  RegistrationStatus,
  toAuthorizationStatus,
  toRegistrationStatus,
} from '@tollgate/kernel';
import type { DecisionSink, ProtocolDeployment } from '@tollgate/kernel';
import {
  COLLECTION,
  DemoCollection,
  DemoCollectionUpgradeable,
  DemoWallet,
  DemoWalletFactory,
  WALLET,
  WALLET_FACTORY,
} from '@tollgate/demo-integrations';
import { issueSecurePayload, SIGNATURE_MARKER, SIGNATURE_MODULE_ID, SignatureModule } from '@tollgate/module-signature';

/** How long each signed payload stays valid, in seconds. */
const PAYLOAD_TTL = 300n;

export interface DemoScenarioOptions {
  readonly eventSink?: EventSink | undefined;
  readonly decisionSink?: DecisionSink | undefined;
  /** Block time in seconds. Defaults to the wall clock. */
  readonly timestamp?: bigint | undefined;
}

export type StepOutcome = 'ok' | 'reverted';

export interface DemoStep {
  readonly title: string;
  readonly outcome: StepOutcome;
  /** Revert reason, or what the step left behind. */
  readonly detail: string;
}

export interface DemoReport {
  readonly deployment: ProtocolDeployment;
  readonly steps: ReadonlyArray<DemoStep>;
}

export function runDemoScenario(options: DemoScenarioOptions = {}): DemoReport {
  const host = new Host({ eventSink: options.eventSink, timestamp: options.timestamp });
  const registrar = generateKeyPairSync('ed25519');
  const signer = generateKeyPairSync('ed25519');
  const deployer = host.accountFor('deployer');
  const admin = host.accountFor('collection-admin');
  const alice = host.accountFor('alice');
  const steps: DemoStep[] = [];

  const step = (title: string, run: () => string): void => {
    try {
      steps.push({ title, outcome: 'ok', detail: run() });
    } catch (err) {
      if (!isRevert(err)) throw err;
      steps.push({ title, outcome: 'reverted', detail: err.reason });
    }
  };

  // -- Protocol -------------------------------------------------------------

  const deployment = deployProtocol(host, {
    deployer,
    protocolAdmin: host.accountFor('protocol-admin'),
    verifier: new Ed25519CredentialVerifier(registrar.publicKey),
    decisionLogger: new DecisionLogger(options.decisionSink),
  });
  installSecurityModule(host, deployment, deployer, (c) => new SignatureModule(c, deployment.router, signer.publicKey));
  steps.push({ title: 'Deploy Router, GateKeeper and signature module', outcome: 'ok', detail: `router ${deployment.router}` });

  const integrationOptions = { router: deployment.router, gateKeeper: deployment.gateKeeper };

  const statusOf = (integration: Address, implementation: Address): string => {
    const registration = toRegistrationStatus(
      expectUint8(
        host.read({ to: deployment.gateKeeper, signature: GATEKEEPER.registrationStatus, args: [integration, implementation] }),
        GATEKEEPER.registrationStatus,
      ),
    );
    const authorization = toAuthorizationStatus(
      expectUint8(
        host.read({ to: deployment.gateKeeper, signature: GATEKEEPER.authorizationStatus, args: [integration, implementation] }),
        GATEKEEPER.authorizationStatus,
      ),
    );
    return `${RegistrationStatus[registration]}/${AuthorizationStatus[authorization]}`;
  };

  const register = (integration: Address, implementation: Address, owner: Address, selectors: Selector[]): string => {
    const credential = issueRegistrationCredential({ integration, implementation, admin: owner }, registrar.privateKey);
    host.send({ from: owner, to: integration, signature: INTEGRATION.registerWithDefaults, args: [credential, selectors] });
    return statusOf(integration, implementation);
  };

  const signed = (
    integration: Address,
    implementation: Address,
    caller: Address,
    signature: string,
    args: bigint[],
    nonce: bigint,
  ): Uint8Array =>
    issueSecurePayload(
      {
        integration,
        caller,
        implementation,
        signature,
        args,
        marker: SIGNATURE_MARKER,
        moduleId: SIGNATURE_MODULE_ID,
        expiry: host.timestamp + PAYLOAD_TTL,
        nonce,
      },
      signer.privateKey,
    );

  const balanceOf = (collection: Address, owner: Address): bigint =>
    expectUint(host.read({ to: collection, signature: COLLECTION.balanceOf, args: [owner] }), COLLECTION.balanceOf);

  // -- Standalone collection ------------------------------------------------

  const collection = host.deploy(admin, (c) => new DemoCollection(c, integrationOptions)).address;
  steps.push({ title: 'Deploy DemoCollection', outcome: 'ok', detail: statusOf(collection, collection) });

  step('Register DemoCollection and protect safeMint', () =>
    register(collection, collection, admin, [selectorOf(COLLECTION.safeMint)]),
  );

  step('Mint with a 63-byte payload', () => {
    host.send({ from: alice, to: collection, signature: COLLECTION.safeMint, args: [1n, new Uint8Array(63)] });
    return `balance ${balanceOf(collection, alice)}`;
  });

  const mintPayload = signed(collection, collection, alice, COLLECTION.safeMint, [1n], 0n);
  step('Mint with a signed payload', () => {
    host.send({ from: alice, to: collection, signature: COLLECTION.safeMint, args: [1n, mintPayload] });
    return `balance ${balanceOf(collection, alice)}`;
  });

  step('Replay the same payload', () => {
    host.send({ from: alice, to: collection, signature: COLLECTION.safeMint, args: [1n, mintPayload] });
    return `balance ${balanceOf(collection, alice)}`;
  });

  // -- Upgradeable collection behind a UUPS proxy ---------------------------

  const v1 = host.deploy(admin, (c) => new DemoCollectionUpgradeable(c, integrationOptions)).address;
  const v2 = host.deploy(admin, (c) => new DemoCollectionUpgradeable(c, integrationOptions)).address;
  const v3 = host.deploy(admin, (c) => new DemoCollectionUpgradeable(c, integrationOptions)).address;
  const proxy = host.deploy(
    admin,
    (c) => new UpgradeableProxy(c, v1, encodeCall(COLLECTION.initialize, [admin, 'Tollgate Demo'])),
  ).address;

  step('Register DemoCollectionUpgradeable behind a UUPS proxy', () =>
    register(proxy, v1, admin, [selectorOf(COLLECTION.safeMint)]),
  );

  step('Upgrade with preAuthorizeNewImplementation and finalizeUpgrade', () => {
    host.send({ from: admin, to: proxy, signature: INTEGRATION.preAuthorizeNewImplementation, args: [v2] });
    host.send({ from: admin, to: proxy, signature: UPGRADE_TO_AND_CALL, args: [v2, encodeCall(INTEGRATION.finalizeUpgrade)] });
    return statusOf(proxy, v2);
  });

  step('Upgrade again without finalizing', () => {
    host.send({ from: admin, to: proxy, signature: UPGRADE_TO_AND_CALL, args: [v3, new Uint8Array(0)] });
    return statusOf(proxy, v3);
  });

  step('Mint on the unfinalized proxy', () => {
    const payload = signed(proxy, v3, alice, COLLECTION.safeMint, [1n], 0n);
    host.send({ from: alice, to: proxy, signature: COLLECTION.safeMint, args: [1n, payload] });
    return `balance ${balanceOf(proxy, alice)}`;
  });

  // -- Clone wallet ---------------------------------------------------------

  const walletLogic = host.deploy(deployer, (c) => new DemoWallet(c, integrationOptions)).address;
  const factory = host.deploy(deployer, (c) => new DemoWalletFactory(c, walletLogic)).address;
  const wallet = expectAddress(
    host.send({ from: alice, to: factory, signature: WALLET_FACTORY.createWallet, args: [alice] }).returnValue,
    WALLET_FACTORY.createWallet,
  );
  steps.push({ title: 'Create a clone wallet for alice', outcome: 'ok', detail: statusOf(wallet, walletLogic) });

  step('Register the wallet and set its limit with a signed payload', () => {
    register(wallet, walletLogic, alice, [selectorOf(WALLET.setLimit)]);
    const payload = signed(wallet, walletLogic, alice, WALLET.setLimit, [500n], 0n);
    host.send({ from: alice, to: wallet, signature: WALLET.setLimit, args: [500n, payload] });
    return `limit ${expectUint(host.read({ to: wallet, signature: WALLET.limit }), WALLET.limit)}`;
  });

  return { deployment, steps };
}
