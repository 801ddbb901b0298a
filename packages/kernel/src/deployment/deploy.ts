/**
 * Tollgate Kernel — Protocol Deployment
 *
 * Stands up a complete protocol on a Host in the order the contracts
 * depend on each other:
 *
 *   1. Router logic unit
 *   2. UpgradeableProxy in front of it, initialized with the Protocol Admin
 *   3. GateKeeper bound to the Router proxy
 *   4. Router.setGateKeeper, sent by the Protocol Admin
 *
 * Security modules are deployed and installed afterwards with
 * installSecurityModule().
 */

import { encodeCall, UpgradeableProxy } from '@tollgate/runtime-host';
import type { Address, ContractFactory, Host } from '@tollgate/runtime-host';
import { ROUTER } from '../configuration/protocol.js';
import { GateKeeper } from '../gatekeeper/gatekeeper.js';
import type { DecisionLogger } from '../logging/decision-log.js';
import type { SecurityModule } from '../modules/security-module.js';
import type { CredentialVerifier } from '../router/credential.js';
import { Router } from '../router/router.js';

export interface DeploymentOptions {
  /** Account that sends the deployment transactions. */
  readonly deployer: Address;
  readonly protocolAdmin: Address;
  readonly verifier: CredentialVerifier;
  readonly decisionLogger?: DecisionLogger | undefined;
}

export interface ProtocolDeployment {
  readonly protocolAdmin: Address;
  readonly routerImplementation: Address;
  /** The Router proxy. Integrations and modules bind to this address. */
  readonly router: Address;
  readonly gateKeeper: Address;
}

export function deployProtocol(host: Host, options: DeploymentOptions): ProtocolDeployment {
  const { deployer, protocolAdmin } = options;
  const routerImplementation = host.deploy(
    deployer,
    (ctx) => new Router(ctx, { verifier: options.verifier, decisionLogger: options.decisionLogger }),
  ).address;
  const router = host.deploy(
    deployer,
    (ctx) => new UpgradeableProxy(ctx, routerImplementation, encodeCall(ROUTER.initialize, [protocolAdmin])),
  ).address;
  const gateKeeper = host.deploy(deployer, (ctx) => new GateKeeper(ctx, router)).address;
  host.send({ from: protocolAdmin, to: router, signature: ROUTER.setGateKeeper, args: [gateKeeper] });
  return { protocolAdmin, routerImplementation, router, gateKeeper };
}

/** Deploy a security module from `deployer` and install it on the Router. */
export function installSecurityModule<T extends SecurityModule>(
  host: Host,
  deployment: ProtocolDeployment,
  deployer: Address,
  factory: ContractFactory<T>,
): T {
  const module = host.deploy(deployer, factory).contract;
  host.send({ from: deployment.protocolAdmin, to: deployment.router, signature: ROUTER.installModule, args: [module.address] });
  return module;
}
