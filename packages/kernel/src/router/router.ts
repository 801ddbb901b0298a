/**
 * Tollgate Kernel — Router
 *
 * Stateless coordinator between Integrations, the GateKeeper and the
 * installed security modules. Runs behind an UpgradeableProxy; its storage
 * holds only the Protocol Admin, the GateKeeper reference and the module
 * set. Everything it knows about an Integration it reads from the
 * GateKeeper on demand.
 *
 * Collaborators that are not contracts (the credential verifier and the
 * decision logger) are fixed in the logic unit at construction, the way an
 * immutable would be, and therefore change only through an upgrade.
 */

import {
  bytesToHex,
  disableInitializers,
  encodeWithSelector,
  expectAddress,
  expectBool,
  expectBytes32,
  expectUint8,
  initializer,
  isRevert,
  RevertError,
  toBytes32,
  toSelector,
  UupsUpgradeable,
  ZERO_ADDRESS,
} from '@tollgate/runtime-host';
import type { Address, Bytes32, CallContext } from '@tollgate/runtime-host';
import { AdminTransfer, PROTOCOL_ADMIN } from '../admin/admin-transfer.js';
import {
  CREDENTIAL_LENGTH,
  GATEKEEPER,
  MARKER_LENGTH,
  MODULE,
  MODULE_ID_END,
  MODULE_ID_OFFSET,
  ROUTER,
  INTEGRATION,
  VALIDATOR_PARAMS,
} from '../configuration/protocol.js';
import { DecisionLogger, DispatchDecision } from '../logging/decision-log.js';
import type { DecisionEntry } from '../logging/decision-log.js';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';
import { AuthorizationStatus, toAuthorizationStatus } from '../types/status.js';
import type { CredentialVerifier } from './credential.js';

const GATEKEEPER_KEY = 'router.gateKeeper';

export interface RouterOptions {
  readonly verifier: CredentialVerifier;
  readonly decisionLogger?: DecisionLogger | undefined;
}

export interface DispatchRequest {
  readonly caller: Address;
  readonly implementation: Address;
  readonly value: bigint;
  readonly payloadLength: bigint;
  readonly invocation: Uint8Array;
}

export class Router extends UupsUpgradeable {
  private readonly admins = new AdminTransfer(PROTOCOL_ADMIN);
  private readonly verifier: CredentialVerifier;
  private readonly decisions: DecisionLogger;

  constructor(ctx: CallContext, options: RouterOptions) {
    super(ctx);
    this.verifier = options.verifier;
    this.decisions = options.decisionLogger ?? new DecisionLogger();
    disableInitializers(ctx.storage);

    this.admins.register((signature, mutability, handler) => this.expose(signature, mutability, handler));

    this.expose(ROUTER.initialize, 'nonpayable', (c, args) => {
      initializer(c);
      this.admins.initialize(c, args.address(0));
    });

    this.expose(ROUTER.completeRegistration, 'nonpayable', (c, args) =>
      this.completeRegistration(c, args.address(0), args.bytes(1)),
    );

    this.expose(ROUTER.dispatchProtectedCall, 'nonpayable', (c, args) =>
      this.dispatchProtectedCall(c, {
        caller: args.address(0),
        implementation: args.address(1),
        value: args.uint(2),
        payloadLength: args.uint(3),
        invocation: args.bytes(4),
      }),
    );

    // -- Module registry ----------------------------------------------------

    this.expose(ROUTER.installModule, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      return this.installModule(c, args.address(0));
    });

    this.expose(ROUTER.deprecateModule, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      const moduleId = args.bytes32(0);
      const module = c.storage.getAddress(moduleKey(moduleId));
      if (module === undefined) {
        throw protocolError(ProtocolErrorCode.ModuleNotInstalled, { moduleId });
      }
      c.storage.delete(moduleKey(moduleId));
      c.emit('ModuleDeprecated', { moduleId, module });
    });

    this.expose(ROUTER.moduleAddress, 'view', (c, args) => c.storage.getAddress(moduleKey(args.bytes32(0))) ?? ZERO_ADDRESS);

    // -- Ledger overrides ---------------------------------------------------

    this.expose(ROUTER.setIntegrationAuthorizationStatus, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      c.call(this.requireGateKeeper(c), GATEKEEPER.adminOverrideAuthorization, [args.address(0), args.address(1), args.uint8(2)]);
    });

    this.expose(ROUTER.setIntegrationRegistrationStatus, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      c.call(this.requireGateKeeper(c), GATEKEEPER.adminOverrideRegistration, [args.address(0), args.address(1), args.uint8(2)]);
    });

    this.expose(ROUTER.setIntegrationAuthorizationStatuses, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      c.call(this.requireGateKeeper(c), GATEKEEPER.adminOverrideAuthorizations, [
        args.addresses(0),
        args.addresses(1),
        args.uint8s(2),
      ]);
    });

    this.expose(ROUTER.setIntegrationRegistrationStatuses, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      c.call(this.requireGateKeeper(c), GATEKEEPER.adminOverrideRegistrations, [
        args.addresses(0),
        args.addresses(1),
        args.uint8s(2),
      ]);
    });

    // -- GateKeeper link ----------------------------------------------------

    this.expose(ROUTER.setGateKeeper, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      this.setGateKeeper(c, args.address(0));
    });

    this.expose(ROUTER.gateKeeper, 'view', (c) => c.storage.getAddress(GATEKEEPER_KEY) ?? ZERO_ADDRESS);
  }

  protected authorizeUpgrade(ctx: CallContext): void {
    this.admins.onlyAdmin(ctx);
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Complete the calling Integration's registration for `implementation`.
   *
   * @throws {RevertError} InvalidCredentialLength unless the credential is 65 bytes
   * @throws {RevertError} InvalidRegistrarCredential if the verifier rejects it
   * @throws {RevertError} RegistrationFailed if the GateKeeper refuses the transition
   */
  private completeRegistration(ctx: CallContext, implementation: Address, credential: Uint8Array): boolean {
    if (credential.length !== CREDENTIAL_LENGTH) {
      throw protocolError(ProtocolErrorCode.InvalidCredentialLength, { length: BigInt(credential.length) });
    }
    const integration = ctx.sender;
    const gateKeeper = this.requireGateKeeper(ctx);
    const admin = expectAddress(ctx.staticCall(integration, INTEGRATION.securityAdmin), INTEGRATION.securityAdmin);

    if (!this.verifier.verify({ integration, implementation, admin }, credential)) {
      throw protocolError(ProtocolErrorCode.InvalidRegistrarCredential, { integration, implementation, admin });
    }

    try {
      ctx.call(gateKeeper, GATEKEEPER.completeRegistration, [integration, implementation]);
    } catch (err) {
      if (!isRevert(err)) throw err;
      throw protocolError(
        ProtocolErrorCode.RegistrationFailed,
        { integration, implementation, reason: err.reason },
        err,
      );
    }
    return true;
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  /**
   * Route a protected call to the module named in its payload and return
   * the module's verdict. The payload is the last `payloadLength` bytes of
   * `invocation`; the calling Integration is `ctx.sender`.
   */
  private dispatchProtectedCall(ctx: CallContext, request: DispatchRequest): boolean {
    const { caller, implementation, value, invocation } = request;
    if (request.payloadLength < BigInt(MODULE_ID_END) || request.payloadLength > BigInt(invocation.length)) {
      throw protocolError(ProtocolErrorCode.PayloadTooShort, { length: request.payloadLength });
    }
    const payload = invocation.subarray(invocation.length - Number(request.payloadLength));
    const integration = ctx.sender;
    const gateKeeper = this.requireGateKeeper(ctx);

    const base = {
      timestamp: new Date(Number(ctx.timestamp) * 1000).toISOString(),
      integration,
      implementation,
      caller,
      selector: bytesToHex(invocation.subarray(0, MARKER_LENGTH)),
    };
    const decide = (decision: DispatchDecision, moduleId: Bytes32 | null, reason: string | null): void => {
      const entry: DecisionEntry = { ...base, decision, module_id: moduleId, reason };
      this.decisions.record(entry);
    };

    const status = toAuthorizationStatus(
      expectUint8(
        ctx.staticCall(gateKeeper, GATEKEEPER.authorizationStatus, [integration, implementation]),
        GATEKEEPER.authorizationStatus,
      ),
    );

    if (status === AuthorizationStatus.BYPASSED) {
      decide(DispatchDecision.Bypass, null, null);
      return true;
    }
    if (status === AuthorizationStatus.REVOKED) {
      decide(DispatchDecision.Deny, null, ProtocolErrorCode.IntegrationRevoked);
      throw protocolError(ProtocolErrorCode.IntegrationRevoked, { integration, implementation });
    }
    if (status !== AuthorizationStatus.ACTIVE) {
      decide(DispatchDecision.Deny, null, ProtocolErrorCode.IntegrationNotActive);
      throw protocolError(ProtocolErrorCode.IntegrationNotActive, { integration, implementation });
    }

    const moduleId = toBytes32(bytesToHex(payload.subarray(MODULE_ID_OFFSET, MODULE_ID_END)));
    const module = ctx.storage.getAddress(moduleKey(moduleId));
    if (module === undefined) {
      decide(DispatchDecision.Deny, moduleId, ProtocolErrorCode.ModuleNotInstalled);
      throw protocolError(ProtocolErrorCode.ModuleNotInstalled, { moduleId });
    }

    const marker = toSelector(bytesToHex(payload.subarray(0, MARKER_LENGTH)));
    const data = encodeWithSelector(marker, VALIDATOR_PARAMS, [integration, caller, implementation, value, payload, invocation]);

    let verdict: boolean;
    try {
      verdict = expectBool(ctx.callRaw(module, data), 'validator');
    } catch (err) {
      decide(DispatchDecision.Failed, moduleId, failureReason(err));
      throw err;
    }
    decide(verdict ? DispatchDecision.Permit : DispatchDecision.Deny, moduleId, verdict ? null : ProtocolErrorCode.ModuleDenied);
    return verdict;
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  private installModule(ctx: CallContext, module: Address): Bytes32 {
    let moduleId: Bytes32;
    let moduleRouter: Address;
    try {
      moduleId = expectBytes32(ctx.staticCall(module, MODULE.moduleId), MODULE.moduleId);
      moduleRouter = expectAddress(ctx.staticCall(module, MODULE.router), MODULE.router);
    } catch (err) {
      if (!isRevert(err)) throw err;
      throw protocolError(ProtocolErrorCode.InvalidModule, { module }, err);
    }
    if (moduleRouter !== ctx.address) {
      throw protocolError(ProtocolErrorCode.InvalidModule, { module, router: moduleRouter });
    }
    if (ctx.storage.getAddress(moduleKey(moduleId)) !== undefined) {
      throw protocolError(ProtocolErrorCode.ModuleAlreadyInstalled, { moduleId });
    }
    ctx.storage.set(moduleKey(moduleId), module);
    ctx.emit('ModuleInstalled', { moduleId, module });
    return moduleId;
  }

  private setGateKeeper(ctx: CallContext, gateKeeper: Address): void {
    if (ctx.storage.getAddress(GATEKEEPER_KEY) !== undefined) {
      throw protocolError(ProtocolErrorCode.GateKeeperAlreadySet);
    }
    if (!ctx.hasCode(gateKeeper)) {
      throw protocolError(ProtocolErrorCode.InvalidGateKeeper, { gateKeeper });
    }
    const boundRouter = expectAddress(ctx.staticCall(gateKeeper, GATEKEEPER.router), GATEKEEPER.router);
    if (boundRouter !== ctx.address) {
      throw protocolError(ProtocolErrorCode.InvalidGateKeeper, { gateKeeper, router: boundRouter });
    }
    ctx.storage.set(GATEKEEPER_KEY, gateKeeper);
    ctx.emit('GateKeeperSet', { gateKeeper });
  }

  private requireGateKeeper(ctx: CallContext): Address {
    const gateKeeper = ctx.storage.getAddress(GATEKEEPER_KEY);
    if (gateKeeper === undefined) {
      throw protocolError(ProtocolErrorCode.GateKeeperNotSet);
    }
    return gateKeeper;
  }
}

function moduleKey(moduleId: Bytes32): string {
  return `router.module:${moduleId}`;
}

function failureReason(err: unknown): string {
  if (err instanceof RevertError) return err.reason;
  return err instanceof Error ? err.name : 'unknown';
}
