/**
 * Tollgate Kernel — GateKeeper
 *
 * The ledger of record for every Integration identity. Writes are
 * self-authenticated: an Integration can only touch entries keyed by its own
 * address (the calling contract), and only the Router may complete a registration or
 * override a status. Reads are open to anyone and have no side effects.
 *
 * The Router reference is fixed at deployment.
 */

import { Contract, ZERO_ADDRESS } from '@tollgate/runtime-host';
import type { Address, CallContext, Selector } from '@tollgate/runtime-host';
import { GATEKEEPER } from '../configuration/protocol.js';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';
import { RegistrationStatus } from '../types/status.js';
import type { AuthorizationStatus } from '../types/status.js';
import { StatusLedger } from './status-ledger.js';
import type { StatusChange } from './status-ledger.js';

export class GateKeeper extends Contract {
  constructor(
    ctx: CallContext,
    readonly router: Address,
  ) {
    super(ctx);

    // -- Integration-keyed writes ------------------------------------------

    this.expose(GATEKEEPER.preRegister, 'nonpayable', (c, args) => {
      const implementation = args.address(0);
      ledger(c).markPending(c.sender, implementation);
      emitRegistration(c, c.sender, implementation, RegistrationStatus.PENDING);
    });

    this.expose(GATEKEEPER.updateFlags, 'nonpayable', (c, args) => {
      const implementation = args.address(0);
      const selectors = args.bytes4s(1);
      const flags = args.bools(2);
      ledger(c).setFlags(c.sender, implementation, selectors, flags);
      c.emit('FunctionProtectionStatusUpdated', {
        integration: c.sender,
        implementation,
        selectors,
        flags,
      });
    });

    this.expose(GATEKEEPER.isFunctionProtectionEnabled, 'view', (c, args) =>
      this.isFunctionProtectionEnabled(c, args.address(0), args.bytes4(1)),
    );

    this.expose(GATEKEEPER.preAuthorizeUpgrade, 'nonpayable', (c, args) => {
      const current = args.address(0);
      const next = args.address(1);
      ledger(c).preAuthorizeUpgrade(c.sender, current, next);
      c.emit('ImplementationUpgradePreAuthorized', {
        integration: c.sender,
        currentImplementation: current,
        newImplementation: next,
      });
    });

    this.expose(GATEKEEPER.acceptUpgrade, 'nonpayable', (c, args) => {
      const next = args.address(0);
      const accepted = ledger(c).acceptUpgrade(c.sender, next);
      c.emit('ImplementationUpgradeAccepted', {
        integration: c.sender,
        previousImplementation: accepted.previousImplementation,
        newImplementation: next,
      });
      emitRegistration(c, c.sender, next, RegistrationStatus.REGISTERED);
      emitAuthorization(c, c.sender, next, accepted.authorization);
    });

    // -- Router-only writes -------------------------------------------------

    this.expose(GATEKEEPER.completeRegistration, 'nonpayable', (c, args) => {
      this.onlyRouter(c);
      const integration = args.address(0);
      const implementation = args.address(1);
      const book = ledger(c);
      book.completeRegistration(integration, implementation);
      emitRegistration(c, integration, implementation, RegistrationStatus.REGISTERED);
      emitAuthorization(c, integration, implementation, book.authorization(integration, implementation));
    });

    this.expose(GATEKEEPER.adminOverrideAuthorization, 'nonpayable', (c, args) => {
      this.onlyRouter(c);
      const changes = ledger(c).overrideAuthorizations([args.address(0)], [args.address(1)], [args.uint8(2)]);
      emitAuthorizations(c, changes);
    });

    this.expose(GATEKEEPER.adminOverrideRegistration, 'nonpayable', (c, args) => {
      this.onlyRouter(c);
      const changes = ledger(c).overrideRegistrations([args.address(0)], [args.address(1)], [args.uint8(2)]);
      emitRegistrations(c, changes);
    });

    this.expose(GATEKEEPER.adminOverrideAuthorizations, 'nonpayable', (c, args) => {
      this.onlyRouter(c);
      const changes = ledger(c).overrideAuthorizations(args.addresses(0), args.addresses(1), args.uint8s(2));
      emitAuthorizations(c, changes);
    });

    this.expose(GATEKEEPER.adminOverrideRegistrations, 'nonpayable', (c, args) => {
      this.onlyRouter(c);
      const changes = ledger(c).overrideRegistrations(args.addresses(0), args.addresses(1), args.uint8s(2));
      emitRegistrations(c, changes);
    });

    // -- Open reads ---------------------------------------------------------

    this.expose(GATEKEEPER.functionProtectionStatus, 'view', (c, args) =>
      ledger(c).flag(args.address(0), args.address(1), args.bytes4(2)),
    );

    this.expose(GATEKEEPER.functionProtectionStatuses, 'view', (c, args) => {
      const book = ledger(c);
      const integration = args.address(0);
      const implementation = args.address(1);
      return args.bytes4s(2).map((selector) => book.flag(integration, implementation, selector));
    });

    this.expose(GATEKEEPER.registrationStatus, 'view', (c, args) =>
      ledger(c).registration(args.address(0), args.address(1)),
    );

    this.expose(GATEKEEPER.authorizationStatus, 'view', (c, args) =>
      ledger(c).authorization(args.address(0), args.address(1)),
    );

    this.expose(GATEKEEPER.upgradePreAuthorization, 'view', (c, args) =>
      ledger(c).preAuthorizedFrom(args.address(0), args.address(1)) ?? ZERO_ADDRESS,
    );

    this.expose(GATEKEEPER.router, 'view', () => this.router);
  }

  /**
   * Flag lookup for the calling Integration.
   *
   * @throws {RevertError} IntegrationNotRegistered if the identity never pre-registered
   */
  private isFunctionProtectionEnabled(ctx: CallContext, implementation: Address, selector: Selector): boolean {
    const book = ledger(ctx);
    if (book.registration(ctx.sender, implementation) === RegistrationStatus.UNREGISTERED) {
      throw protocolError(ProtocolErrorCode.IntegrationNotRegistered, { integration: ctx.sender, implementation });
    }
    return book.flag(ctx.sender, implementation, selector);
  }

  private onlyRouter(ctx: CallContext): void {
    if (ctx.sender !== this.router) {
      throw protocolError(ProtocolErrorCode.NotRouter, { account: ctx.sender });
    }
  }
}

function ledger(ctx: CallContext): StatusLedger {
  return new StatusLedger(ctx.storage);
}

function emitRegistration(ctx: CallContext, integration: Address, implementation: Address, status: RegistrationStatus): void {
  ctx.emit('RegistrationStatusUpdated', { integration, implementation, status });
}

function emitAuthorization(
  ctx: CallContext,
  integration: Address,
  implementation: Address,
  status: AuthorizationStatus,
): void {
  ctx.emit('AuthorizationStatusUpdated', { integration, implementation, status });
}

function emitRegistrations(ctx: CallContext, changes: ReadonlyArray<StatusChange<RegistrationStatus>>): void {
  for (const change of changes) {
    emitRegistration(ctx, change.integration, change.implementation, change.status);
  }
}

function emitAuthorizations(ctx: CallContext, changes: ReadonlyArray<StatusChange<AuthorizationStatus>>): void {
  for (const change of changes) {
    emitAuthorization(ctx, change.integration, change.implementation, change.status);
  }
}
