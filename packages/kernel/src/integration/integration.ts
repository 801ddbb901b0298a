/**
 * Tollgate Kernel — Integration (standalone)
 *
 * Base for logic units that are deployed and called directly, never from
 * behind a proxy. The identity is (self, self). Protection flags live in the
 * contract's own storage.
 *
 * Deployment pre-registers the identity with the GateKeeper and makes the
 * deployer the Security Admin. The admin then completes registration with a
 * registrar credential via registerWithDefaults().
 */

import { Contract, expectBool } from '@tollgate/runtime-host';
import type { Address, CallContext, FunctionHandler, Selector, Storage } from '@tollgate/runtime-host';
import { AdminTransfer, SECURITY_ADMIN } from '../admin/admin-transfer.js';
import { GATEKEEPER, INTEGRATION, ROUTER } from '../configuration/protocol.js';
import { requireSameLength } from '../gatekeeper/status-ledger.js';
import { ProtocolErrorCode, protocolError } from '../types/errors.js';
import { guardProtectedCall, protectedSignature } from './protection.js';
import type { ProtectedMutability } from './protection.js';

export interface IntegrationOptions {
  readonly router: Address;
  readonly gateKeeper: Address;
}

export abstract class Integration extends Contract {
  readonly router: Address;
  readonly gateKeeper: Address;
  protected readonly admins = new AdminTransfer(SECURITY_ADMIN);

  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx);
    this.router = options.router;
    this.gateKeeper = options.gateKeeper;

    this.admins.register((signature, mutability, handler) => this.expose(signature, mutability, handler));
    this.admins.initialize(ctx, ctx.sender);
    ctx.call(this.gateKeeper, GATEKEEPER.preRegister, [this.address]);

    this.expose(INTEGRATION.registerWithDefaults, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      const selectors = args.bytes4s(1);
      expectBool(c.call(this.router, ROUTER.completeRegistration, [this.address, args.bytes(0)]), ROUTER.completeRegistration);
      if (selectors.length > 0) {
        this.writeFlags(c, selectors, selectors.map(() => true));
      }
    });

    this.expose(INTEGRATION.setFunctionProtectionStatus, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      this.writeFlags(c, args.bytes4s(0), args.bools(1));
    });

    this.expose(INTEGRATION.isFunctionProtectionEnabled, 'view', (c, args) =>
      isEnabled(c.storage, args.bytes4(0)),
    );

    this.expose(INTEGRATION.functionProtectionStatuses, 'view', (c, args) =>
      args.bytes4s(0).map((selector) => isEnabled(c.storage, selector)),
    );

    this.expose(INTEGRATION.self, 'view', () => [this.address, this.address]);
    this.expose(INTEGRATION.router, 'view', () => this.router);
    this.expose(INTEGRATION.gateKeeper, 'view', () => this.gateKeeper);
  }

  /**
   * Register a guarded operation. The handler runs only if the call is made
   * on this contract directly and, while the operation's flag is on, the
   * Router accepts its payload.
   */
  protected exposeProtected(signature: string, mutability: ProtectedMutability, handler: FunctionHandler): void {
    const parsed = protectedSignature(signature);
    this.expose(parsed.canonical, mutability, (c, args) => {
      if (c.address !== this.address) {
        throw protocolError(ProtocolErrorCode.DelegationNotPermitted, { context: c.address });
      }
      if (isEnabled(c.storage, parsed.selector)) {
        guardProtectedCall(c, { router: this.router, implementation: this.address }, args.bytes(args.length - 1));
      }
      return handler(c, args);
    });
  }

  private writeFlags(ctx: CallContext, selectors: Selector[], flags: boolean[]): void {
    requireSameLength(selectors.length, flags.length);
    selectors.forEach((selector, i) => {
      ctx.storage.set(flagKey(selector), flags[i] === true);
    });
    ctx.emit('FunctionProtectionStatusUpdated', {
      integration: this.address,
      implementation: this.address,
      selectors,
      flags,
    });
  }
}

function flagKey(selector: Selector): string {
  return `integration.protected:${selector}`;
}

function isEnabled(storage: Storage, selector: Selector): boolean {
  return storage.getBool(flagKey(selector));
}
