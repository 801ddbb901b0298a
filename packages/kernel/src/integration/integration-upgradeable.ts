/**
 * Tollgate Kernel — Integration (proxy-hosted)
 *
 * Base for logic units that run behind a proxy: UUPS, transparent, beacon
 * or minimal clone. The identity is (proxy, logic unit). Protection flags
 * live in the GateKeeper under that identity, so they belong to one
 * specific implementation and do not survive an upgrade on their own.
 *
 * Upgrading without losing registration:
 *
 *   preAuthorizeNewImplementation(next)
 *   upgradeToAndCall(next, finalizeUpgrade())
 *
 * The subclass initializer must call initializeIntegration().
 */

import {
  disableInitializers,
  expectBool,
  expectBools,
  UupsUpgradeable,
} from '@tollgate/runtime-host';
import type { Address, CallContext, FunctionHandler, Selector } from '@tollgate/runtime-host';
import { AdminTransfer, SECURITY_ADMIN } from '../admin/admin-transfer.js';
import { GATEKEEPER, INTEGRATION, ROUTER } from '../configuration/protocol.js';
import { guardProtectedCall, protectedSignature } from './protection.js';
import type { ProtectedMutability } from './protection.js';
import type { IntegrationOptions } from './integration.js';

export abstract class IntegrationUpgradeable extends UupsUpgradeable {
  readonly router: Address;
  readonly gateKeeper: Address;
  protected readonly admins = new AdminTransfer(SECURITY_ADMIN);

  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx);
    this.router = options.router;
    this.gateKeeper = options.gateKeeper;
    disableInitializers(ctx.storage);

    this.admins.register((signature, mutability, handler) => this.expose(signature, mutability, handler));

    this.expose(INTEGRATION.registerWithDefaults, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      const selectors = args.bytes4s(1);
      expectBool(c.call(this.router, ROUTER.completeRegistration, [this.address, args.bytes(0)]), ROUTER.completeRegistration);
      if (selectors.length > 0) {
        c.call(this.gateKeeper, GATEKEEPER.updateFlags, [this.address, selectors, selectors.map(() => true)]);
      }
    });

    this.expose(INTEGRATION.setFunctionProtectionStatus, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      c.call(this.gateKeeper, GATEKEEPER.updateFlags, [this.address, args.bytes4s(0), args.bools(1)]);
    });

    this.expose(INTEGRATION.isFunctionProtectionEnabled, 'view', (c, args) => this.isEnabled(c, args.bytes4(0)));

    this.expose(INTEGRATION.functionProtectionStatuses, 'view', (c, args) =>
      expectBools(
        c.staticCall(this.gateKeeper, GATEKEEPER.functionProtectionStatuses, [c.address, this.address, args.bytes4s(0)]),
        GATEKEEPER.functionProtectionStatuses,
      ),
    );

    this.expose(INTEGRATION.self, 'view', (c) => [c.address, this.address]);
    this.expose(INTEGRATION.router, 'view', () => this.router);
    this.expose(INTEGRATION.gateKeeper, 'view', () => this.gateKeeper);

    // -- Upgrades -----------------------------------------------------------

    this.expose(INTEGRATION.preAuthorizeNewImplementation, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      c.call(this.gateKeeper, GATEKEEPER.preAuthorizeUpgrade, [this.address, args.address(0)]);
    });

    this.expose(INTEGRATION.finalizeUpgrade, 'nonpayable', (c) => {
      this.admins.onlyAdmin(c);
      c.call(this.gateKeeper, GATEKEEPER.acceptUpgrade, [this.address]);
    });
  }

  /**
   * Set the Security Admin and pre-register (proxy, logic unit). Call once,
   * from the subclass initializer.
   *
   * @throws {RevertError} InvalidAdmin for the zero address
   */
  protected initializeIntegration(ctx: CallContext, admin: Address): void {
    this.admins.initialize(ctx, admin);
    ctx.call(this.gateKeeper, GATEKEEPER.preRegister, [this.address]);
  }

  protected authorizeUpgrade(ctx: CallContext): void {
    this.admins.onlyAdmin(ctx);
  }

  /**
   * Register a guarded operation. While its flag is on in the GateKeeper,
   * the handler runs only if the Router accepts the payload.
   */
  protected exposeProtected(signature: string, mutability: ProtectedMutability, handler: FunctionHandler): void {
    const parsed = protectedSignature(signature);
    this.expose(parsed.canonical, mutability, (c, args) => {
      if (this.isEnabled(c, parsed.selector)) {
        guardProtectedCall(c, { router: this.router, implementation: this.address }, args.bytes(args.length - 1));
      }
      return handler(c, args);
    });
  }

  /**
   * @throws {RevertError} IntegrationNotRegistered if (proxy, logic unit) was never pre-registered
   */
  private isEnabled(ctx: CallContext, selector: Selector): boolean {
    return expectBool(
      ctx.staticCall(this.gateKeeper, GATEKEEPER.isFunctionProtectionEnabled, [this.address, selector]),
      GATEKEEPER.isFunctionProtectionEnabled,
    );
  }
}
