/**
 * Tollgate Demo Integrations — Clone Wallets
 *
 * DemoWalletFactory stamps out one MinimalClone of a shared DemoWallet
 * logic unit per owner. Each clone is its own integration identity,
 * (clone, wallet logic unit), registered and protected separately.
 *
 * A clone's implementation can never change, so the UUPS upgrade entry
 * point inherited from IntegrationUpgradeable always reverts on a clone.
 */

import { Contract, cloneOf, initializer, ZERO_ADDRESS } from '@tollgate/runtime-host';
import type { Address, CallContext } from '@tollgate/runtime-host';
import { IntegrationUpgradeable } from '@tollgate/kernel';
import type { IntegrationOptions } from '@tollgate/kernel';
import { DemoErrorCode, demoError } from './errors.js';
import { WALLET, WALLET_FACTORY } from './signatures.js';

const LIMIT_KEY = 'wallet.limit';

export class DemoWallet extends IntegrationUpgradeable {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);

    this.expose(WALLET.initialize, 'nonpayable', (c, args) => {
      initializer(c);
      this.initializeIntegration(c, args.address(0));
    });

    // Owner-only on top of the payload check.
    this.exposeProtected(WALLET.setLimit, 'nonpayable', (c, args) => {
      this.admins.onlyAdmin(c);
      const limit = args.uint(0);
      c.storage.set(LIMIT_KEY, limit);
      c.emit('LimitChanged', { limit });
    });

    this.expose(WALLET.limit, 'view', (c) => c.storage.getBigInt(LIMIT_KEY));
  }
}

export class DemoWalletFactory extends Contract {
  constructor(
    ctx: CallContext,
    readonly implementation: Address,
  ) {
    super(ctx);

    this.expose(WALLET_FACTORY.createWallet, 'nonpayable', (c, args) => this.createWallet(c, args.address(0)));
    this.expose(WALLET_FACTORY.walletOf, 'view', (c, args) => c.storage.getAddress(walletKey(args.address(0))) ?? ZERO_ADDRESS);
    this.expose(WALLET_FACTORY.implementation, 'view', () => this.implementation);
  }

  /**
   * @throws {RevertError} WalletExists if `owner` already has a wallet
   * @throws {RevertError} InvalidAdmin for the zero owner
   */
  private createWallet(ctx: CallContext, owner: Address): Address {
    if (ctx.storage.getAddress(walletKey(owner)) !== undefined) {
      throw demoError(DemoErrorCode.WalletExists, { owner });
    }
    const wallet = cloneOf(ctx, this.implementation);
    ctx.call(wallet, WALLET.initialize, [owner]);
    ctx.storage.set(walletKey(owner), wallet);
    ctx.emit('WalletCreated', { owner, wallet });
    return wallet;
  }
}

function walletKey(owner: Address): string {
  return `factory.wallet:${owner}`;
}
