/**
 * Tollgate Demo Integrations — Collection
 *
 * A minimal mintable collection. `safeMint(quantity, payload)` credits the
 * caller with `quantity` tokens and is the guarded operation: once its
 * protection flag is on, every mint needs a payload the Router accepts.
 *
 * The surface is shared by the standalone DemoCollection and the
 * proxy-hosted DemoCollectionUpgradeable through registerCollection().
 */

import type { CallContext, FunctionHandler, Storage } from '@tollgate/runtime-host';
import { Integration } from '@tollgate/kernel';
import type { ExposeFn, IntegrationOptions, ProtectedMutability } from '@tollgate/kernel';
import { DemoErrorCode, demoError } from './errors.js';
import { COLLECTION } from './signatures.js';

export type ExposeProtectedFn = (signature: string, mutability: ProtectedMutability, handler: FunctionHandler) => void;

const TOTAL_SUPPLY_KEY = 'collection.totalSupply';

function balanceKey(owner: string): string {
  return `collection.balance:${owner}`;
}

export function balanceOf(storage: Storage, owner: string): bigint {
  return storage.getBigInt(balanceKey(owner));
}

export function totalSupply(storage: Storage): bigint {
  return storage.getBigInt(TOTAL_SUPPLY_KEY);
}

/**
 * @throws {RevertError} ZeroQuantity
 */
function mint(ctx: CallContext, quantity: bigint): void {
  if (quantity === 0n) {
    throw demoError(DemoErrorCode.ZeroQuantity);
  }
  const firstTokenId = totalSupply(ctx.storage);
  ctx.storage.set(balanceKey(ctx.sender), balanceOf(ctx.storage, ctx.sender) + quantity);
  ctx.storage.set(TOTAL_SUPPLY_KEY, firstTokenId + quantity);
  ctx.emit('Minted', { to: ctx.sender, firstTokenId, quantity });
}

export function registerCollection(expose: ExposeFn, exposeProtected: ExposeProtectedFn): void {
  exposeProtected(COLLECTION.safeMint, 'nonpayable', (c, args) => {
    mint(c, args.uint(0));
  });
  expose(COLLECTION.balanceOf, 'view', (c, args) => balanceOf(c.storage, args.address(0)));
  expose(COLLECTION.totalSupply, 'view', (c) => totalSupply(c.storage));
}

/** Standalone collection. The deployer becomes its Security Admin. */
export class DemoCollection extends Integration {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);
    registerCollection(
      (signature, mutability, handler) => this.expose(signature, mutability, handler),
      (signature, mutability, handler) => this.exposeProtected(signature, mutability, handler),
    );
  }
}
