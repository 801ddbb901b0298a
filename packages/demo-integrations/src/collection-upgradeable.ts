/**
 * Tollgate Demo Integrations — Upgradeable Collection
 *
 * DemoCollection's surface on a logic unit meant for any proxy kind
 * (UUPS, transparent or beacon). The proxy is initialized with
 * `initialize(admin, name)`.
 */

import { initializer } from '@tollgate/runtime-host';
import type { CallContext } from '@tollgate/runtime-host';
import { IntegrationUpgradeable } from '@tollgate/kernel';
import type { IntegrationOptions } from '@tollgate/kernel';
import { registerCollection } from './collection.js';
import { COLLECTION } from './signatures.js';

const NAME_KEY = 'collection.name';

export class DemoCollectionUpgradeable extends IntegrationUpgradeable {
  constructor(ctx: CallContext, options: IntegrationOptions) {
    super(ctx, options);

    this.expose(COLLECTION.initialize, 'nonpayable', (c, args) => {
      initializer(c);
      this.initializeIntegration(c, args.address(0));
      c.storage.set(NAME_KEY, args.string(1));
    });

    this.expose(COLLECTION.name, 'view', (c) => {
      const name = c.storage.get(NAME_KEY);
      return typeof name === 'string' ? name : '';
    });

    registerCollection(
      (signature, mutability, handler) => this.expose(signature, mutability, handler),
      (signature, mutability, handler) => this.exposeProtected(signature, mutability, handler),
    );
  }
}
