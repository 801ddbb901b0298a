/**
 * Tollgate Runtime Host — Initializer Guard
 *
 * Logic units that run behind a proxy cannot use their constructor to set
 * up proxy storage. They expose an initializer instead and guard it here.
 * The logic unit's own storage is sealed from its constructor with
 * disableInitializers() so nobody can initialize the bare implementation.
 */

import type { CallContext } from '../contract.js';
import { HostErrorCode, RevertError } from '../errors.js';
import type { Storage } from '../state/storage.js';

const INITIALIZED_KEY = 'initializable.version';

/** Version marker written by disableInitializers(). */
const INITIALIZERS_DISABLED = Number.MAX_SAFE_INTEGER;

/**
 * Claim initialization for the current storage context. Runs once.
 *
 * @throws {RevertError} AlreadyInitialized if it already ran, or initializers are disabled
 */
export function initializer(ctx: CallContext): void {
  const current = ctx.storage.getNumber(INITIALIZED_KEY);
  if (current >= 1) {
    throw new RevertError(HostErrorCode.AlreadyInitialized, { address: ctx.address, version: BigInt(current) });
  }
  ctx.storage.set(INITIALIZED_KEY, 1);
  ctx.emit('Initialized', { version: 1n });
}

export function disableInitializers(storage: Storage): void {
  storage.set(INITIALIZED_KEY, INITIALIZERS_DISABLED);
}
