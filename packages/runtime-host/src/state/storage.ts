/**
 * Tollgate Runtime Host — Contract Storage View
 *
 * A Storage instance is bound to one address and one call frame. Contract
 * code never touches WorldState directly; it reads and writes through the
 * view handed to it in its CallContext. Views opened in a static frame
 * reject every write.
 */

import { HostErrorCode, RevertError } from '../errors.js';
import { isAddress } from '../types/address.js';
import type { Address } from '../types/address.js';
import type { StorageValue, WorldState } from './world-state.js';

export class Storage {
  constructor(
    private readonly world: WorldState,
    readonly address: Address,
    private readonly readOnly: boolean,
  ) {}

  get(key: string): StorageValue | undefined {
    return this.world.read(this.address, key);
  }

  set(key: string, value: StorageValue): void {
    this.assertWritable(key);
    this.world.write(this.address, key, value);
  }

  delete(key: string): void {
    this.assertWritable(key);
    this.world.write(this.address, key, undefined);
  }

  getAddress(key: string): Address | undefined {
    const value = this.get(key);
    return typeof value === 'string' && isAddress(value) ? value : undefined;
  }

  getBool(key: string): boolean {
    return this.get(key) === true;
  }

  getNumber(key: string): number {
    const value = this.get(key);
    return typeof value === 'number' ? value : 0;
  }

  getBigInt(key: string): bigint {
    const value = this.get(key);
    return typeof value === 'bigint' ? value : 0n;
  }

  private assertWritable(key: string): void {
    if (this.readOnly) {
      throw new RevertError(HostErrorCode.StaticStateChange, { address: this.address, key });
    }
  }
}
