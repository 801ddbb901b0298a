/**
 * Tollgate Runtime Host — Journaled World State
 *
 * Holds per-address storage, deployed code and nonces, plus the events
 * emitted during the current transaction. Every mutation is appended to a
 * journal so it can be undone:
 *
 *   checkpoint() → revertTo(cp)   undo one call frame
 *   commit()                      make the transaction durable, hand back its events
 *   rollback()                    undo the whole transaction
 *
 * Invariant: outside a transaction the journal and the pending event list
 * are both empty.
 */

import type { Address } from '../types/address.js';
import type { Contract } from '../contract.js';
import type { HostEvent } from '../types/event.js';

export type StorageValue = string | number | bigint | boolean;

type JournalEntry =
  | { readonly kind: 'storage'; readonly address: Address; readonly key: string; readonly previous: StorageValue | undefined }
  | { readonly kind: 'code'; readonly address: Address }
  | { readonly kind: 'nonce'; readonly address: Address; readonly previous: number };

export interface Checkpoint {
  readonly journal: number;
  readonly events: number;
}

export class WorldState {
  private readonly slots: Map<Address, Map<string, StorageValue>> = new Map();
  private readonly code: Map<Address, Contract> = new Map();
  private readonly nonces: Map<Address, number> = new Map();
  private journal: JournalEntry[] = [];
  private events: HostEvent[] = [];

  read(address: Address, key: string): StorageValue | undefined {
    return this.slots.get(address)?.get(key);
  }

  /** Write a slot; `undefined` clears it. */
  write(address: Address, key: string, value: StorageValue | undefined): void {
    let slots = this.slots.get(address);
    if (slots === undefined) {
      slots = new Map();
      this.slots.set(address, slots);
    }
    this.journal.push({ kind: 'storage', address, key, previous: slots.get(key) });
    if (value === undefined) {
      slots.delete(key);
    } else {
      slots.set(key, value);
    }
  }

  codeAt(address: Address): Contract | undefined {
    return this.code.get(address);
  }

  setCode(address: Address, contract: Contract): void {
    this.journal.push({ kind: 'code', address });
    this.code.set(address, contract);
  }

  /** Return the current nonce for `address` and advance it. */
  useNonce(address: Address): number {
    const current = this.nonces.get(address) ?? 0;
    this.journal.push({ kind: 'nonce', address, previous: current });
    this.nonces.set(address, current + 1);
    return current;
  }

  emit(event: HostEvent): void {
    this.events.push(event);
  }

  checkpoint(): Checkpoint {
    return { journal: this.journal.length, events: this.events.length };
  }

  revertTo(checkpoint: Checkpoint): void {
    while (this.journal.length > checkpoint.journal) {
      const entry = this.journal.pop();
      if (entry !== undefined) this.undo(entry);
    }
    this.events.length = checkpoint.events;
  }

  commit(): ReadonlyArray<HostEvent> {
    const committed = this.events;
    this.journal = [];
    this.events = [];
    return committed;
  }

  rollback(): void {
    this.revertTo({ journal: 0, events: 0 });
  }

  private undo(entry: JournalEntry): void {
    switch (entry.kind) {
      case 'storage': {
        const slots = this.slots.get(entry.address);
        if (slots === undefined) return;
        if (entry.previous === undefined) {
          slots.delete(entry.key);
        } else {
          slots.set(entry.key, entry.previous);
        }
        return;
      }
      case 'code':
        this.code.delete(entry.address);
        return;
      case 'nonce':
        this.nonces.set(entry.address, entry.previous);
        return;
    }
  }
}
