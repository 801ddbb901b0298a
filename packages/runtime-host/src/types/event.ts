/**
 * Tollgate Runtime Host — Event Types
 */

import type { AbiValue } from '../abi/types.js';
import type { Address } from './address.js';

/** An event emitted by contract code during a transaction. */
export interface HostEvent {
  /** The emitting storage context (the proxy, when code runs behind one). */
  readonly address: Address;
  readonly name: string;
  readonly fields: Readonly<Record<string, AbiValue>>;
}

/**
 * A committed event as written to an EventSink.
 *
 * Field values are JSON-safe: bigint becomes a decimal string and bytes
 * become `0x` hex.
 */
export interface EventLogEntry {
  /** ULID, unique per entry. */
  readonly event_id: string;
  readonly tx_id: string;
  /** ISO 8601 commit time. */
  readonly timestamp: string;
  readonly address: Address;
  readonly name: string;
  readonly fields: Readonly<Record<string, JsonValue>>;
}

export type JsonValue = string | number | boolean | null | ReadonlyArray<JsonValue>;
