/**
 * Tollgate Runtime Host — Event Sink
 *
 * Injection point for committed contract events. The host hands every event
 * of a successful transaction to the sink after commit; events of a
 * reverted transaction never reach it.
 *
 * append() is synchronous: the entry is durable before `send` returns.
 */

import { bytesToHex } from '../types/address.js';
import type { AbiScalar, AbiValue } from '../abi/types.js';
import { isScalarValue } from '../abi/types.js';
import type { EventLogEntry, JsonValue } from '../types/event.js';

export interface EventSink {
  append(entry: EventLogEntry): void;
}

/** Keeps entries in memory. For tests and embedded use. */
export class MemoryEventSink implements EventSink {
  private readonly entries: EventLogEntry[] = [];

  append(entry: EventLogEntry): void {
    this.entries.push(entry);
  }

  all(): ReadonlyArray<EventLogEntry> {
    return this.entries;
  }

  /** Entries with the given event name, oldest first. */
  named(name: string): EventLogEntry[] {
    return this.entries.filter((e) => e.name === name);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/** Drops every entry. The default when a host is built without a sink. */
export class NullEventSink implements EventSink {
  append(_entry: EventLogEntry): void {
    // discard
  }
}

// ---------------------------------------------------------------------------
// JSON conversion
// ---------------------------------------------------------------------------

export function toJsonFields(fields: Readonly<Record<string, AbiValue>>): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = toJsonValue(value);
  }
  return out;
}

export function toJsonValue(value: AbiValue): JsonValue {
  if (!isScalarValue(value)) return value.map(scalarToJson);
  return scalarToJson(value);
}

function scalarToJson(value: AbiScalar): JsonValue {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return bytesToHex(value);
  return value;
}
