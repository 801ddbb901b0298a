/**
 * Tollgate Kernel — Dispatch Decision Log
 *
 * Every protected-call dispatch produces exactly one decision entry,
 * whatever the outcome. Entries go straight to the injected sink at the
 * moment the decision is made; they are not part of the transaction
 * journal, so a request that later rolls back still leaves its decision on
 * record.
 *
 * With no sink injected, record() is a no-op.
 */

import { ulid } from '@tollgate/runtime-host';
import type { Address, StateIO } from '@tollgate/runtime-host';

export enum DispatchDecision {
  /** The module accepted the payload. */
  Permit = 'Permit',
  /** The module rejected the payload, or the identity may not be dispatched. */
  Deny = 'Deny',
  /** The identity is BYPASSED; no module was consulted. */
  Bypass = 'Bypass',
  /** The module call itself failed. */
  Failed = 'Failed',
}

export interface DecisionEntry {
  /** ISO 8601 block time of the dispatch. */
  readonly timestamp: string;
  readonly integration: Address;
  readonly implementation: Address;
  readonly caller: Address;
  /** Selector of the guarded operation being invoked. */
  readonly selector: string;
  readonly decision: DispatchDecision;
  /** Module id from the payload, or null when none was consulted. */
  readonly module_id: string | null;
  /** Failure or denial reason code; null for Permit and Bypass. */
  readonly reason: string | null;
}

export interface DecisionSink {
  append(entry: DecisionEntry): void;
}

export class DecisionLogger {
  constructor(private readonly sink?: DecisionSink) {}

  record(entry: DecisionEntry): void {
    this.sink?.append(entry);
  }
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export class MemoryDecisionSink implements DecisionSink {
  readonly entries: DecisionEntry[] = [];

  append(entry: DecisionEntry): void {
    this.entries.push(entry);
  }
}

export const DECISIONS_LOG = 'decisions.jsonl';

/** Appends each entry, with a ULID event_id, to `logs/decisions.jsonl`. */
export class JsonlDecisionSink implements DecisionSink {
  constructor(private readonly stateIO: StateIO) {}

  append(entry: DecisionEntry): void {
    this.stateIO.appendLine(DECISIONS_LOG, JSON.stringify({ event_id: ulid(), ...entry }));
  }
}
