/**
 * Tollgate Runtime Host — File-backed Event Sink
 *
 * Appends each committed event as one JSONL line to `logs/events.jsonl`
 * through the injected StateIO. Synchronous: the line is written before
 * the transaction's `send` returns.
 */

import type { StateIO } from '../state/state-io.js';
import type { EventLogEntry } from '../types/event.js';
import type { EventSink } from './event-sink.js';

export const EVENTS_LOG = 'events.jsonl';

export class FileEventSink implements EventSink {
  constructor(private readonly stateIO: StateIO) {}

  append(entry: EventLogEntry): void {
    this.stateIO.appendLine(EVENTS_LOG, JSON.stringify(entry));
  }
}
