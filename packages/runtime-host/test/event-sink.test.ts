/**
 * Tollgate Runtime Host — Event Sink Tests
 *
 *   EVS-U1: FileEventSink writes one JSONL line per committed event
 *   EVS-U2: bigint and bytes fields are converted to strings
 *   EVS-U3: reverted transactions write nothing
 */

import { describe, it, expect } from 'vitest';
import { Host } from '../src/host.js';
import { toJsonFields } from '../src/logging/event-sink.js';
import { EVENTS_LOG, FileEventSink } from '../src/logging/file-event-sink.js';
import { readLog } from '../src/logging/log-reader.js';
import { MemoryStateIO } from '../src/state/state-io.js';
import { accountAddress } from '../src/types/address.js';
import { Counter } from './fixtures/contracts.js';

describe('FileEventSink', () => {
  it('EVS-U1: appends committed events to events.jsonl', () => {
    const io = new MemoryStateIO();
    const host = new Host({ eventSink: new FileEventSink(io), timestamp: 1_700_000_000n });
    const alice = host.accountFor('alice');
    const counter = host.deploy(alice, (ctx) => new Counter(ctx)).address;

    host.send({ from: alice, to: counter, signature: 'increment()' });
    host.send({ from: alice, to: counter, signature: 'increment()' });

    expect(io.readLines(EVENTS_LOG)).toHaveLength(2);
    const { entries, stats } = readLog(io.readLogRaw(EVENTS_LOG));
    expect(stats.parseErrors).toBe(0);
    expect(entries.map((e) => e['name'])).toEqual(['Incremented', 'Incremented']);
    expect(entries.map((e) => e['fields'])).toEqual(expect.arrayContaining([{ count: '1' }, { count: '2' }]));
    expect(entries.map((e) => e['address'])).toEqual([counter, counter]);
  });

  it('EVS-U3: a reverted transaction leaves the log untouched', () => {
    const io = new MemoryStateIO();
    const host = new Host({ eventSink: new FileEventSink(io) });
    const alice = host.accountFor('alice');
    const counter = host.deploy(alice, (ctx) => new Counter(ctx)).address;

    expect(() => host.send({ from: alice, to: counter, signature: 'fail()' })).toThrow('reverted: Boom');
    expect(io.readLogRaw(EVENTS_LOG)).toBe('');
  });
});

describe('toJsonFields', () => {
  it('EVS-U2: renders bigint as decimal and bytes as hex', () => {
    const holder = accountAddress('holder');
    expect(
      toJsonFields({ amount: 10n ** 20n, payload: Uint8Array.of(0xde, 0xad), holder, flags: [true, false], tier: 2 }),
    ).toEqual({ amount: '100000000000000000000', payload: '0xdead', holder, flags: [true, false], tier: 2 });
  });
});
