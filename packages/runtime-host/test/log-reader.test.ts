/**
 * Modweave Runtime Host — LogReader Tests
 *
 *   LOGR-U1: valid JSONL events are parsed; malformed lines are counted
 *   LOGR-U2: duplicate event_ids are dropped (first seen wins)
 *   LOGR-U3: a partial trailing line is detected and dropped
 *   LOGR-U4: more than one timestamp regression sets outOfOrder
 *   LOGR-U5: output is sorted by (timestamp asc, event_id asc)
 *   LOGR-U6: empty input returns zero stats
 *   LOGR-F:  filterEvents by level, mod, event prefix and limit
 *
 * Tests are pure: no I/O, no clock dependency.
 */

import { describe, it, expect } from 'vitest';
import { filterEvents, readLog } from '../src/logging/log-reader.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function line(id: string, timestamp: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ event_id: id, timestamp, ...extra });
}

function jsonl(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

const T1 = '2026-01-01T00:00:01.000Z';
const T2 = '2026-01-01T00:00:02.000Z';
const T3 = '2026-01-01T00:00:03.000Z';

// ---------------------------------------------------------------------------
// readLog
// ---------------------------------------------------------------------------

describe('readLog', () => {
  it('LOGR-U1: parses valid lines and counts malformed ones', () => {
    const result = readLog(jsonl(line('A', T1), '{not json', JSON.stringify({ no_id: true }), '', line('B', T2)));
    expect(result.stats).toMatchObject({ totalLines: 4, parsedEvents: 2, parseErrors: 2 });
    expect(result.events.map((e) => e.event_id)).toEqual(['A', 'B']);
  });

  it('LOGR-U1b: copies known fields and defaults fields to an empty object', () => {
    const [event] = readLog(jsonl(line('A', T1, { level: 'warn', event: 'patch.failed', mod_id: 'm' }))).events;
    expect(event).toEqual({
      event_id: 'A',
      timestamp: T1,
      level: 'warn',
      event: 'patch.failed',
      mod_id: 'm',
      message: undefined,
      fields: {},
    });
  });

  it('LOGR-U1c: an unknown level is dropped from the record', () => {
    const [event] = readLog(jsonl(line('A', T1, { level: 'loud' }))).events;
    expect(event?.level).toBeUndefined();
  });

  it('LOGR-U2: duplicates are dropped, first seen wins', () => {
    const result = readLog(jsonl(line('A', T1, { message: 'first' }), line('A', T1, { message: 'second' })));
    expect(result.stats.duplicates).toBe(1);
    expect(result.events).toHaveLength(1);
    expect(result.events[0]?.message).toBe('first');
  });

  it('LOGR-U3: a partial trailing line is dropped and flagged', () => {
    const result = readLog(line('A', T1) + '\n{"event_id":"B","times');
    expect(result.stats.partialTrailingLine).toBe(true);
    expect(result.stats.parseErrors).toBe(0);
    expect(result.events.map((e) => e.event_id)).toEqual(['A']);
  });

  it('LOGR-U4: one regression is tolerated, two set outOfOrder', () => {
    expect(readLog(jsonl(line('A', T2), line('B', T1), line('C', T3))).stats.outOfOrder).toBe(false);
    expect(readLog(jsonl(line('A', T3), line('B', T2), line('C', T1))).stats.outOfOrder).toBe(true);
  });

  it('LOGR-U5: sorts by timestamp then event_id', () => {
    const result = readLog(jsonl(line('C', T2), line('B', T1), line('A', T2)));
    expect(result.events.map((e) => e.event_id)).toEqual(['B', 'A', 'C']);
  });

  it('LOGR-U6: empty input returns zero stats', () => {
    expect(readLog('')).toEqual({
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    });
  });
});

// ---------------------------------------------------------------------------
// filterEvents
// ---------------------------------------------------------------------------

describe('filterEvents', () => {
  const { events } = readLog(
    jsonl(
      line('A', T1, { level: 'debug', event: 'patch.applied', mod_id: 'a' }),
      line('B', T2, { level: 'warn', event: 'patch.operation_failed', mod_id: 'b' }),
      line('C', T3, { level: 'error', event: 'resolution.failed' }),
    ),
  );
  const ids = (filter: Parameters<typeof filterEvents>[1]): string[] =>
    filterEvents(events, filter).map((e) => e.event_id);

  it('LOGR-F1: minLevel drops lower levels', () => {
    expect(ids({ minLevel: 'warn' })).toEqual(['B', 'C']);
  });

  it('LOGR-F2: modId keeps only that mod', () => {
    expect(ids({ modId: 'a' })).toEqual(['A']);
  });

  it('LOGR-F3: eventPrefix matches event names', () => {
    expect(ids({ eventPrefix: 'patch.' })).toEqual(['A', 'B']);
  });

  it('LOGR-F4: limit keeps the most recent events', () => {
    expect(ids({ limit: 2 })).toEqual(['B', 'C']);
    expect(ids({ limit: 0 })).toEqual([]);
  });
});
