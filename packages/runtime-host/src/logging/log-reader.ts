/**
 * Modweave Runtime Host — LogReader
 *
 * Pure functions for reading load-events.jsonl with dedupe-on-read.
 *
 * readLog() guarantees:
 *   - every valid JSONL event is parsed; malformed lines are dropped and
 *     counted in parseErrors
 *   - events are deduplicated by event_id, first seen wins
 *   - content not ending in '\n' has its last (partial) line dropped and
 *     flagged
 *   - more than one timestamp regression in file order sets outOfOrder
 *   - output is sorted by (timestamp asc, event_id asc)
 *
 * No I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

import type { LogLevel } from '@modweave/kernel';
import { LOG_LEVEL_ORDER, isLogLevel } from '@modweave/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One persisted load event, as written by FileLogSink. */
export interface LoadEventRecord {
  /** 26-character ULID. The deduplication key. */
  readonly event_id: string;
  readonly timestamp?: string | undefined;
  readonly level?: LogLevel | undefined;
  readonly event?: string | undefined;
  readonly mod_id?: string | undefined;
  readonly message?: string | undefined;
  readonly fields: Readonly<Record<string, unknown>>;
}

export interface LogReadStats {
  /** Non-empty lines processed, before filtering. */
  totalLines: number;
  /** Events in the output, after dedupe. */
  parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped for a JSON parse error or missing event_id. */
  parseErrors: number;
  /** Raw content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
  /** More than one timestamp regression in file order. One is tolerated as clock skew. */
  outOfOrder: boolean;
}

export interface LogReadResult {
  events: ReadonlyArray<LoadEventRecord>;
  stats: LogReadStats;
}

export interface LogFilter {
  /** Drop events below this level. */
  readonly minLevel?: LogLevel | undefined;
  readonly modId?: string | undefined;
  /** Keep only events whose name starts with this prefix, e.g. `patch.`. */
  readonly eventPrefix?: string | undefined;
  /** Keep only the last N events after the other filters. */
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toRecord(parsed: unknown): LoadEventRecord | undefined {
  if (!isRecord(parsed)) return undefined;
  const eventId = parsed['event_id'];
  if (typeof eventId !== 'string') return undefined;
  const level = parsed['level'];
  const fields = parsed['fields'];
  return {
    event_id: eventId,
    timestamp: optionalString(parsed['timestamp']),
    level: typeof level === 'string' && isLogLevel(level) ? level : undefined,
    event: optionalString(parsed['event']),
    mod_id: optionalString(parsed['mod_id']),
    message: optionalString(parsed['message']),
    fields: isRecord(fields) ? fields : {},
  };
}

/**
 * Parse, deduplicate, and sort JSONL log content.
 *
 * @param rawContent - Raw JSONL text of the log file
 */
export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  // File order, before sorting.
  const ordered: LoadEventRecord[] = [];

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const record = toRecord(parsed);
    if (record === undefined) {
      parseErrors++;
      continue;
    }
    if (seen.has(record.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(record.event_id);
    ordered.push(record);
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const record of ordered) {
    if (previous !== undefined && record.timestamp !== undefined && record.timestamp < previous) {
      regressions++;
    }
    previous = record.timestamp ?? previous;
  }

  const sorted = [...ordered].sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lines.length,
      parsedEvents: ordered.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

/** Apply a LogFilter to events from readLog(). Order is preserved. */
export function filterEvents(
  events: ReadonlyArray<LoadEventRecord>,
  filter: LogFilter,
): LoadEventRecord[] {
  const minOrder = filter.minLevel === undefined ? 0 : LOG_LEVEL_ORDER[filter.minLevel];
  const kept = events.filter((e) => {
    if (e.level !== undefined && LOG_LEVEL_ORDER[e.level] < minOrder) return false;
    if (filter.modId !== undefined && e.mod_id !== filter.modId) return false;
    if (filter.eventPrefix !== undefined && !(e.event ?? '').startsWith(filter.eventPrefix)) return false;
    return true;
  });
  return filter.limit === undefined ? kept : kept.slice(Math.max(0, kept.length - filter.limit));
}
