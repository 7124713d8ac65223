/**
 * Modweave Runtime Host — FileLogSink
 *
 * Implements the kernel LogSink interface. This is the only place that
 * writes load events to disk: one JSONL line per event in
 * `<home>/logs/load-events.jsonl`, via the injected StateIO.
 *
 * The sink is synchronous: the line is written before append() returns, so
 * the log is complete up to the point where a fatal resolution error aborts
 * the run.
 */

import type { LoadEvent, LogLevel, LogSink } from '@modweave/kernel';
import { LOG_LEVEL_ORDER } from '@modweave/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const LOAD_EVENTS_LOG = 'load-events.jsonl';

export interface FileLogSinkOptions {
  /** Events below this level are not written. Default: debug (write everything). */
  readonly minLevel?: LogLevel | undefined;
  readonly logfilename?: string | undefined;
}

export class FileLogSink implements LogSink {
  private readonly minLevel: LogLevel;
  private readonly logfilename: string;

  constructor(
    private readonly stateIO: StateIO,
    options: FileLogSinkOptions = {},
  ) {
    this.minLevel = options.minLevel ?? 'debug';
    this.logfilename = options.logfilename ?? LOAD_EVENTS_LOG;
  }

  append(event: LoadEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;
    const eventMs = Date.parse(event.timestamp);
    const line = JSON.stringify({
      event_id: ulid(Number.isNaN(eventMs) ? Date.now() : eventMs),
      timestamp: event.timestamp,
      level: event.level,
      event: event.event,
      mod_id: event.modId ?? null,
      message: event.message,
      fields: event.fields ?? {},
    });
    this.stateIO.appendLine(this.logfilename, line);
  }
}
