/**
 * Modweave Kernel — Load Logger
 *
 * Builds LoadEvents and forwards them to an injected LogSink.
 *
 * The sink is optional: when omitted (tests, embedded use) every call is a
 * no-op. The clock is injectable so tests can assert exact timestamps.
 */

import type { LoadEvent, LoadEventField, LogLevel } from '../types/events.js';
import type { LogSink } from './log-sink.js';

export interface LoadEventContext {
  readonly modId?: string | undefined;
  readonly fields?: Readonly<Record<string, LoadEventField>> | undefined;
}

export class LoadLogger {
  constructor(
    private readonly sink?: LogSink | undefined,
    private readonly now: () => Date = () => new Date(),
  ) {}

  debug(event: string, message: string, context?: LoadEventContext): void {
    this.record('debug', event, message, context);
  }

  info(event: string, message: string, context?: LoadEventContext): void {
    this.record('info', event, message, context);
  }

  warn(event: string, message: string, context?: LoadEventContext): void {
    this.record('warn', event, message, context);
  }

  error(event: string, message: string, context?: LoadEventContext): void {
    this.record('error', event, message, context);
  }

  private record(level: LogLevel, event: string, message: string, context?: LoadEventContext): void {
    if (this.sink === undefined) return;
    const entry: LoadEvent = {
      level,
      event,
      message,
      timestamp: this.now().toISOString(),
      modId: context?.modId,
      fields: context?.fields,
    };
    this.sink.append(entry);
  }
}
