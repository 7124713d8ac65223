/**
 * Modweave Kernel — Log Sink Interface
 *
 * The kernel owns this contract and the LoadLogger that feeds it. Concrete
 * sinks (JSONL file, console, in-memory) live outside the kernel and are
 * injected at construction time, so kernel code never writes to disk or
 * stdout directly.
 */

import type { LoadEvent } from '../types/events.js';

/**
 * Receives load events.
 *
 * append() is called synchronously in the order events occur. Implementations
 * must not throw for ordinary I/O hiccups they can report another way.
 */
export interface LogSink {
  append(event: LoadEvent): void;
}

/** Fans one event out to several sinks. */
export class CompositeLogSink implements LogSink {
  private readonly sinks: ReadonlyArray<LogSink>;

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks;
  }

  append(event: LoadEvent): void {
    for (const sink of this.sinks) {
      sink.append(event);
    }
  }
}

/** Keeps events in memory. Used by tests and by callers that render a report. */
export class MemoryLogSink implements LogSink {
  readonly events: LoadEvent[] = [];

  append(event: LoadEvent): void {
    this.events.push(event);
  }

  /** Events with the given name, in arrival order. */
  named(event: string): ReadonlyArray<LoadEvent> {
    return this.events.filter((e) => e.event === event);
  }
}
