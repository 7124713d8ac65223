/**
 * Modweave Kernel — Load Event Types
 *
 * Every noteworthy step of discovery, resolution and patching is reported as
 * a structured LoadEvent. The kernel defines the shape; sinks in the runtime
 * host and CLI decide where events go.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoadEventField = string | number | boolean | null | ReadonlyArray<string>;

export interface LoadEvent {
  readonly level: LogLevel;
  /** Dotted event name, e.g. `mod.duplicate_skipped`, `patch.failed`. */
  readonly event: string;
  readonly message: string;
  /** ISO 8601. */
  readonly timestamp: string;
  readonly modId?: string | undefined;
  readonly fields?: Readonly<Record<string, LoadEventField>> | undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}
