/**
 * Modweave CLI — ConsoleLogSink
 *
 * Renders load events as one colored line each on stderr:
 *
 *   WARN  [better-swords] Patch target 'items/bow' not found
 */

import type { LoadEvent, LogLevel, LogSink } from '@modweave/kernel';
import { LOG_LEVEL_ORDER } from '@modweave/kernel';
import type { Printer } from './output.js';
import { levelColor, t } from './theme.js';

export function formatEventLine(event: Pick<LoadEvent, 'level' | 'message' | 'modId'>): string {
  const level = levelColor(event.level)(event.level.toUpperCase().padEnd(5));
  const mod = event.modId === undefined ? '' : `${t.blue(`[${event.modId}]`)} `;
  return `${level} ${mod}${event.message}`;
}

export class ConsoleLogSink implements LogSink {
  constructor(
    private readonly printer: Printer,
    private readonly minLevel: LogLevel = 'info',
  ) {}

  append(event: LoadEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;
    this.printer.err(formatEventLine(event));
  }
}
