/**
 * modweave log — Query the load-event log
 *
 * Reads `<home>/logs/load-events.jsonl` with dedupe-on-read and prints the
 * matching events, oldest first.
 */

import { Command, Option } from 'commander';
import type { LogLevel } from '@modweave/kernel';
import { FileStateIO, LOAD_EVENTS_LOG, filterEvents, readLog, resolveModweaveHome } from '@modweave/runtime-host';
import { formatEventLine } from '../console-log-sink.js';
import { consolePrinter } from '../output.js';
import type { Printer } from '../output.js';
import { t } from '../theme.js';

export interface LogOptions {
  home?: string | undefined;
  level?: LogLevel | undefined;
  mod?: string | undefined;
  event?: string | undefined;
  limit?: string | undefined;
  json?: boolean | undefined;
}

/** @returns Process exit code */
export function runLog(options: LogOptions, printer: Printer): number {
  const limit = options.limit === undefined ? 50 : Number.parseInt(options.limit, 10);
  if (!Number.isInteger(limit) || limit < 0) {
    printer.err(t.red(`--limit must be a non-negative integer, got "${options.limit ?? ''}"`));
    return 1;
  }

  const home = resolveModweaveHome({ home: options.home, create: false });
  const { events, stats } = readLog(new FileStateIO(home).readLogRaw(LOAD_EVENTS_LOG));
  const selected = filterEvents(events, {
    minLevel: options.level,
    modId: options.mod,
    eventPrefix: options.event,
    limit,
  });

  if (options.json === true) {
    printer.out(JSON.stringify(selected, null, 2));
    return 0;
  }

  if (selected.length === 0) {
    printer.out(t.muted('(no events)'));
  }
  for (const e of selected) {
    const line = formatEventLine({ level: e.level ?? 'info', message: e.message ?? '', modId: e.mod_id });
    printer.out(`${t.dim(e.timestamp ?? '')} ${t.muted((e.event ?? '').padEnd(28))} ${line}`);
  }
  if (stats.duplicates > 0 || stats.parseErrors > 0) {
    printer.err(t.amber(`${stats.duplicates} duplicate(s), ${stats.parseErrors} unreadable line(s) skipped`));
  }
  return 0;
}

export const logCommand = new Command('log')
  .description('Query the load-event log')
  .option('--home <dir>', 'Modweave home (default: $MODWEAVE_HOME or ~/.modweave)')
  .addOption(new Option('--level <level>', 'Minimum level').choices(['debug', 'info', 'warn', 'error']))
  .option('--mod <id>', 'Only events for this mod')
  .option('--event <prefix>', 'Only events whose name starts with this prefix, e.g. patch.')
  .option('--limit <n>', 'Show at most the last n events', '50')
  .option('--json', 'Output as JSON')
  .action((options: LogOptions) => {
    process.exitCode = runLog(options, consolePrinter);
  });
