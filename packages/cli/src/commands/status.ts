/**
 * modweave status — Show the outcome of the last `modweave load`
 */

import { Command } from 'commander';
import { FileStateIO, resolveModweaveHome } from '@modweave/runtime-host';
import { LAST_LOAD_FILE, isLastLoadRecord } from '../last-load.js';
import type { LastLoadRecord } from '../last-load.js';
import { consolePrinter } from '../output.js';
import type { Printer } from '../output.js';
import { t } from '../theme.js';

export interface StatusOptions {
  home?: string | undefined;
  json?: boolean | undefined;
}

/** @returns Process exit code */
export function runStatus(options: StatusOptions, printer: Printer): number {
  const home = resolveModweaveHome({ home: options.home, create: false });
  const record = new FileStateIO(home).readJson<LastLoadRecord | null>(
    LAST_LOAD_FILE,
    null,
    (value): value is LastLoadRecord | null => value === null || isLastLoadRecord(value),
  );

  if (options.json === true) {
    printer.out(JSON.stringify(record, null, 2));
    return 0;
  }
  if (record === null) {
    printer.out(t.muted('No load recorded yet. Run `modweave load` first.'));
    return 0;
  }

  printer.out(`Last load:  ${record.completed_at}`);
  printer.out(`Mods dir:   ${record.mods_dir}`);
  printer.out(`Loaded:     ${record.loaded.length === 0 ? '(none)' : record.loaded.join(', ')}`);
  if (record.skipped.length > 0) printer.out(t.amber(`Skipped:    ${record.skipped.join(', ')}`));
  if (record.rejected.length > 0) printer.out(t.red(`Rejected:   ${record.rejected.join(', ')}`));
  printer.out(
    `Patches:    ${t.green(`${record.patches.applied} applied`)}, ` +
      `${t.red(`${record.patches.failed} failed`)}, ` +
      `${t.amber(`${record.patches.target_missing} target missing`)}`,
  );
  printer.out(`Documents:  ${record.documents}`);
  return 0;
}

export const statusCommand = new Command('status')
  .description('Show the outcome of the last load')
  .option('--home <dir>', 'Modweave home (default: $MODWEAVE_HOME or ~/.modweave)')
  .option('--json', 'Output as JSON')
  .action((options: StatusOptions) => {
    process.exitCode = runStatus(options, consolePrinter);
  });
