/**
 * modweave order — Print the resolved load order
 *
 * Discovers and resolves without loading anything. Exits 1 when resolution
 * fails (missing, circular or version-mismatched hard dependency).
 */

import { Command } from 'commander';
import { ModResolutionError } from '@modweave/kernel';
import type { ModManifest } from '@modweave/kernel';
import { consolePrinter } from '../output.js';
import type { Printer } from '../output.js';
import { addLoaderOptions, buildRuntime } from '../runtime.js';
import type { LoaderCliOptions } from '../runtime.js';
import { t } from '../theme.js';

export interface OrderOptions extends LoaderCliOptions {
  json?: boolean | undefined;
}

/** @returns Process exit code */
export async function runOrder(options: OrderOptions, printer: Printer): Promise<number> {
  const { loader } = buildRuntime(options, printer);
  let order: ModManifest[];
  try {
    ({ order } = await loader.resolveOrder());
  } catch (err: unknown) {
    if (err instanceof ModResolutionError) {
      printer.err(t.red(`Resolution failed: ${err.message}`));
      return 1;
    }
    throw err;
  }

  if (options.json === true) {
    printer.out(JSON.stringify(
      order.map((m) => ({ id: m.id, version: m.version, priority: m.priority, directory: m.directory })),
      null,
      2,
    ));
    return 0;
  }

  if (order.length === 0) {
    printer.out(t.muted('(no mods found)'));
    return 0;
  }
  order.forEach((m, i) => {
    printer.out(`${String(i + 1).padStart(3)}. ${t.white(m.id)}${t.muted(`@${m.version}`)}  ${t.dim(m.directory)}`);
  });
  return 0;
}

export const orderCommand = addLoaderOptions(new Command('order'))
  .description('Print the resolved mod load order')
  .option('--json', 'Output as JSON')
  .action(async (options: OrderOptions) => {
    process.exitCode = await runOrder(options, consolePrinter);
  });
