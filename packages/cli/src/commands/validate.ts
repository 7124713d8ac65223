/**
 * modweave validate — Per-mod manifest report
 *
 * Lists every discovered mod with its manifest verdict, then checks that the
 * valid manifests resolve. Exits 1 if any manifest is invalid or resolution
 * fails.
 */

import { Command } from 'commander';
import { DependencyResolver, ModResolutionError } from '@modweave/kernel';
import { consolePrinter } from '../output.js';
import type { Printer } from '../output.js';
import { addLoaderOptions, buildRuntime } from '../runtime.js';
import type { LoaderCliOptions } from '../runtime.js';
import { t } from '../theme.js';

/** @returns Process exit code */
export async function runValidate(options: LoaderCliOptions, printer: Printer): Promise<number> {
  const { loader } = buildRuntime(options, printer);
  const { manifests, rejected } = await loader.discover();

  for (const m of manifests) {
    printer.out(`${t.green('✓')} ${m.id}@${m.version}  ${t.dim(m.directory)}`);
  }
  for (const r of rejected) {
    printer.out(`${t.red('✗')} ${r.directory}`);
    for (const e of r.errors) {
      printer.out(`    ${t.red(e.message)}`);
    }
  }

  let resolved = true;
  try {
    new DependencyResolver().resolve(manifests);
  } catch (err: unknown) {
    if (!(err instanceof ModResolutionError)) throw err;
    resolved = false;
    printer.out(`${t.red('✗')} load order: ${err.message}`);
  }

  printer.out(t.muted(`${manifests.length} valid, ${rejected.length} invalid`));
  return rejected.length === 0 && resolved ? 0 : 1;
}

export const validateCommand = addLoaderOptions(new Command('validate'))
  .description('Validate every mod manifest and the dependency graph')
  .action(async (options: LoaderCliOptions) => {
    process.exitCode = await runValidate(options, consolePrinter);
  });
