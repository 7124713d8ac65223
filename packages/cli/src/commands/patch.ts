/**
 * modweave patch — Apply one patch file to one JSON document
 *
 * Prints the patched document, or writes it with --out. Nothing is written
 * when an operation fails.
 */

import { resolve } from 'node:path';
import { Command, Option } from 'commander';
import { LoadLogger, PatchApplicator, errorMessage, formatDocument, parseDocument } from '@modweave/kernel';
import type { DocumentNode, LogLevel } from '@modweave/kernel';
import { ManifestValidator, PatchFileLoader } from '@modweave/mod-loader';
import { NodeModFileSystem } from '@modweave/runtime-host';
import { ConsoleLogSink } from '../console-log-sink.js';
import { consolePrinter } from '../output.js';
import type { Printer } from '../output.js';
import { t } from '../theme.js';

export interface PatchOptions {
  out?: string | undefined;
  logLevel?: LogLevel | undefined;
  cwd?: string | undefined;
}

/** @returns Process exit code */
export async function runPatch(
  documentPath: string,
  patchPath: string,
  options: PatchOptions,
  printer: Printer,
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const fs = new NodeModFileSystem();
  const logger = new LoadLogger(new ConsoleLogSink(printer, options.logLevel ?? 'warn'));
  const documentFile = resolve(cwd, documentPath);

  let document: DocumentNode;
  try {
    document = parseDocument(await fs.readText(documentFile), documentFile);
  } catch (err: unknown) {
    printer.err(t.red(`Cannot read document: ${errorMessage(err)}`));
    return 1;
  }

  const patch = await new PatchFileLoader(fs, new ManifestValidator(), logger).loadPatchFile(resolve(cwd, patchPath));
  if (!patch.ok) {
    for (const e of patch.errors) {
      printer.err(t.red(`${e.context ?? patchPath}: ${e.message}`));
    }
    return 1;
  }

  const result = new PatchApplicator(logger).applyPatch(document, patch.value);
  if (!result.ok) {
    printer.err(t.red(`Operation ${result.failedIndex} failed: ${result.error.message}`));
    return 1;
  }

  const text = formatDocument(result.document);
  if (options.out === undefined) {
    printer.out(text);
  } else {
    await fs.writeText(resolve(cwd, options.out), `${text}\n`);
    printer.err(t.muted(`Applied ${result.applied} operation(s) to ${options.out}`));
  }
  return 0;
}

export const patchCommand = new Command('patch')
  .description('Apply a patch file to a JSON document')
  .argument('<document>', 'JSON document to patch')
  .argument('<patch-file>', 'Patch file ({ target, operations })')
  .option('--out <file>', 'Write the patched document here instead of stdout')
  .addOption(new Option('--log-level <level>', 'Console log level').choices(['debug', 'info', 'warn', 'error']))
  .action(async (documentPath: string, patchPath: string, options: PatchOptions) => {
    process.exitCode = await runPatch(documentPath, patchPath, options, consolePrinter);
  });
