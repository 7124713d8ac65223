/**
 * modweave load — Run a full load pass
 *
 * Loads base content, then every mod in resolved order, and records the
 * outcome in `<home>/state/last-load.json`. With --out, every document in
 * the content cache is written to `<out>/<key>.json`.
 *
 * Per-mod problems (invalid manifest, failed patch) are reported and the
 * run continues. Resolution failures load nothing and exit 1.
 */

import { join, resolve } from 'node:path';
import { Command } from 'commander';
import { ModResolutionError, formatDocument } from '@modweave/kernel';
import type { LoadSummary } from '@modweave/mod-loader';
import { LAST_LOAD_FILE, toLastLoadRecord } from '../last-load.js';
import { consolePrinter } from '../output.js';
import type { Printer } from '../output.js';
import { addLoaderOptions, buildRuntime } from '../runtime.js';
import type { LoaderCliOptions, Runtime } from '../runtime.js';
import { patchStatusColor, t } from '../theme.js';

export interface LoadOptions extends LoaderCliOptions {
  out?: string | undefined;
  json?: boolean | undefined;
}

async function writeDocuments(runtime: Runtime, outDir: string): Promise<number> {
  const { store } = runtime.loader;
  let written = 0;
  for (const key of store.keys()) {
    const document = store.getDocumentByKey(key);
    if (document === undefined) continue;
    await runtime.fs.writeText(join(outDir, `${key}.json`), `${formatDocument(document)}\n`);
    written++;
  }
  return written;
}

/** @returns Process exit code */
export async function runLoad(options: LoadOptions, printer: Printer): Promise<number> {
  const runtime = buildRuntime(options, printer);
  const { loader, config } = runtime;

  await loader.loadBaseContent(config.contentDir);
  let summary: LoadSummary;
  try {
    summary = await loader.loadAll();
  } catch (err: unknown) {
    if (err instanceof ModResolutionError) {
      printer.err(t.red(`Resolution failed: ${err.message}`));
      return 1;
    }
    throw err;
  }

  const record = toLastLoadRecord(summary, config.modsDir, loader.store.size);
  runtime.stateIO.writeJson(LAST_LOAD_FILE, record);

  let written: number | undefined;
  if (options.out !== undefined) {
    written = await writeDocuments(runtime, resolve(options.cwd ?? process.cwd(), options.out));
  }

  if (options.json === true) {
    printer.out(JSON.stringify({ ...record, patch_outcomes: summary.patches }, null, 2));
    return 0;
  }

  printer.out(t.white(`Loaded ${summary.loaded.length} mod(s)`) + t.muted(`  ${summary.loaded.join(', ')}`));
  for (const p of summary.patches) {
    const detail = p.status === 'failed' ? `  operation ${p.failedIndex}: ${p.error}` : '';
    printer.out(`  ${patchStatusColor(p.status)(p.status.padEnd(14))} ${p.target}  ${t.blue(`[${p.modId}]`)}${detail}`);
  }
  for (const s of summary.skipped) {
    printer.out(t.amber(`  skipped duplicate ${s.id}  ${s.directory}`));
  }
  for (const r of summary.rejected) {
    printer.out(t.red(`  rejected ${r.directory}`));
  }
  printer.out(t.muted(`Documents: ${loader.store.size}`));
  if (written !== undefined) {
    printer.out(t.muted(`Wrote ${written} document(s) to ${options.out ?? ''}`));
  }
  return 0;
}

export const loadCommand = addLoaderOptions(new Command('load'))
  .description('Load base content and every mod, applying patches in load order')
  .option('--content <dir>', 'Base content directory (default: $MODWEAVE_CONTENT_DIR or ./Content)')
  .option('--out <dir>', 'Write every patched document under this directory')
  .option('--json', 'Output the summary as JSON')
  .action(async (options: LoadOptions) => {
    process.exitCode = await runLoad(options, consolePrinter);
  });
