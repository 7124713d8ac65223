/**
 * Temp-directory mod trees for the mod-loader tests.
 */

import { mkdirSync, mkdtempSync, realpathSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

export function makeTempDir(label: string): string {
  return realpathSync(mkdtempSync(`${tmpdir()}/modweave-${label}-`));
}

/** Write `files` (relative path → text or JSON value) under `root`. */
export function writeFiles(root: string, files: Readonly<Record<string, unknown>>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content, null, 2));
  }
}

/** A mod directory with a mod.json built from `manifest` and any extra files. */
export function writeMod(
  modsDir: string,
  directory: string,
  manifest: Readonly<Record<string, unknown>>,
  files: Readonly<Record<string, unknown>> = {},
): string {
  const root = join(modsDir, directory);
  writeFiles(root, { 'mod.json': manifest, ...files });
  return root;
}
