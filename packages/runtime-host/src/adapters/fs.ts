/**
 * Modweave Runtime Host — Filesystem Adapter Implementation
 *
 * Implements the ModFileSystem interface from @modweave/kernel using
 * node:fs/promises. The kernel defines the interface; the runtime host owns
 * the implementation, so kernel code never imports node:fs.
 *
 * Listings are sorted by name so discovery order, and with it the load
 * order of equal-priority mods, does not depend on the platform's directory
 * enumeration order.
 */

import { readFile, readdir, writeFile, mkdir, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, join } from 'node:path';
import type { ModFileSystem } from '@modweave/kernel';
import { isNodeError } from '../state/state-io.js';

/** Reject paths containing null bytes. */
function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`Invalid path: null byte detected in path: ${JSON.stringify(path)}`);
  }
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export class NodeModFileSystem implements ModFileSystem {
  async isDirectory(path: string): Promise<boolean> {
    return (await this.statOrUndefined(path))?.isDirectory() ?? false;
  }

  async isFile(path: string): Promise<boolean> {
    return (await this.statOrUndefined(path))?.isFile() ?? false;
  }

  async listDirectories(path: string): Promise<string[]> {
    assertSafePath(path);
    const entries = await readdir(path, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort(byName)
      .map((name) => join(path, name));
  }

  async listFiles(path: string, extension: string, recursive: boolean): Promise<string[]> {
    assertSafePath(path);
    const entries = await readdir(path, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of [...entries].sort((a, b) => byName(a.name, b.name))) {
      const full = join(path, entry.name);
      if (entry.isDirectory()) {
        if (recursive) files.push(...(await this.listFiles(full, extension, true)));
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        files.push(full);
      }
    }
    return files;
  }

  async readText(path: string): Promise<string> {
    assertSafePath(path);
    return readFile(path, 'utf-8');
  }

  async writeText(path: string, content: string): Promise<void> {
    assertSafePath(path);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }

  private async statOrUndefined(path: string): Promise<Stats | undefined> {
    assertSafePath(path);
    try {
      return await stat(path);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) return undefined;
      throw err;
    }
  }
}
