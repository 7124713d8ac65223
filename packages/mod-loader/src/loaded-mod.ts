/**
 * Modweave Mod Loader — Loaded Mod
 *
 * A validated, non-duplicate manifest bound to its root directory.
 */

import { isAbsolute, join, normalize } from 'node:path';
import type { ModManifest } from '@modweave/kernel';

export class LoadedMod {
  readonly rootPath: string;

  constructor(readonly manifest: ModManifest) {
    this.rootPath = manifest.directory;
  }

  get id(): string {
    return this.manifest.id;
  }

  /** Resolve a manifest-relative path (patch, script or content folder) against the mod root. */
  resolvePath(relativePath: string): string {
    return isAbsolute(relativePath) ? normalize(relativePath) : join(this.rootPath, relativePath);
  }

  toString(): string {
    return `${this.manifest.name} (${this.manifest.id}@${this.manifest.version})`;
  }
}
