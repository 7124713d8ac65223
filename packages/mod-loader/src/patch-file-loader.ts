/**
 * Modweave Mod Loader — Patch File Loader
 *
 * Reads a mod's patch files in manifest order and parses each with the
 * ManifestValidator. A missing or malformed file is logged and skipped;
 * the mod's remaining patch files still load.
 */

import { LoadLogger, errorMessage } from '@modweave/kernel';
import type { ModFileSystem, ModPatch, ValidationResult } from '@modweave/kernel';
import type { LoadedMod } from './loaded-mod.js';
import { ManifestValidator } from './validator.js';

export class PatchFileLoader {
  constructor(
    private readonly fs: ModFileSystem,
    private readonly validator: ManifestValidator = new ManifestValidator(),
    private readonly logger: LoadLogger = new LoadLogger(),
  ) {}

  /** Read and parse one patch file. I/O failures are returned, not thrown. */
  async loadPatchFile(path: string): Promise<ValidationResult<ModPatch>> {
    if (!(await this.fs.isFile(path))) {
      return { ok: false, errors: [{ message: 'Patch file not found', context: path }] };
    }
    let text: string;
    try {
      text = await this.fs.readText(path);
    } catch (err: unknown) {
      return { ok: false, errors: [{ message: `Cannot read patch file: ${errorMessage(err)}`, context: path }] };
    }
    return this.validator.parsePatchFile(text, path);
  }

  /** Load every patch file the mod's manifest lists, skipping the ones that fail. */
  async loadModPatches(mod: LoadedMod): Promise<ModPatch[]> {
    const patches: ModPatch[] = [];
    for (const relativePath of mod.manifest.patches) {
      const path = mod.resolvePath(relativePath);
      const result = await this.loadPatchFile(path);
      if (!result.ok) {
        this.logger.error(
          'patch.file_invalid',
          `Skipping patch file ${relativePath} of mod '${mod.id}': ${result.errors.map((e) => e.message).join('; ')}`,
          { modId: mod.id, fields: { file: path, errors: result.errors.map((e) => e.message) } },
        );
        continue;
      }
      patches.push(result.value);
    }
    this.logger.info('patch.files_loaded', `Loaded ${patches.length} patch(es) for mod '${mod.id}'`, {
      modId: mod.id,
      fields: { loaded: patches.length, listed: mod.manifest.patches.length },
    });
    return patches;
  }
}
