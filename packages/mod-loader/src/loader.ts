/**
 * Modweave Mod Loader — Mod Loader
 *
 * Orchestrates a full load pass:
 *
 * 1. Discover: every subdirectory of the mods root with a mod.json
 * 2. Validate each manifest (ManifestValidator); invalid ones are skipped
 * 3. Resolve the load order (kernel DependencyResolver). Resolution errors
 *    are fatal: they are logged and rethrown, and nothing is loaded
 * 4. For each mod in order:
 *    a. skip a duplicate id (first one wins)
 *    b. load and cache its patch files
 *    c. load its content folders into the DocumentStore
 *    d. apply its patches to their target documents
 *    e. hand its scripts to the ScriptHost
 *    f. register it as Loaded
 *
 * A failed patch operation stops only the rest of that patch. Unexpected
 * errors while loading one mod (I/O, a throwing script host) unload the
 * partial mod and propagate.
 *
 * Unload removes the mod's cached patches, manifest and script instances.
 * Patches already applied to documents stay applied.
 */

import { relative, sep } from 'node:path';
import {
  DependencyResolver,
  LoadLogger,
  ModResolutionError,
  PatchApplicator,
  errorMessage,
} from '@modweave/kernel';
import type {
  ModFileSystem,
  ModManifest,
  ModPatch,
  ScriptContext,
  ScriptHost,
  ScriptInstance,
  ValidationError,
} from '@modweave/kernel';
import { MANIFEST_FILENAME } from '@modweave/runtime-host';
import { ContentLoader } from './content-loader.js';
import type { ContentLoadResult } from './content-loader.js';
import { DocumentStore } from './document-store.js';
import { LoadedMod } from './loaded-mod.js';
import { PatchFileLoader } from './patch-file-loader.js';
import { ModRegistry, ModState } from './registry.js';
import { ManifestValidator } from './validator.js';

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** A mod directory whose manifest could not be used. */
export interface RejectedManifest {
  readonly directory: string;
  readonly errors: ReadonlyArray<ValidationError>;
}

export interface DiscoveryResult {
  /** Valid manifests in discovery (directory name) order. */
  readonly manifests: ReadonlyArray<ModManifest>;
  readonly rejected: ReadonlyArray<RejectedManifest>;
}

export type PatchOutcome =
  | {
      readonly status: 'applied';
      readonly modId: string;
      readonly target: string;
      readonly source?: string | undefined;
      readonly applied: number;
    }
  | {
      readonly status: 'failed';
      readonly modId: string;
      readonly target: string;
      readonly source?: string | undefined;
      readonly applied: number;
      readonly failedIndex: number;
      readonly error: string;
    }
  | {
      readonly status: 'target-missing';
      readonly modId: string;
      readonly target: string;
      readonly source?: string | undefined;
    };

export interface SkippedMod {
  readonly id: string;
  readonly directory: string;
  readonly reason: 'duplicate';
}

export interface LoadSummary {
  /** Resolved order, duplicates included. */
  readonly order: ReadonlyArray<string>;
  /** Ids loaded by this call, in load order. */
  readonly loaded: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<SkippedMod>;
  readonly rejected: ReadonlyArray<RejectedManifest>;
  readonly patches: ReadonlyArray<PatchOutcome>;
  readonly content: ReadonlyArray<ContentLoadResult>;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ModLoaderOptions {
  /** Root directory scanned for mod subdirectories. */
  readonly modsDir: string;
  readonly fs: ModFileSystem;
  /** Shared content cache. A new empty store when omitted. */
  readonly store?: DocumentStore | undefined;
  /** Without a host, manifest scripts are skipped with a debug event. */
  readonly scriptHost?: ScriptHost | undefined;
  readonly logger?: LoadLogger | undefined;
}

// ---------------------------------------------------------------------------
// Mod Loader
// ---------------------------------------------------------------------------

export class ModLoader {
  readonly store: DocumentStore;
  private readonly modsDir: string;
  private readonly fs: ModFileSystem;
  private readonly scriptHost: ScriptHost | undefined;
  private readonly logger: LoadLogger;
  private readonly validator = new ManifestValidator();
  private readonly registry = new ModRegistry();
  private readonly resolver: DependencyResolver;
  private readonly applicator: PatchApplicator;
  private readonly patchFiles: PatchFileLoader;
  private readonly content: ContentLoader;

  constructor(options: ModLoaderOptions) {
    this.modsDir = options.modsDir;
    this.fs = options.fs;
    this.store = options.store ?? new DocumentStore();
    this.scriptHost = options.scriptHost;
    this.logger = options.logger ?? new LoadLogger();
    this.resolver = new DependencyResolver(this.logger);
    this.applicator = new PatchApplicator(this.logger);
    this.patchFiles = new PatchFileLoader(this.fs, this.validator, this.logger);
    this.content = new ContentLoader(this.fs, this.store, this.logger);
  }

  // -------------------------------------------------------------------------
  // Discovery and resolution
  // -------------------------------------------------------------------------

  /**
   * Scan the mods root for manifests. A missing root yields no mods and a
   * warning; directories without mod.json are skipped at debug level.
   */
  async discover(): Promise<DiscoveryResult> {
    if (!(await this.fs.isDirectory(this.modsDir))) {
      this.logger.warn('discovery.mods_dir_missing', `Mods directory not found: ${this.modsDir}`, {
        fields: { modsDir: this.modsDir },
      });
      return { manifests: [], rejected: [] };
    }

    this.logger.info('discovery.started', `Scanning for mods in ${this.modsDir}`, {
      fields: { modsDir: this.modsDir },
    });

    const manifests: ModManifest[] = [];
    const rejected: RejectedManifest[] = [];
    for (const directory of await this.fs.listDirectories(this.modsDir)) {
      const manifestPath = `${directory}${sep}${MANIFEST_FILENAME}`;
      if (!(await this.fs.isFile(manifestPath))) {
        this.logger.debug('discovery.no_manifest', `Skipping ${directory} (no ${MANIFEST_FILENAME})`, {
          fields: { directory },
        });
        continue;
      }

      let text: string;
      try {
        text = await this.fs.readText(manifestPath);
      } catch (err: unknown) {
        const message = `Cannot read manifest: ${errorMessage(err)}`;
        this.logger.error('manifest.invalid', `${message} (${manifestPath})`, {
          fields: { directory, errors: [message] },
        });
        rejected.push({ directory, errors: [{ message, context: manifestPath }] });
        continue;
      }
      const declaredId = this.validator.peekId(text);
      if (declaredId !== undefined) this.registry.setState(declaredId, ModState.Discovered);

      const result = this.validator.parseManifest(text, directory);
      if (!result.ok) {
        const messages = result.errors.map((e) => e.message);
        this.logger.error('manifest.invalid', `Invalid manifest at ${manifestPath}: ${messages.join('; ')}`, {
          fields: { directory, errors: messages },
        });
        rejected.push({ directory, errors: result.errors });
        continue;
      }

      const manifest = result.value;
      this.registry.setState(manifest.id, ModState.Validated);
      this.logger.debug('manifest.parsed', `Parsed manifest ${manifest.id}@${manifest.version}`, {
        modId: manifest.id,
        fields: { directory },
      });
      manifests.push(manifest);
    }

    this.logger.info('discovery.completed', `Found ${manifests.length} mod(s)`, {
      fields: { found: manifests.length, rejected: rejected.length },
    });
    return { manifests, rejected };
  }

  /**
   * Discover and resolve without loading anything.
   *
   * @throws {ModResolutionError} On a missing, circular or version-mismatched hard dependency
   */
  async resolveOrder(): Promise<{ readonly order: ModManifest[]; readonly discovery: DiscoveryResult }> {
    const discovery = await this.discover();
    return { order: this.resolve(discovery.manifests), discovery };
  }

  private resolve(manifests: ReadonlyArray<ModManifest>): ModManifest[] {
    try {
      const order = this.resolver.resolve(manifests);
      for (const manifest of order) {
        this.registry.setState(manifest.id, ModState.Ordered);
      }
      return order;
    } catch (err: unknown) {
      if (err instanceof ModResolutionError) {
        this.logger.error('resolution.failed', `Failed to resolve mod dependencies: ${err.message}`, {
          modId: err.modId,
          fields: { error: err.name },
        });
      }
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Loading
  // -------------------------------------------------------------------------

  /** Load a base content folder (before any mod) into the store. */
  async loadBaseContent(directory: string): Promise<ContentLoadResult[]> {
    if (!(await this.fs.isDirectory(directory))) {
      this.logger.warn('content.base_missing', `Base content directory not found: ${directory}`, {
        fields: { directory },
      });
      return [];
    }
    return this.content.loadFolder(directory);
  }

  /**
   * Discover, resolve and load every mod.
   *
   * @throws {ModResolutionError} When resolution fails; no mod is loaded
   */
  async loadAll(): Promise<LoadSummary> {
    const discovery = await this.discover();
    const order = this.resolve(discovery.manifests);

    const loaded: string[] = [];
    const skipped: SkippedMod[] = [];
    const patches: PatchOutcome[] = [];
    const content: ContentLoadResult[] = [];

    for (const manifest of order) {
      const existing = this.registry.get(manifest.id);
      if (existing !== undefined) {
        this.logger.warn('mod.duplicate_skipped', `Mod '${manifest.id}' is already loaded. Skipping duplicate.`, {
          modId: manifest.id,
          fields: { directory: manifest.directory, loadedFrom: existing.mod.rootPath },
        });
        skipped.push({ id: manifest.id, directory: manifest.directory, reason: 'duplicate' });
        continue;
      }

      const result = await this.loadMod(manifest);
      loaded.push(manifest.id);
      patches.push(...result.patches);
      content.push(...result.content);
    }

    this.logger.info('mod.load_completed', `Loaded ${loaded.length} mod(s)`, {
      fields: { loaded, skipped: skipped.length, rejected: discovery.rejected.length },
    });

    return {
      order: order.map((m) => m.id),
      loaded,
      skipped,
      rejected: discovery.rejected,
      patches,
      content,
    };
  }

  /** Load one manifest. On an unexpected error, whatever was registered is removed and the error propagates. */
  private async loadMod(
    manifest: ModManifest,
  ): Promise<{ patches: PatchOutcome[]; content: ContentLoadResult[] }> {
    const mod = new LoadedMod(manifest);
    const scripts: ScriptInstance[] = [];
    this.logger.info('mod.loading', `Loading mod: ${mod.toString()}`, { modId: mod.id });

    try {
      const modPatches = await this.patchFiles.loadModPatches(mod);
      const content = await this.loadContentFolders(mod);
      const outcomes = modPatches.map((patch) => this.applyPatch(mod.id, patch));
      await this.loadScripts(mod, scripts);

      this.registry.register({ mod, patches: modPatches, scripts });
      this.logger.info('mod.loaded', `Mod loaded: ${mod.toString()}`, {
        modId: mod.id,
        fields: {
          patches: modPatches.length,
          contentFolders: Object.keys(manifest.contentFolders).length,
          scripts: scripts.length,
        },
      });
      return { patches: outcomes, content };
    } catch (err: unknown) {
      this.logger.error('mod.load_failed', `Failed to load mod '${mod.id}': ${errorMessage(err)}`, {
        modId: mod.id,
      });
      await this.teardownScripts(mod.id, scripts);
      this.registry.remove(mod.id);
      throw err;
    }
  }

  private async loadContentFolders(mod: LoadedMod): Promise<ContentLoadResult[]> {
    const results: ContentLoadResult[] = [];
    for (const [contentType, folder] of Object.entries(mod.manifest.contentFolders)) {
      const path = mod.resolvePath(folder);
      if (!(await this.fs.isDirectory(path))) {
        this.logger.warn('content.folder_missing', `Content folder '${contentType}' not found: ${path}`, {
          modId: mod.id,
          fields: { contentType, path },
        });
        continue;
      }
      results.push(...(await this.content.loadFolder(path, { prefix: contentType, modId: mod.id })));
    }
    return results;
  }

  private applyPatch(modId: string, patch: ModPatch): PatchOutcome {
    const document = this.store.getDocumentByKey(patch.target);
    if (document === undefined) {
      this.logger.warn('patch.target_missing', `Patch target '${patch.target}' not found`, {
        modId,
        fields: { target: patch.target, source: patch.source ?? null },
      });
      return { status: 'target-missing', modId, target: patch.target, source: patch.source };
    }

    const result = this.applicator.applyPatch(document, patch);
    this.store.replaceDocument(patch.target, result.document);
    if (!result.ok) {
      return {
        status: 'failed',
        modId,
        target: patch.target,
        source: patch.source,
        applied: result.applied,
        failedIndex: result.failedIndex,
        error: result.error.message,
      };
    }
    return { status: 'applied', modId, target: patch.target, source: patch.source, applied: result.applied };
  }

  private async loadScripts(mod: LoadedMod, instances: ScriptInstance[]): Promise<void> {
    if (mod.manifest.scripts.length === 0) return;
    if (this.scriptHost === undefined) {
      this.logger.debug('script.skipped', `No script host configured; skipping scripts of '${mod.id}'`, {
        modId: mod.id,
        fields: { scripts: mod.manifest.scripts },
      });
      return;
    }

    for (const scriptPath of mod.manifest.scripts) {
      const absolute = mod.resolvePath(scriptPath);
      if (!(await this.fs.isFile(absolute))) {
        this.logger.error('script.not_found', `Script file not found for mod '${mod.id}': ${absolute}`, {
          modId: mod.id,
          fields: { script: scriptPath },
        });
        continue;
      }

      const relativePath = relative(this.modsDir, absolute).split(sep).join('/');
      const instance = await this.scriptHost.loadScript(relativePath);
      if (instance === null) {
        this.logger.error('script.load_failed', `Failed to load script '${scriptPath}' for mod '${mod.id}'`, {
          modId: mod.id,
          fields: { script: scriptPath },
        });
        continue;
      }

      const context: ScriptContext = { modId: mod.id, manifest: mod.manifest, scriptPath };
      await this.scriptHost.initializeScript(instance, context);
      instances.push(instance);
      this.logger.debug('script.initialized', `Loaded and initialized script ${scriptPath}`, {
        modId: mod.id,
        fields: { script: scriptPath },
      });
    }
  }

  // -------------------------------------------------------------------------
  // Unload / reload
  // -------------------------------------------------------------------------

  /**
   * Unload a mod: run its scripts' teardown hooks and drop its cached
   * patches, manifest and instances.
   *
   * @returns false (with a warning) if the mod was not loaded
   */
  async unload(modId: string): Promise<boolean> {
    const entry = this.registry.get(modId);
    if (entry === undefined) {
      this.logger.warn('mod.unload_unknown', `Mod '${modId}' is not loaded`, { modId });
      return false;
    }

    this.logger.info('mod.unloading', `Unloading mod: ${modId}`, { modId });
    await this.teardownScripts(modId, entry.scripts);
    this.registry.remove(modId);
    this.logger.info('mod.unloaded', `Mod '${modId}' unloaded`, { modId });
    return true;
  }

  /**
   * Unload a mod and load its manifest again. Patch files and content are
   * re-read from disk.
   *
   * @returns false (with a warning) if the mod was not loaded
   */
  async reload(modId: string): Promise<boolean> {
    const manifest = this.getManifest(modId);
    if (manifest === undefined) {
      this.logger.warn('mod.reload_unknown', `Cannot reload mod '${modId}': not loaded`, { modId });
      return false;
    }

    this.logger.info('mod.reloading', `Reloading mod: ${modId}`, { modId });
    await this.unload(modId);
    await this.loadMod(manifest);
    return true;
  }

  /** Teardown errors are logged and never stop the remaining hooks. */
  private async teardownScripts(modId: string, scripts: ReadonlyArray<ScriptInstance>): Promise<void> {
    for (const instance of scripts) {
      try {
        await instance.onUnload?.();
      } catch (err: unknown) {
        this.logger.warn('script.unload_failed', `Error disposing script instance for mod '${modId}': ${errorMessage(err)}`, {
          modId,
        });
      }
    }
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  isLoaded(modId: string): boolean {
    return this.registry.has(modId);
  }

  getManifest(modId: string): ModManifest | undefined {
    return this.registry.get(modId)?.mod.manifest;
  }

  /** Cached patches of a loaded mod, in manifest order. Empty for an unknown id. */
  getPatches(modId: string): ReadonlyArray<ModPatch> {
    return this.registry.get(modId)?.patches ?? [];
  }

  /** Content type → absolute folder path. Empty for an unknown id. */
  getContentFolders(modId: string): Readonly<Record<string, string>> {
    const entry = this.registry.get(modId);
    const folders: Record<string, string> = {};
    if (entry === undefined) return folders;
    for (const [contentType, folder] of Object.entries(entry.mod.manifest.contentFolders)) {
      folders[contentType] = entry.mod.resolvePath(folder);
    }
    return folders;
  }

  getContentFolderPath(modId: string, contentType: string): string | undefined {
    return this.getContentFolders(modId)[contentType];
  }

  /** Loaded manifests in load order. */
  listLoaded(): ReadonlyArray<ModManifest> {
    return this.registry.list().map((entry) => entry.mod.manifest);
  }

  getState(modId: string): ModState | undefined {
    return this.registry.getState(modId);
  }
}
