/**
 * Modweave Kernel — Collaborator Interfaces
 *
 * The kernel and the mod loader never touch the filesystem, a script runtime
 * or the content consumers directly. They talk to these interfaces, and
 * concrete implementations are injected:
 *
 *   ModFileSystem  — NodeModFileSystem in @modweave/runtime-host
 *   ContentCache   — DocumentStore in @modweave/mod-loader
 *   ScriptHost     — ImportScriptHost in @modweave/mod-loader, or the embedding application's own
 */

import type { DocumentNode } from '../document/model.js';
import type { ModManifest } from '../types/manifest.js';

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

/**
 * Read-mostly filesystem access for discovery and content loading.
 * Paths are absolute. Implementations never resolve them against the working directory.
 */
export interface ModFileSystem {
  /** True if `path` exists and is a directory. */
  isDirectory(path: string): Promise<boolean>;
  /** True if `path` exists and is a regular file. */
  isFile(path: string): Promise<boolean>;
  /** Absolute paths of immediate subdirectories, sorted by name. */
  listDirectories(path: string): Promise<string[]>;
  /**
   * Absolute paths of files under `path` whose name ends with `extension`,
   * sorted. Recurses into subdirectories when `recursive` is true.
   */
  listFiles(path: string, extension: string, recursive: boolean): Promise<string[]>;
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Content cache
// ---------------------------------------------------------------------------

/**
 * The shared store of content documents that patches are applied to.
 *
 * Single writer: the orchestrator, one patch at a time, during the load
 * phase. Consumers treat it as read-only once loading completes.
 */
export interface ContentCache {
  getDocumentByKey(key: string): DocumentNode | undefined;
  replaceDocument(key: string, document: DocumentNode): void;
  addDocument(key: string, document: DocumentNode): void;
}

// ---------------------------------------------------------------------------
// Scripting
// ---------------------------------------------------------------------------

/** What a script instance may expose to the loader. Both hooks are optional. */
export interface ScriptInstance {
  /** Called by hosts that forward initializeScript to the instance. */
  onInitialize?(context: ScriptContext): void | Promise<void>;
  /** Teardown hook, called when the owning mod is unloaded. */
  onUnload?(): void | Promise<void>;
}

/** Passed to initializeScript so a script knows which mod it belongs to. */
export interface ScriptContext {
  readonly modId: string;
  readonly manifest: ModManifest;
  /** The script path as listed in the manifest. */
  readonly scriptPath: string;
}

/**
 * The external runtime that compiles and runs behavior scripts.
 *
 * loadScript receives the script path relative to the mods root (for
 * example `my-mod/scripts/npc.ts`) and returns null when the script could
 * not be loaded.
 */
export interface ScriptHost {
  loadScript(relativePath: string): Promise<ScriptInstance | null>;
  initializeScript(instance: ScriptInstance, context: ScriptContext): void | Promise<void>;
}
