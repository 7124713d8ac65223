/**
 * @modweave/mod-loader
 *
 * Discovery, manifest validation, content loading and the load
 * orchestrator built on the kernel's resolver and patch applicator.
 */

export { ManifestValidator } from './validator.js';
export { DocumentStore } from './document-store.js';
export { LoadedMod } from './loaded-mod.js';
export { ContentLoader, contentKey } from './content-loader.js';
export type { ContentFolderOptions, ContentLoadResult } from './content-loader.js';
export { PatchFileLoader } from './patch-file-loader.js';
export { ImportScriptHost, isScriptInstance } from './script-host.js';
export { ModRegistry, ModState } from './registry.js';
export type { RegistryEntry } from './registry.js';
export { ModLoader } from './loader.js';
export type {
  DiscoveryResult,
  LoadSummary,
  ModLoaderOptions,
  PatchOutcome,
  RejectedManifest,
  SkippedMod,
} from './loader.js';
