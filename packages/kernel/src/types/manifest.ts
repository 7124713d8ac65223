/**
 * Modweave Kernel — Mod Manifest Types
 *
 * A manifest is the declarative description a mod ships in its `mod.json`.
 * The validator in @modweave/mod-loader turns raw JSON into this shape; the
 * kernel resolver orders manifests without touching the filesystem.
 */

/**
 * A validated mod manifest.
 *
 * Invariants enforced at validation time:
 * - `id` and `name` are non-empty
 * - `version` starts with `major.minor.patch`
 * - every `dependencies` entry matches the dependency grammar
 *   (`<id>` or `<id> <op> <version>`)
 */
export interface ModManifest {
  /** Globally unique mod id. */
  readonly id: string;
  readonly name: string;
  readonly author: string;
  /** `\d+.\d+.\d+` optionally followed by a `-prerelease` or other suffix. */
  readonly version: string;
  readonly description: string;
  /** Hard dependencies. Each must be present; absence aborts resolution. */
  readonly dependencies: ReadonlyArray<string>;
  /**
   * Soft hint: mods this one should load before. Stored and reported but not
   * consulted by the resolver.
   */
  readonly loadBefore: ReadonlyArray<string>;
  /** Soft hint: mods this one loads after when they are present. */
  readonly loadAfter: ReadonlyArray<string>;
  /** Lower loads earlier. Ties keep discovery order. */
  readonly priority: number;
  /** Script paths relative to the mod directory, handed to the script host. */
  readonly scripts: ReadonlyArray<string>;
  readonly permissions: ReadonlyArray<string>;
  /** Patch file paths relative to the mod directory. */
  readonly patches: ReadonlyArray<string>;
  /** Content type → folder relative to the mod directory. */
  readonly contentFolders: Readonly<Record<string, string>>;
  /** Absolute directory the manifest was read from. Stamped by the parser. */
  readonly directory: string;
}

/** Comparison operators accepted in a dependency constraint. */
export type VersionOperator = '>=' | '>' | '==' | '<=' | '<';

/** A parsed hard-dependency entry. */
export interface DependencySpec {
  readonly id: string;
  /** Present only when the entry carried a version. */
  readonly constraint?: {
    readonly operator: VersionOperator;
    readonly version: string;
  } | undefined;
}
