/**
 * Modweave Mod Loader — Mod Registry
 *
 * The authoritative record of loaded mods, their cached patches and script
 * instances, and the lifecycle state of every mod id the loader has seen.
 *
 * Registry invariants:
 * - At most one loaded entry per mod id; register() rejects a second one
 * - list() returns loaded mods in the order they were registered (load order)
 */

import type { ModPatch, ScriptInstance } from '@modweave/kernel';
import type { LoadedMod } from './loaded-mod.js';

/** Lifecycle of a mod id within one loader. */
export enum ModState {
  /** A manifest file was found in the mod's directory. */
  Discovered = 'Discovered',
  /** The manifest passed validation. */
  Validated = 'Validated',
  /** The manifest has a place in the resolved load order. */
  Ordered = 'Ordered',
  /** Patches, content and scripts are loaded. */
  Loaded = 'Loaded',
  /** The mod was loaded and then explicitly unloaded. */
  Unloaded = 'Unloaded',
}

export interface RegistryEntry {
  readonly mod: LoadedMod;
  readonly patches: ReadonlyArray<ModPatch>;
  readonly scripts: ReadonlyArray<ScriptInstance>;
}

export class ModRegistry {
  private readonly entries: Map<string, RegistryEntry> = new Map();
  private readonly states: Map<string, ModState> = new Map();

  /**
   * Record a loaded mod.
   *
   * @throws {Error} If a mod with the same id is already registered
   */
  register(entry: RegistryEntry): void {
    if (this.entries.has(entry.mod.id)) {
      throw new Error(`Mod already registered: ${entry.mod.id}`);
    }
    this.entries.set(entry.mod.id, entry);
    this.states.set(entry.mod.id, ModState.Loaded);
  }

  /** Remove a loaded mod. Returns the removed entry, or undefined if it was not loaded. */
  remove(modId: string): RegistryEntry | undefined {
    const entry = this.entries.get(modId);
    if (entry === undefined) return undefined;
    this.entries.delete(modId);
    this.states.set(modId, ModState.Unloaded);
    return entry;
  }

  has(modId: string): boolean {
    return this.entries.has(modId);
  }

  get(modId: string): RegistryEntry | undefined {
    return this.entries.get(modId);
  }

  /** Loaded entries in load order. */
  list(): ReadonlyArray<RegistryEntry> {
    return Array.from(this.entries.values());
  }

  getState(modId: string): ModState | undefined {
    return this.states.get(modId);
  }

  /** Record a pre-load lifecycle step. Loaded and Unloaded are set by register() and remove(). */
  setState(modId: string, state: ModState.Discovered | ModState.Validated | ModState.Ordered): void {
    // A loaded mod keeps its state while a later duplicate moves through discovery.
    if (this.entries.has(modId)) return;
    this.states.set(modId, state);
  }
}
