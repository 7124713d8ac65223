/**
 * Modweave Mod Loader — ModRegistry Tests
 *
 *   REG-U1: register marks a mod Loaded and lists in registration order
 *   REG-U2: a second registration of the same id throws
 *   REG-U3: remove marks a mod Unloaded
 *   REG-U4: pre-load states never overwrite a loaded mod's state
 */

import { describe, it, expect } from 'vitest';
import type { ModManifest } from '@modweave/kernel';
import { LoadedMod } from '../src/loaded-mod.js';
import { ModRegistry, ModState } from '../src/registry.js';
import type { RegistryEntry } from '../src/registry.js';

function entry(id: string): RegistryEntry {
  const manifest: ModManifest = {
    id,
    name: id,
    author: '',
    version: '1.0.0',
    description: '',
    dependencies: [],
    loadBefore: [],
    loadAfter: [],
    priority: 0,
    scripts: [],
    permissions: [],
    patches: [],
    contentFolders: {},
    directory: `/mods/${id}`,
  };
  return { mod: new LoadedMod(manifest), patches: [], scripts: [] };
}

describe('ModRegistry', () => {
  it('REG-U1: registers mods in load order', () => {
    const registry = new ModRegistry();
    registry.register(entry('b'));
    registry.register(entry('a'));

    expect(registry.list().map((e) => e.mod.id)).toEqual(['b', 'a']);
    expect(registry.getState('a')).toBe(ModState.Loaded);
    expect(registry.has('a')).toBe(true);
  });

  it('REG-U2: rejects a duplicate registration', () => {
    const registry = new ModRegistry();
    registry.register(entry('a'));
    expect(() => registry.register(entry('a'))).toThrow('Mod already registered: a');
  });

  it('REG-U3: remove returns the entry and marks it Unloaded', () => {
    const registry = new ModRegistry();
    registry.register(entry('a'));

    expect(registry.remove('a')?.mod.id).toBe('a');
    expect(registry.remove('a')).toBeUndefined();
    expect(registry.has('a')).toBe(false);
    expect(registry.getState('a')).toBe(ModState.Unloaded);
  });

  it('REG-U4: keeps Loaded while a duplicate passes through discovery', () => {
    const registry = new ModRegistry();
    registry.setState('a', ModState.Validated);
    expect(registry.getState('a')).toBe(ModState.Validated);

    registry.register(entry('a'));
    registry.setState('a', ModState.Ordered);
    expect(registry.getState('a')).toBe(ModState.Loaded);
  });

  it('renders a loaded mod as name (id@version)', () => {
    expect(entry('core').mod.toString()).toBe('core (core@1.0.0)');
    expect(entry('core').mod.resolvePath('Items')).toBe('/mods/core/Items');
  });
});
