/**
 * Modweave Kernel — Dependency Resolver Tests
 *
 * resolver/order: every mod appears once, after its hard dependencies
 * resolver/priority: lower priority visits first; ties keep discovery order
 * resolver/soft: loadAfter reorders when present, never fails; loadBefore is ignored
 * resolver/fatal: missing, circular and version-mismatched hard dependencies throw
 *
 * All tests are pure: manifests are built in memory.
 */

import { describe, it, expect } from 'vitest';
import {
  CircularDependencyError,
  DependencyResolver,
  LoadLogger,
  MemoryLogSink,
  MissingDependencyError,
  VersionConstraintError,
  sortByPriority,
} from '../src/index.js';
import type { ModManifest } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function manifest(id: string, overrides: Partial<ModManifest> = {}): ModManifest {
  return {
    id,
    name: id,
    author: 'test',
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
    ...overrides,
  };
}

function order(manifests: ModManifest[]): string[] {
  return new DependencyResolver().resolve(manifests).map((m) => m.id);
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe('resolver/order', () => {
  it('places dependencies before dependents', () => {
    const a = manifest('a', { dependencies: ['b'] });
    const b = manifest('b', { dependencies: ['c'] });
    const c = manifest('c');
    expect(order([a, b, c])).toEqual(['c', 'b', 'a']);
  });

  it('shared dependencies appear once', () => {
    const a = manifest('a', { dependencies: ['core'] });
    const b = manifest('b', { dependencies: ['core'] });
    expect(order([a, b, manifest('core')])).toEqual(['core', 'a', 'b']);
  });

  it('returns an empty order for no mods', () => {
    expect(order([])).toEqual([]);
  });

  it('does not mutate its input', () => {
    const input = [manifest('late', { priority: 5 }), manifest('early', { priority: 1 })];
    order(input);
    expect(input.map((m) => m.id)).toEqual(['late', 'early']);
  });
});

describe('resolver/priority', () => {
  it('visits lower priority first', () => {
    expect(order([manifest('x', { priority: 5 }), manifest('y', { priority: 1 })])).toEqual(['y', 'x']);
  });

  it('keeps discovery order for equal priority', () => {
    expect(order([manifest('c'), manifest('a'), manifest('b')])).toEqual(['c', 'a', 'b']);
  });

  it('a dependency loads first even with a higher priority value', () => {
    const a = manifest('a', { priority: 0, dependencies: ['b'] });
    const b = manifest('b', { priority: 10 });
    expect(order([a, b])).toEqual(['b', 'a']);
  });

  it('sortByPriority is stable', () => {
    const sorted = sortByPriority([
      manifest('p2', { priority: 2 }),
      manifest('q1', { priority: 1 }),
      manifest('r2', { priority: 2 }),
      manifest('s1', { priority: 1 }),
    ]);
    expect(sorted.map((m) => m.id)).toEqual(['q1', 's1', 'p2', 'r2']);
  });
});

// ---------------------------------------------------------------------------
// Soft ordering
// ---------------------------------------------------------------------------

describe('resolver/soft', () => {
  it('loadAfter pulls a present mod earlier', () => {
    expect(order([manifest('a', { loadAfter: ['b'] }), manifest('b')])).toEqual(['b', 'a']);
  });

  it('loadAfter naming an absent mod is ignored', () => {
    expect(order([manifest('a', { loadAfter: ['nope'] })])).toEqual(['a']);
  });

  it('mutual loadAfter hints do not fail', () => {
    const a = manifest('a', { loadAfter: ['b'] });
    const b = manifest('b', { loadAfter: ['a'] });
    expect(order([a, b])).toEqual(['b', 'a']);
  });

  it('loadBefore is not used for ordering', () => {
    expect(order([manifest('b'), manifest('a', { loadBefore: ['b'] })])).toEqual(['b', 'a']);
  });
});

// ---------------------------------------------------------------------------
// Fatal errors
// ---------------------------------------------------------------------------

describe('resolver/fatal', () => {
  it('a missing hard dependency names both mods', () => {
    const err = thrownBy(() => order([manifest('a', { dependencies: ['ghost'] })]));
    expect(err).toBeInstanceOf(MissingDependencyError);
    if (err instanceof MissingDependencyError) {
      expect(err.modId).toBe('a');
      expect(err.dependencyId).toBe('ghost');
      expect(err.message).toBe("Mod 'a' depends on 'ghost' which is not installed");
    }
  });

  it('a two-mod cycle is reported with its path', () => {
    const err = thrownBy(() =>
      order([manifest('A', { dependencies: ['B'] }), manifest('B', { dependencies: ['A'] })]),
    );
    expect(err).toBeInstanceOf(CircularDependencyError);
    if (err instanceof CircularDependencyError) {
      expect(err.cycle).toEqual(['A', 'B', 'A']);
      expect(err.modId).toBe('B');
      expect(err.message).toBe('Circular dependency detected: A -> B -> A');
    }
  });

  it('a self-dependency is a cycle', () => {
    const err = thrownBy(() => order([manifest('solo', { dependencies: ['solo'] })]));
    expect(err).toBeInstanceOf(CircularDependencyError);
    if (err instanceof CircularDependencyError) {
      expect(err.cycle).toEqual(['solo', 'solo']);
    }
  });

  it('an unsatisfied version constraint is fatal', () => {
    const err = thrownBy(() =>
      order([manifest('a', { dependencies: ['b >= 2.0.0'] }), manifest('b', { version: '1.5.0' })]),
    );
    expect(err).toBeInstanceOf(VersionConstraintError);
    if (err instanceof VersionConstraintError) {
      expect(err.dependencyId).toBe('b');
      expect(err.constraint).toBe('>= 2.0.0');
      expect(err.actualVersion).toBe('1.5.0');
    }
  });

  it('a satisfied version constraint resolves normally', () => {
    expect(order([manifest('a', { dependencies: ['b >= 1.0.0'] }), manifest('b', { version: '1.5.0' })])).toEqual([
      'b',
      'a',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Duplicates and logging
// ---------------------------------------------------------------------------

describe('resolver/duplicates', () => {
  it('keeps both manifests that share an id, first one first', () => {
    const first = manifest('dup', { directory: '/mods/dup-1' });
    const second = manifest('dup', { directory: '/mods/dup-2' });
    const resolved = new DependencyResolver().resolve([first, second]);
    expect(resolved.map((m) => m.directory)).toEqual(['/mods/dup-1', '/mods/dup-2']);
  });
});

describe('resolver/logging', () => {
  it('records the final order', () => {
    const sink = new MemoryLogSink();
    new DependencyResolver(new LoadLogger(sink)).resolve([manifest('a', { dependencies: ['b'] }), manifest('b')]);
    const events = sink.named('resolution.completed');
    expect(events).toHaveLength(1);
    expect(events[0]?.fields).toEqual({ order: ['b', 'a'] });
  });
});
