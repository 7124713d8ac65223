/**
 * Modweave Kernel — Dependency Resolver
 *
 * Computes the total load order for a set of discovered manifests.
 *
 * Algorithm (depth-first topological sort):
 * 1. Stable-sort manifests by priority ascending. Equal priorities keep
 *    discovery order. This is the visitation order, not the final order.
 * 2. Visit each manifest in that order. A visit marks the mod `visiting`,
 *    then walks its hard dependencies in manifest order:
 *      absent                → MissingDependencyError (fatal)
 *      version unsatisfied   → VersionConstraintError (fatal)
 *      visiting              → CircularDependencyError (fatal)
 *      unvisited             → recurse
 *      done                  → skip
 * 3. Then its `loadAfter` hints in manifest order: a present, unvisited mod
 *    is recursed into; absent or in-progress mods are ignored. Soft hints
 *    never fail resolution.
 * 4. Mark `done` and append to the output.
 *
 * `loadBefore` is carried on the manifest but is not consulted here.
 *
 * When two manifests share an id, dependency lookups bind to the one visited
 * first. Both still appear in the output; the orchestrator decides what to do
 * with the duplicate.
 */

import {
  CircularDependencyError,
  MissingDependencyError,
  VersionConstraintError,
} from '../errors/index.js';
import { LoadLogger } from '../logging/load-logger.js';
import type { ModManifest } from '../types/manifest.js';
import { formatConstraint, parseDependency, satisfiesConstraint } from './dependency.js';

type VisitState = 'unvisited' | 'visiting' | 'done';

/** Stable sort by priority ascending. Does not mutate the input. */
export function sortByPriority(manifests: ReadonlyArray<ModManifest>): ModManifest[] {
  return manifests
    .map((manifest, index) => ({ manifest, index }))
    .sort((a, b) => a.manifest.priority - b.manifest.priority || a.index - b.index)
    .map((entry) => entry.manifest);
}

export class DependencyResolver {
  constructor(private readonly logger: LoadLogger = new LoadLogger()) {}

  /**
   * Resolve the load order.
   *
   * @returns Every input manifest exactly once, dependencies before dependents
   * @throws {MissingDependencyError} A hard dependency was not discovered
   * @throws {VersionConstraintError} A hard dependency's version is out of range
   * @throws {CircularDependencyError} Hard dependencies form a cycle
   */
  resolve(manifests: ReadonlyArray<ModManifest>): ModManifest[] {
    const ordered = sortByPriority(manifests);

    const byId = new Map<string, ModManifest>();
    for (const manifest of ordered) {
      if (!byId.has(manifest.id)) byId.set(manifest.id, manifest);
    }

    const state = new Map<ModManifest, VisitState>();
    const stack: string[] = [];
    const output: ModManifest[] = [];

    const stateOf = (m: ModManifest): VisitState => state.get(m) ?? 'unvisited';

    const visit = (manifest: ModManifest): void => {
      state.set(manifest, 'visiting');
      stack.push(manifest.id);

      for (const entry of manifest.dependencies) {
        const spec = parseDependency(entry) ?? { id: entry.trim() };
        const dependency = byId.get(spec.id);
        if (dependency === undefined) {
          throw new MissingDependencyError(manifest.id, spec.id);
        }
        if (!satisfiesConstraint(spec, dependency.version)) {
          throw new VersionConstraintError(manifest.id, spec.id, formatConstraint(spec), dependency.version);
        }
        switch (stateOf(dependency)) {
          case 'unvisited':
            visit(dependency);
            break;
          case 'visiting': {
            const start = stack.indexOf(dependency.id);
            throw new CircularDependencyError(manifest.id, [...stack.slice(start), dependency.id]);
          }
          case 'done':
            break;
        }
      }

      for (const id of manifest.loadAfter) {
        const after = byId.get(id);
        if (after !== undefined && stateOf(after) === 'unvisited') {
          visit(after);
        }
      }

      stack.pop();
      state.set(manifest, 'done');
      output.push(manifest);
    };

    for (const manifest of ordered) {
      if (stateOf(manifest) === 'unvisited') {
        visit(manifest);
      }
    }

    this.logger.info('resolution.completed', `Resolved load order for ${output.length} mod(s)`, {
      fields: { order: output.map((m) => m.id) },
    });
    return output;
  }
}
