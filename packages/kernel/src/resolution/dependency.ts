/**
 * Modweave Kernel — Dependency Entries and Version Constraints
 *
 * A hard dependency entry is either a bare mod id or an id followed by a
 * version constraint:
 *
 *   core-pack
 *   core-pack >= 1.2.0
 *   core-pack==2.0.0-beta.1
 *   core-pack 1.4        (operator defaults to >=)
 *
 * Versions compare numerically on major.minor.patch (missing parts are 0).
 * A prerelease sorts before the release it precedes; two prereleases
 * compare as strings.
 */

import type { DependencySpec, VersionOperator } from '../types/manifest.js';

const DEPENDENCY_PATTERN =
  /^(?<id>[^\s<>=]+)(?:\s*(?<operator>>=|<=|==|>|<)?\s*(?<version>\d+(?:\.\d+){0,2}(?:-[\w.]+)?))?$/;

/** Manifest versions must start with major.minor.patch. */
export const MANIFEST_VERSION_PATTERN = /^\d+\.\d+\.\d+/;

interface ParsedVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: string;
}

/**
 * Parse a dependency entry. Returns undefined when the entry does not match
 * the grammar.
 */
export function parseDependency(entry: string): DependencySpec | undefined {
  const match = DEPENDENCY_PATTERN.exec(entry.trim());
  const id = match?.groups?.['id'];
  if (match === null || id === undefined) return undefined;

  const version = match.groups?.['version'];
  if (version === undefined) {
    // "core1.0" is an id, not an id plus version: only whitespace or an
    // operator separates the two.
    return { id };
  }
  const operator = toOperator(match.groups?.['operator']);
  return { id, constraint: { operator, version } };
}

function toOperator(raw: string | undefined): VersionOperator {
  switch (raw) {
    case '>':
    case '==':
    case '<=':
    case '<':
      return raw;
    default:
      return '>=';
  }
}

function parseVersion(version: string): ParsedVersion | undefined {
  const dash = version.indexOf('-');
  const core = dash === -1 ? version : version.slice(0, dash);
  const prerelease = dash === -1 ? '' : version.slice(dash + 1);
  const parts = core.split('.');
  if (parts.length < 1 || parts.length > 3) return undefined;

  const numbers = parts.map((p) => (/^\d+$/.test(p) ? Number(p) : Number.NaN));
  if (numbers.some(Number.isNaN)) return undefined;
  return {
    major: numbers[0] ?? 0,
    minor: numbers[1] ?? 0,
    patch: numbers[2] ?? 0,
    prerelease,
  };
}

/**
 * Compare two version strings.
 *
 * @returns negative, zero or positive; undefined if either is unparseable
 */
export function compareVersions(a: string, b: string): number | undefined {
  // Manifest versions may carry build text after major.minor.patch.
  const va = parseVersion(leadingVersion(a));
  const vb = parseVersion(leadingVersion(b));
  if (va === undefined || vb === undefined) return undefined;

  if (va.major !== vb.major) return va.major - vb.major;
  if (va.minor !== vb.minor) return va.minor - vb.minor;
  if (va.patch !== vb.patch) return va.patch - vb.patch;

  if (va.prerelease === vb.prerelease) return 0;
  if (va.prerelease === '') return 1;
  if (vb.prerelease === '') return -1;
  return va.prerelease < vb.prerelease ? -1 : 1;
}

function leadingVersion(version: string): string {
  const match = /^\d+(?:\.\d+){0,2}(?:-[\w.]+)?/.exec(version);
  return match === null ? version : match[0];
}

/** True when `actualVersion` satisfies the dependency's constraint (or it has none). */
export function satisfiesConstraint(spec: DependencySpec, actualVersion: string): boolean {
  if (spec.constraint === undefined) return true;
  const cmp = compareVersions(actualVersion, spec.constraint.version);
  if (cmp === undefined) return false;
  switch (spec.constraint.operator) {
    case '>=':
      return cmp >= 0;
    case '>':
      return cmp > 0;
    case '==':
      return cmp === 0;
    case '<=':
      return cmp <= 0;
    case '<':
      return cmp < 0;
  }
}

/** Render a constraint for messages, e.g. `>= 1.2.0`. */
export function formatConstraint(spec: DependencySpec): string {
  return spec.constraint === undefined ? '' : `${spec.constraint.operator} ${spec.constraint.version}`;
}
