/**
 * Modweave Kernel — Dependency Entry and Version Tests
 */

import { describe, it, expect } from 'vitest';
import { compareVersions, parseDependency, satisfiesConstraint } from '../src/index.js';

describe('parseDependency', () => {
  it('a bare id has no constraint', () => {
    expect(parseDependency('core-pack')).toEqual({ id: 'core-pack' });
  });

  it('parses an operator and version', () => {
    expect(parseDependency('core-pack >= 1.2.0')).toEqual({
      id: 'core-pack',
      constraint: { operator: '>=', version: '1.2.0' },
    });
  });

  it('accepts no whitespace around the operator and a prerelease', () => {
    expect(parseDependency('core-pack==2.0.0-beta.1')).toEqual({
      id: 'core-pack',
      constraint: { operator: '==', version: '2.0.0-beta.1' },
    });
  });

  it('defaults the operator to >=', () => {
    expect(parseDependency('core-pack 1.4')).toEqual({
      id: 'core-pack',
      constraint: { operator: '>=', version: '1.4' },
    });
  });

  it('digits attached to an id stay part of the id', () => {
    expect(parseDependency('core1.0')).toEqual({ id: 'core1.0' });
  });

  it('rejects malformed entries', () => {
    expect(parseDependency('')).toBeUndefined();
    expect(parseDependency('core >=')).toBeUndefined();
    expect(parseDependency('two words')).toBeUndefined();
  });
});

describe('compareVersions', () => {
  it('compares numerically, not lexically', () => {
    expect(compareVersions('1.2.0', '1.10.0')).toBeLessThan(0);
  });

  it('treats missing parts as zero', () => {
    expect(compareVersions('1.0', '1.0.0')).toBe(0);
  });

  it('sorts a prerelease before its release', () => {
    expect(compareVersions('1.0.0-beta', '1.0.0')).toBeLessThan(0);
    expect(compareVersions('1.0.0', '1.0.0-beta')).toBeGreaterThan(0);
  });

  it('ignores build text after the version', () => {
    expect(compareVersions('1.2.3+build.7', '1.2.3')).toBe(0);
  });

  it('is undefined for unparseable input', () => {
    expect(compareVersions('latest', '1.0.0')).toBeUndefined();
  });
});

describe('satisfiesConstraint', () => {
  const spec = (operator: '>=' | '>' | '==' | '<=' | '<', version: string) => ({
    id: 'dep',
    constraint: { operator, version },
  });

  it('is always true without a constraint', () => {
    expect(satisfiesConstraint({ id: 'dep' }, 'garbage')).toBe(true);
  });

  it('applies each operator', () => {
    expect(satisfiesConstraint(spec('>=', '1.0.0'), '1.0.0')).toBe(true);
    expect(satisfiesConstraint(spec('>', '1.0.0'), '1.0.0')).toBe(false);
    expect(satisfiesConstraint(spec('==', '1.0'), '1.0.0')).toBe(true);
    expect(satisfiesConstraint(spec('<=', '2.0.0'), '2.0.1')).toBe(false);
    expect(satisfiesConstraint(spec('<', '2.0.0'), '1.9.9')).toBe(true);
  });

  it('an unparseable installed version never satisfies a constraint', () => {
    expect(satisfiesConstraint(spec('>=', '1.0.0'), 'dev')).toBe(false);
  });
});
