/**
 * Modweave CLI — Last Load Record
 *
 * `modweave load` writes a summary of its run to `<home>/state/last-load.json`;
 * `modweave status` reads it back.
 */

import type { LoadSummary } from '@modweave/mod-loader';

export const LAST_LOAD_FILE = 'last-load.json';

export interface LastLoadRecord {
  readonly completed_at: string;
  readonly mods_dir: string;
  readonly order: ReadonlyArray<string>;
  readonly loaded: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<string>;
  readonly rejected: ReadonlyArray<string>;
  readonly patches: {
    readonly applied: number;
    readonly failed: number;
    readonly target_missing: number;
  };
  readonly documents: number;
}

export function toLastLoadRecord(
  summary: LoadSummary,
  modsDir: string,
  documents: number,
  completedAt: Date = new Date(),
): LastLoadRecord {
  const count = (status: string): number => summary.patches.filter((p) => p.status === status).length;
  return {
    completed_at: completedAt.toISOString(),
    mods_dir: modsDir,
    order: summary.order,
    loaded: summary.loaded,
    skipped: summary.skipped.map((s) => s.directory),
    rejected: summary.rejected.map((r) => r.directory),
    patches: {
      applied: count('applied'),
      failed: count('failed'),
      target_missing: count('target-missing'),
    },
    documents,
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isLastLoadRecord(value: unknown): value is LastLoadRecord {
  if (!isRecord(value)) return false;
  const patches = value['patches'];
  return (
    typeof value['completed_at'] === 'string' &&
    typeof value['mods_dir'] === 'string' &&
    isStringArray(value['order']) &&
    isStringArray(value['loaded']) &&
    isStringArray(value['skipped']) &&
    isStringArray(value['rejected']) &&
    typeof value['documents'] === 'number' &&
    isRecord(patches) &&
    typeof patches['applied'] === 'number' &&
    typeof patches['failed'] === 'number' &&
    typeof patches['target_missing'] === 'number'
  );
}
