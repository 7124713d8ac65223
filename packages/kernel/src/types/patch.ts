/**
 * Modweave Kernel — Patch Types
 *
 * Patches follow RFC 6902. A mod ships one patch per file; each names a
 * target document in the shared content store and an ordered list of
 * operations.
 */

import type { DocumentNode, JsonValue } from '../document/model.js';
import type { PatchOperationError } from '../errors/index.js';

export const PATCH_OPS = ['add', 'remove', 'replace', 'move', 'copy', 'test'] as const;

export type PatchOp = (typeof PATCH_OPS)[number];

/**
 * One RFC 6902 operation.
 *
 * Shape invariants (checked by checkOperationShape before execution):
 * - `path` begins with `/`
 * - add, replace and test carry `value`
 * - move and copy carry `from`
 */
export interface PatchOperation {
  readonly op: PatchOp;
  readonly path: string;
  readonly value?: JsonValue | undefined;
  readonly from?: string | undefined;
}

export interface ModPatch {
  /** Content document key or template id the patch applies to. */
  readonly target: string;
  readonly description: string;
  readonly operations: ReadonlyArray<PatchOperation>;
  /** Patch file the patch was read from, when it came from disk. */
  readonly source?: string | undefined;
}

/**
 * Outcome of applying one patch.
 *
 * The document is mutated in place and returned in both arms. On failure,
 * `applied` operations before `failedIndex` remain in effect.
 */
export type PatchResult =
  | {
      readonly ok: true;
      readonly document: DocumentNode;
      readonly applied: number;
    }
  | {
      readonly ok: false;
      readonly document: DocumentNode;
      readonly applied: number;
      readonly failedIndex: number;
      readonly error: PatchOperationError;
    };
