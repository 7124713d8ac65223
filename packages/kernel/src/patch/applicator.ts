/**
 * Modweave Kernel — Patch Applicator
 *
 * Applies RFC 6902 operations to a DocumentNode tree.
 *
 * Execution model:
 * - Operations run strictly in the order given; each sees the effects of the
 *   ones before it.
 * - Each operation is shape-checked immediately before it runs. A shape
 *   violation or an execution failure stops the remaining operations of that
 *   patch.
 * - Not transactional. The document passed in is mutated in place and is the
 *   same object returned in the result; operations applied before a failure
 *   stay applied. Callers that need isolation clone first (cloneNode).
 *
 * The root pointer cannot be the target of add/remove/replace/move/copy
 * (paths must start with `/`), so the returned document is always the
 * object that was passed in.
 */

import { PatchOperationError, PointerError, errorMessage } from '../errors/index.js';
import { cloneNode, describeKind, fromJson, serializeNode } from '../document/model.js';
import type { ArrayNode, ContainerNode, DocumentNode, JsonValue } from '../document/model.js';
import { parseArrayIndex, resolveParent, resolveValue } from '../document/pointer.js';
import { LoadLogger } from '../logging/load-logger.js';
import type { ModPatch, PatchOp, PatchOperation, PatchResult } from '../types/patch.js';
import { checkOperationShape } from './operation.js';

export class PatchApplicator {
  constructor(private readonly logger: LoadLogger = new LoadLogger()) {}

  /**
   * Apply every operation of `patch` to `document`, in order.
   *
   * Never throws for operation failures: they are returned as
   * `{ ok: false, failedIndex, error }` with the partially patched document.
   */
  applyPatch(document: DocumentNode, patch: ModPatch): PatchResult {
    let applied = 0;

    for (const [index, operation] of patch.operations.entries()) {
      try {
        const shapeError = checkOperationShape(operation);
        if (shapeError !== undefined) {
          throw shapeError;
        }
        this.applyOperation(document, operation);
        applied++;
      } catch (err: unknown) {
        const error = toOperationError(err, operation);
        this.logger.warn(
          'patch.operation_failed',
          `Failed to apply ${operation.op} ${operation.path} to ${patch.target}: ${error.message}`,
          {
            fields: {
              target: patch.target,
              op: String(operation.op),
              path: String(operation.path),
              index,
              code: error.code,
              skipped: patch.operations.length - index - 1,
            },
          },
        );
        return { ok: false, document, applied, failedIndex: index, error };
      }
    }

    this.logger.debug('patch.applied', `Applied ${applied} operation(s) to ${patch.target}`, {
      fields: { target: patch.target, operations: applied },
    });
    return { ok: true, document, applied };
  }

  /**
   * Apply a single operation. Throws PatchOperationError or PointerError on
   * failure; a failed operation leaves the document as it found it.
   */
  applyOperation(document: DocumentNode, operation: PatchOperation): void {
    const { op, path } = operation;
    switch (op) {
      case 'add':
        addAt(document, path, valueNode(operation), op);
        return;
      case 'remove':
        removeAt(document, path, op);
        return;
      case 'replace':
        replaceAt(document, path, valueNode(operation), op);
        return;
      case 'move': {
        const from = fromPointer(operation);
        if (path.startsWith(`${from}/`)) {
          throw new PatchOperationError(`Cannot move ${from} into its own child ${path}`, op, path, 'invalid-operation');
        }
        const detached = detachAt(document, from, op);
        try {
          addAt(document, path, detached.node, op);
        } catch (err: unknown) {
          detached.restore();
          throw err;
        }
        return;
      }
      case 'copy': {
        const source = resolveValue(document, fromPointer(operation));
        addAt(document, path, cloneNode(source), op);
        return;
      }
      case 'test': {
        const actual = serializeNode(resolveValue(document, path));
        const expected = serializeNode(valueNode(operation));
        if (actual !== expected) {
          throw new PatchOperationError(
            `Test failed at ${path}: expected ${expected} but got ${actual}`,
            op,
            path,
            'test-failed',
          );
        }
        return;
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Operation primitives
// ---------------------------------------------------------------------------

function addAt(document: DocumentNode, path: string, value: DocumentNode, op: PatchOp): void {
  const { parent, key } = resolveParent(document, path);
  if (parent.kind === 'object') {
    parent.entries.set(key, value);
    return;
  }
  if (key === '-') {
    parent.items.push(value);
    return;
  }
  const index = arrayIndex(parent, key, path, op);
  if (index > parent.items.length) {
    throw new PatchOperationError(
      `Array index out of range at ${path}: ${index} (length ${parent.items.length})`,
      op,
      path,
      'index-out-of-range',
    );
  }
  parent.items.splice(index, 0, value);
}

function removeAt(document: DocumentNode, path: string, op: PatchOp): DocumentNode {
  const { parent, key } = resolveParent(document, path);
  if (parent.kind === 'object') {
    const existing = parent.entries.get(key);
    if (existing === undefined) {
      throw new PatchOperationError(`Path does not exist: ${path}`, op, path, 'path-not-found');
    }
    parent.entries.delete(key);
    return existing;
  }
  const index = existingIndex(parent, key, path, op);
  const [removed] = parent.items.splice(index, 1);
  if (removed === undefined) {
    throw new PatchOperationError(`Array index out of range at ${path}: ${index}`, op, path, 'index-out-of-range');
  }
  return removed;
}

/** Remove the value at `path`, keeping enough to put it back where it was. */
function detachAt(
  document: DocumentNode,
  path: string,
  op: PatchOp,
): { node: DocumentNode; restore: () => void } {
  const { parent, key } = resolveParent(document, path);
  if (parent.kind === 'array') {
    const index = existingIndex(parent, key, path, op);
    const node = removeAt(document, path, op);
    return { node, restore: () => parent.items.splice(index, 0, node) };
  }
  const entries = [...parent.entries];
  const node = removeAt(document, path, op);
  return {
    node,
    restore: () => {
      parent.entries.clear();
      for (const [entryKey, value] of entries) parent.entries.set(entryKey, value);
    },
  };
}

function replaceAt(document: DocumentNode, path: string, value: DocumentNode, op: PatchOp): void {
  const { parent, key } = resolveParent(document, path);
  if (parent.kind === 'object') {
    if (!parent.entries.has(key)) {
      throw new PatchOperationError(`Path does not exist: ${path}`, op, path, 'path-not-found');
    }
    // Map.set on an existing key keeps its position.
    parent.entries.set(key, value);
    return;
  }
  parent.items[existingIndex(parent, key, path, op)] = value;
}

/** Parse an array key, rejecting `-` and anything that is not a decimal index. */
function arrayIndex(parent: ContainerNode, key: string, path: string, op: PatchOp): number {
  const index = parseArrayIndex(key);
  if (index === undefined) {
    throw new PatchOperationError(
      `Invalid array index "${key}" at ${path} (target is ${describeKind(parent)})`,
      op,
      path,
      'type-mismatch',
    );
  }
  return index;
}

function existingIndex(parent: ArrayNode, key: string, path: string, op: PatchOp): number {
  const index = arrayIndex(parent, key, path, op);
  if (index >= parent.items.length) {
    throw new PatchOperationError(
      `Array index out of range at ${path}: ${index} (length ${parent.items.length})`,
      op,
      path,
      'index-out-of-range',
    );
  }
  return index;
}

function valueNode(operation: PatchOperation): DocumentNode {
  const value: JsonValue | undefined = operation.value;
  if (value === undefined) {
    throw new PatchOperationError(
      `Operation '${operation.op}' at ${operation.path} requires a value`,
      operation.op,
      operation.path,
      'invalid-operation',
    );
  }
  return fromJson(value);
}

function fromPointer(operation: PatchOperation): string {
  if (operation.from === undefined) {
    throw new PatchOperationError(
      `Operation '${operation.op}' at ${operation.path} requires 'from'`,
      operation.op,
      operation.path,
      'invalid-operation',
    );
  }
  return operation.from;
}

/** Normalise anything thrown while applying an operation. */
function toOperationError(err: unknown, operation: PatchOperation): PatchOperationError {
  if (err instanceof PatchOperationError) return err;
  const op = String(operation.op);
  const path = String(operation.path);
  if (err instanceof PointerError) {
    return new PatchOperationError(
      err.message,
      op,
      path,
      err.code === 'path-not-found' ? 'path-not-found' : 'invalid-operation',
    );
  }
  return new PatchOperationError(errorMessage(err), op, path, 'invalid-operation');
}
