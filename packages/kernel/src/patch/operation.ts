/**
 * Modweave Kernel — Patch Operation Shape Validation
 *
 * Two entry points:
 *
 *   parseOperation()      — unknown JSON (from a patch file) → PatchOperation
 *   checkOperationShape() — re-check a typed operation right before it runs
 *
 * Both enforce the same rules: op is one of the six RFC 6902 kinds, path
 * starts with `/`, add/replace/test carry `value`, move/copy carry a `from`
 * that starts with `/`.
 */

import { PatchOperationError } from '../errors/index.js';
import { fromJson, toJson } from '../document/model.js';
import type { JsonValue } from '../document/model.js';
import { PATCH_OPS } from '../types/patch.js';
import type { PatchOp, PatchOperation } from '../types/patch.js';
import type { ValidationError, ValidationResult } from '../types/validation.js';

const OPS_REQUIRING_VALUE: ReadonlySet<PatchOp> = new Set<PatchOp>(['add', 'replace', 'test']);
const OPS_REQUIRING_FROM: ReadonlySet<PatchOp> = new Set<PatchOp>(['move', 'copy']);

export function isPatchOp(value: string): value is PatchOp {
  return PATCH_OPS.some((op) => op === value);
}

/**
 * Check a typed operation. Returns the error to raise, or undefined when the
 * operation is well-formed.
 */
export function checkOperationShape(operation: PatchOperation): PatchOperationError | undefined {
  const { op, path } = operation;
  if (!isPatchOp(op)) {
    return new PatchOperationError(`Unknown operation: ${String(op)}`, String(op), path, 'invalid-operation');
  }
  if (typeof path !== 'string' || !path.startsWith('/')) {
    return new PatchOperationError(
      `Operation '${op}' path must start with "/": ${JSON.stringify(path)}`,
      op,
      String(path),
      'invalid-operation',
    );
  }
  if (OPS_REQUIRING_VALUE.has(op) && operation.value === undefined) {
    return new PatchOperationError(`Operation '${op}' at ${path} requires a value`, op, path, 'invalid-operation');
  }
  if (OPS_REQUIRING_FROM.has(op)) {
    if (operation.from === undefined) {
      return new PatchOperationError(`Operation '${op}' at ${path} requires 'from'`, op, path, 'invalid-operation');
    }
    if (!operation.from.startsWith('/')) {
      return new PatchOperationError(
        `Operation '${op}' from must start with "/": ${JSON.stringify(operation.from)}`,
        op,
        path,
        'invalid-operation',
      );
    }
  }
  return undefined;
}

/**
 * Turn one raw operation object from a patch file into a PatchOperation.
 *
 * `op` is matched case-insensitively. `value` may be any JSON value
 * including null; only its absence is an error.
 *
 * @param context - Location used in error messages, e.g. `patches/a.json operations[2]`
 */
export function parseOperation(raw: unknown, context: string): ValidationResult<PatchOperation> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: [{ message: 'Operation must be an object', context }] };
  }

  const errors: ValidationError[] = [];
  const opRaw: unknown = Reflect.get(raw, 'op');
  const pathRaw: unknown = Reflect.get(raw, 'path');
  const fromRaw: unknown = Reflect.get(raw, 'from');
  const hasValue = Object.prototype.hasOwnProperty.call(raw, 'value');

  if (typeof opRaw !== 'string') {
    errors.push({ message: "Operation is missing string field 'op'", context });
  }
  if (typeof pathRaw !== 'string') {
    errors.push({ message: "Operation is missing string field 'path'", context });
  }
  if (fromRaw !== undefined && typeof fromRaw !== 'string') {
    errors.push({ message: "Operation field 'from' must be a string", context });
  }
  if (typeof opRaw !== 'string' || typeof pathRaw !== 'string' || errors.length > 0) {
    return { ok: false, errors };
  }

  const op = opRaw.toLowerCase();
  if (!isPatchOp(op)) {
    return { ok: false, errors: [{ message: `Unknown operation: ${opRaw}`, context }] };
  }

  let value: JsonValue | undefined;
  if (hasValue) {
    try {
      value = toJson(fromJson(Reflect.get(raw, 'value')));
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      return { ok: false, errors: [{ message: `Operation value is not JSON: ${detail}`, context }] };
    }
  }

  const operation: PatchOperation = {
    op,
    path: pathRaw,
    value,
    from: typeof fromRaw === 'string' ? fromRaw : undefined,
  };

  const shapeError = checkOperationShape(operation);
  if (shapeError !== undefined) {
    return { ok: false, errors: [{ message: shapeError.message, context }] };
  }
  return { ok: true, value: operation };
}
