/**
 * Modweave Kernel — Error Types
 *
 * Two families of failure exist in the load pipeline:
 *
 * - Fatal resolution errors (ModResolutionError and subclasses). These abort
 *   the whole load pass before any mod content is applied. They carry the
 *   ids an author needs to fix the offending manifest.
 *
 * - Per-item errors (PointerError, PatchOperationError, DocumentParseError).
 *   These are thrown inside the applicator and parsers and are converted to
 *   result values at the kernel boundary, so one bad patch never stops
 *   another from running.
 */

// ---------------------------------------------------------------------------
// Resolution (fatal)
// ---------------------------------------------------------------------------

/**
 * Base class for every error that aborts load-order resolution.
 * Callers catch this type to distinguish "fix the manifests" from I/O errors.
 */
export class ModResolutionError extends Error {
  constructor(
    message: string,
    /** The mod whose manifest triggered the failure. */
    readonly modId: string,
  ) {
    super(message);
    this.name = 'ModResolutionError';
  }
}

/** A hard dependency names a mod that was not discovered. */
export class MissingDependencyError extends ModResolutionError {
  constructor(
    modId: string,
    readonly dependencyId: string,
  ) {
    super(`Mod '${modId}' depends on '${dependencyId}' which is not installed`, modId);
    this.name = 'MissingDependencyError';
  }
}

/**
 * Hard dependencies form a cycle.
 *
 * `cycle` lists the ids along the cycle starting and ending with the mod that
 * was re-entered, e.g. `['a', 'b', 'a']`.
 */
export class CircularDependencyError extends ModResolutionError {
  constructor(
    modId: string,
    readonly cycle: ReadonlyArray<string>,
  ) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, modId);
    this.name = 'CircularDependencyError';
  }
}

/** A hard dependency is present but its version does not satisfy the constraint. */
export class VersionConstraintError extends ModResolutionError {
  constructor(
    modId: string,
    readonly dependencyId: string,
    readonly constraint: string,
    readonly actualVersion: string,
  ) {
    super(
      `Mod '${modId}' requires '${dependencyId} ${constraint}' but found version ${actualVersion}`,
      modId,
    );
    this.name = 'VersionConstraintError';
  }
}

// ---------------------------------------------------------------------------
// Documents and patches (per item)
// ---------------------------------------------------------------------------

export type PointerErrorCode = 'invalid-pointer' | 'path-not-found';

/** A JSON Pointer could not be parsed or does not address an existing location. */
export class PointerError extends Error {
  constructor(
    message: string,
    readonly pointer: string,
    readonly code: PointerErrorCode,
  ) {
    super(message);
    this.name = 'PointerError';
  }
}

export type PatchOperationErrorCode =
  | 'invalid-operation'
  | 'path-not-found'
  | 'type-mismatch'
  | 'index-out-of-range'
  | 'test-failed';

/** A single patch operation was malformed or could not be executed. */
export class PatchOperationError extends Error {
  constructor(
    message: string,
    readonly op: string,
    readonly path: string,
    readonly code: PatchOperationErrorCode,
  ) {
    super(message);
    this.name = 'PatchOperationError';
  }
}

/** Raw text could not be turned into a document (invalid JSON). */
export class DocumentParseError extends Error {
  constructor(
    message: string,
    readonly source?: string | undefined,
  ) {
    super(message);
    this.name = 'DocumentParseError';
  }
}

/** Describe an unknown thrown value for logs without assuming it is an Error. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
