/**
 * @modweave/kernel
 *
 * Pure mod-ordering and document-patching logic: document model, JSON
 * Pointer navigation, RFC 6902 patch application, dependency resolution,
 * error types and the load-event logging contract.
 *
 * This package is side-effect free. It contains no imports of node:fs or any
 * other I/O API. Filesystem access, log persistence and script execution
 * are injected through the interfaces in ./adapters.
 */

// Document model
export type {
  ArrayNode,
  ContainerNode,
  DocumentNode,
  JsonScalar,
  JsonValue,
  ObjectNode,
  ScalarNode,
} from './document/model.js';
export {
  arrayNode,
  assertNever,
  cloneNode,
  describeKind,
  formatDocument,
  fromJson,
  isContainer,
  objectNode,
  parseDocument,
  scalarNode,
  serializeNode,
  toJson,
} from './document/model.js';

// JSON Pointer
export type { PointerTarget } from './document/pointer.js';
export {
  escapeSegment,
  formatPointer,
  hasValue,
  parseArrayIndex,
  parsePointer,
  resolveParent,
  resolveValue,
} from './document/pointer.js';

// Patches
export type { ModPatch, PatchOp, PatchOperation, PatchResult } from './types/patch.js';
export { PATCH_OPS } from './types/patch.js';
export { checkOperationShape, isPatchOp, parseOperation } from './patch/operation.js';
export { PatchApplicator } from './patch/applicator.js';

// Manifests and resolution
export type { DependencySpec, ModManifest, VersionOperator } from './types/manifest.js';
export {
  MANIFEST_VERSION_PATTERN,
  compareVersions,
  formatConstraint,
  parseDependency,
  satisfiesConstraint,
} from './resolution/dependency.js';
export { DependencyResolver, sortByPriority } from './resolution/resolver.js';

// Validation results
export type { ValidationError, ValidationResult } from './types/validation.js';

// Errors
export type { PatchOperationErrorCode, PointerErrorCode } from './errors/index.js';
export {
  CircularDependencyError,
  DocumentParseError,
  MissingDependencyError,
  ModResolutionError,
  PatchOperationError,
  PointerError,
  VersionConstraintError,
  errorMessage,
} from './errors/index.js';

// Logging
export type { LoadEvent, LoadEventField, LogLevel } from './types/events.js';
export { LOG_LEVEL_ORDER, isLogLevel } from './types/events.js';
export type { LogSink } from './logging/log-sink.js';
export { CompositeLogSink, MemoryLogSink } from './logging/log-sink.js';
export type { LoadEventContext } from './logging/load-logger.js';
export { LoadLogger } from './logging/load-logger.js';

// Collaborator interfaces (implementations live outside the kernel)
export type {
  ContentCache,
  ModFileSystem,
  ScriptContext,
  ScriptHost,
  ScriptInstance,
} from './adapters/index.js';
