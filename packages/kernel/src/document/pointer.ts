/**
 * Modweave Kernel — JSON Pointer Navigator
 *
 * Parses slash-delimited pointers (RFC 6901) and walks a DocumentNode tree
 * to find either the addressed value or the (parent, key) pair needed to
 * mutate it.
 *
 * Segment unescaping is two sequential passes per segment: `~1` → `/`
 * first, then `~0` → `~`. With this order `a~01b` decodes to `a~1b`.
 *
 * Array navigation accepts only decimal digit segments within bounds. The
 * `-` segment ("one past the end") is never navigable; the applicator
 * interprets it as the final key of an add.
 */

import { PointerError } from '../errors/index.js';
import { describeKind } from './model.js';
import type { ContainerNode, DocumentNode } from './model.js';

/** The final hop of a pointer: the container to mutate and the key within it. */
export interface PointerTarget {
  readonly parent: ContainerNode;
  readonly key: string;
}

const ARRAY_INDEX = /^\d+$/;

/**
 * Split a pointer into unescaped reference tokens.
 *
 * - `""` is the whole document (no tokens)
 * - `"/"` is the single empty-string key
 *
 * @throws {PointerError} code `invalid-pointer` when a non-empty pointer does not start with `/`
 */
export function parsePointer(pointer: string): string[] {
  if (pointer === '') return [];
  if (!pointer.startsWith('/')) {
    throw new PointerError(
      `Invalid JSON Pointer "${pointer}": must be empty or start with "/"`,
      pointer,
      'invalid-pointer',
    );
  }
  return pointer
    .slice(1)
    .split('/')
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

/** Escape a single key so it can be embedded as one pointer segment. */
export function escapeSegment(key: string): string {
  return key.replace(/~/g, '~0').replace(/\//g, '~1');
}

/** Build a pointer from unescaped keys. */
export function formatPointer(segments: ReadonlyArray<string>): string {
  return segments.map((s) => '/' + escapeSegment(s)).join('');
}

/**
 * Parse an array index segment. Returns undefined when the segment is not a
 * run of decimal digits (this includes `-`).
 */
export function parseArrayIndex(segment: string): number | undefined {
  return ARRAY_INDEX.test(segment) ? Number(segment) : undefined;
}

/**
 * Step from `node` into its child named `segment`.
 *
 * @throws {PointerError} code `path-not-found` for a missing key, an
 *   out-of-range or non-numeric array index, or a scalar node
 */
function step(node: DocumentNode, segment: string, pointer: string): DocumentNode {
  switch (node.kind) {
    case 'object': {
      const child = node.entries.get(segment);
      if (child === undefined) {
        throw new PointerError(`Path not found: ${pointer} (no key "${segment}")`, pointer, 'path-not-found');
      }
      return child;
    }
    case 'array': {
      const index = parseArrayIndex(segment);
      const child = index === undefined ? undefined : node.items[index];
      if (child === undefined) {
        throw new PointerError(
          `Path not found: ${pointer} (index "${segment}" not in array of length ${node.items.length})`,
          pointer,
          'path-not-found',
        );
      }
      return child;
    }
    case 'scalar':
      throw new PointerError(
        `Path not found: ${pointer} (cannot descend into ${describeKind(node)} at "${segment}")`,
        pointer,
        'path-not-found',
      );
  }
}

/**
 * Return the node a pointer addresses.
 *
 * @throws {PointerError} If the pointer is malformed or any hop is missing
 */
export function resolveValue(document: DocumentNode, pointer: string): DocumentNode {
  let current = document;
  for (const segment of parsePointer(pointer)) {
    current = step(current, segment, pointer);
  }
  return current;
}

/**
 * Return the container holding the pointer's final token, and that token.
 *
 * The final key is not checked for existence: add addresses keys and
 * indices that do not exist yet.
 *
 * @throws {PointerError} If the pointer is the root, is malformed, an
 *   intermediate hop is missing, or the parent is a scalar
 */
export function resolveParent(document: DocumentNode, pointer: string): PointerTarget {
  const segments = parsePointer(pointer);
  const key = segments.pop();
  if (key === undefined) {
    throw new PointerError('Cannot navigate to the parent of the document root', pointer, 'invalid-pointer');
  }

  let current = document;
  for (const segment of segments) {
    current = step(current, segment, pointer);
  }

  if (current.kind === 'scalar') {
    throw new PointerError(
      `Path not found: ${pointer} (parent is ${describeKind(current)}, not a container)`,
      pointer,
      'path-not-found',
    );
  }
  return { parent: current, key };
}

/** True when the pointer addresses an existing node. */
export function hasValue(document: DocumentNode, pointer: string): boolean {
  try {
    resolveValue(document, pointer);
    return true;
  } catch (err: unknown) {
    if (err instanceof PointerError) return false;
    throw err;
  }
}
