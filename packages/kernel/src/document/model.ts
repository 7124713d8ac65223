/**
 * Modweave Kernel — Document Model
 *
 * The in-memory tree every patch operation acts on. A node is exactly one of:
 *
 *   ObjectNode  — ordered key → node mapping (insertion order preserved;
 *                 overwriting a key keeps its original position)
 *   ArrayNode   — ordered sequence of nodes
 *   ScalarNode  — string | number | boolean | null leaf
 *
 * The union is closed and discriminated by `kind`. Code that branches on a
 * node switches on `kind` and ends in assertNever(), so adding a variant is
 * a compile error everywhere a case is missing.
 *
 * Conversion to and from plain JSON values happens only at the edges
 * (content loading, patch values, output). Inside the kernel the tree is
 * always a DocumentNode.
 */

import { DocumentParseError } from '../errors/index.js';

// ---------------------------------------------------------------------------
// JSON values (edge representation)
// ---------------------------------------------------------------------------

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export interface ObjectNode {
  readonly kind: 'object';
  readonly entries: Map<string, DocumentNode>;
}

export interface ArrayNode {
  readonly kind: 'array';
  readonly items: DocumentNode[];
}

export interface ScalarNode {
  readonly kind: 'scalar';
  readonly value: JsonScalar;
}

export type DocumentNode = ObjectNode | ArrayNode | ScalarNode;

/** A container node: the only kinds a pointer can descend into. */
export type ContainerNode = ObjectNode | ArrayNode;

export function objectNode(entries?: Iterable<readonly [string, DocumentNode]>): ObjectNode {
  return { kind: 'object', entries: new Map(entries) };
}

export function arrayNode(items: DocumentNode[] = []): ArrayNode {
  return { kind: 'array', items };
}

export function scalarNode(value: JsonScalar): ScalarNode {
  return { kind: 'scalar', value };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled document node: ${JSON.stringify(value)}`);
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/**
 * Build a document tree from a plain JSON value.
 *
 * Values that JSON cannot represent (undefined, functions, symbols, bigint,
 * non-finite numbers) are rejected rather than silently coerced.
 */
export function fromJson(value: unknown): DocumentNode {
  if (Array.isArray(value)) {
    return arrayNode(value.map((item: unknown) => fromJson(item)));
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return scalarNode(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new DocumentParseError(`Non-finite number is not a JSON value: ${value}`);
      }
      return scalarNode(value);
    case 'object': {
      if (value === null) return scalarNode(null);
      const node = objectNode();
      for (const [key, child] of Object.entries(value)) {
        node.entries.set(key, fromJson(child));
      }
      return node;
    }
    default:
      throw new DocumentParseError(`Unsupported value type in document: ${typeof value}`);
  }
}

/** Convert a document tree back to a plain JSON value. */
export function toJson(node: DocumentNode): JsonValue {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'array':
      return node.items.map(toJson);
    case 'object':
      // fromEntries defines own properties, so a "__proto__" key survives.
      return Object.fromEntries([...node.entries].map(([key, child]): [string, JsonValue] => [key, toJson(child)]));
    default:
      return assertNever(node);
  }
}

/**
 * Parse JSON text into a document tree.
 *
 * @param source - Optional file path or key, carried on the error for diagnostics
 * @throws {DocumentParseError} If the text is not valid JSON
 */
export function parseDocument(text: string, source?: string): DocumentNode {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DocumentParseError(
      source === undefined ? `Invalid JSON: ${detail}` : `Invalid JSON in ${source}: ${detail}`,
      source,
    );
  }
  return fromJson(raw);
}

/** Deep copy. The result shares no containers with the input. */
export function cloneNode(node: DocumentNode): DocumentNode {
  switch (node.kind) {
    case 'scalar':
      return scalarNode(node.value);
    case 'array':
      return arrayNode(node.items.map(cloneNode));
    case 'object': {
      const copy = objectNode();
      for (const [key, child] of node.entries) {
        copy.entries.set(key, cloneNode(child));
      }
      return copy;
    }
    default:
      return assertNever(node);
  }
}

/**
 * Canonical serialized form: compact JSON text with object keys in document
 * order. Two nodes are equal for the `test` operation iff their serialized
 * forms are byte-identical.
 */
export function serializeNode(node: DocumentNode): string {
  return JSON.stringify(toJson(node));
}

/** Render a document as indented JSON text for output files. */
export function formatDocument(node: DocumentNode, indent = 2): string {
  return JSON.stringify(toJson(node), null, indent);
}

/** Human-readable kind name for error messages. */
export function describeKind(node: DocumentNode): string {
  switch (node.kind) {
    case 'object':
      return 'object';
    case 'array':
      return 'array';
    case 'scalar':
      return node.value === null ? 'null' : typeof node.value;
    default:
      return assertNever(node);
  }
}

export function isContainer(node: DocumentNode): node is ContainerNode {
  return node.kind !== 'scalar';
}
