/**
 * Modweave Mod Loader — Document Store
 *
 * The shared content cache that patches are applied to. Implements the
 * kernel's ContentCache interface.
 *
 * Documents are keyed by their content path without extension, using `/`
 * separators (e.g. `items/sword`). An object document with a string
 * `templateId` or `id` field is also reachable through that id, so a patch
 * `target` may name either. When two documents claim the same id, the one
 * stored last wins.
 *
 * Single writer: the ModLoader during the load phase.
 */

import { toJson } from '@modweave/kernel';
import type { ContentCache, DocumentNode, JsonValue } from '@modweave/kernel';

const ALIAS_FIELDS = ['templateId', 'id'] as const;

export class DocumentStore implements ContentCache {
  private readonly documents = new Map<string, DocumentNode>();
  /** Alias id → document key. */
  private readonly aliases = new Map<string, string>();

  get size(): number {
    return this.documents.size;
  }

  /** Document keys in insertion order. */
  keys(): string[] {
    return [...this.documents.keys()];
  }

  /** Map a key or alias id to the stored key. Keys take precedence over aliases. */
  resolveKey(keyOrId: string): string | undefined {
    if (this.documents.has(keyOrId)) return keyOrId;
    return this.aliases.get(keyOrId);
  }

  has(keyOrId: string): boolean {
    return this.resolveKey(keyOrId) !== undefined;
  }

  getDocumentByKey(keyOrId: string): DocumentNode | undefined {
    const key = this.resolveKey(keyOrId);
    return key === undefined ? undefined : this.documents.get(key);
  }

  /** Store a document. An existing document under the same key is overwritten. */
  addDocument(key: string, document: DocumentNode): void {
    this.documents.set(key, document);
    this.index(key, document);
  }

  /** Replace the document a key or alias names; stores under `keyOrId` when it names nothing. */
  replaceDocument(keyOrId: string, document: DocumentNode): void {
    this.addDocument(this.resolveKey(keyOrId) ?? keyOrId, document);
  }

  /** Plain JSON snapshot of every document, by key. */
  toJsonRecord(): Record<string, JsonValue> {
    return Object.fromEntries(
      [...this.documents].map(([key, document]): [string, JsonValue] => [key, toJson(document)]),
    );
  }

  clear(): void {
    this.documents.clear();
    this.aliases.clear();
  }

  private index(key: string, document: DocumentNode): void {
    for (const [alias, owner] of this.aliases) {
      if (owner === key) this.aliases.delete(alias);
    }
    if (document.kind !== 'object') return;
    for (const field of ALIAS_FIELDS) {
      const value = document.entries.get(field);
      if (value?.kind === 'scalar' && typeof value.value === 'string' && value.value !== '') {
        this.aliases.set(value.value, key);
      }
    }
  }
}
