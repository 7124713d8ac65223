/**
 * Modweave Mod Loader — Content Loader
 *
 * Reads every `.json` file under a content folder into the DocumentStore.
 *
 * All files of one folder are read and parsed concurrently; the results are
 * then stored one by one in sorted path order, so the store's contents do
 * not depend on which read finished first. A file that cannot be read or
 * parsed is reported and skipped.
 */

import { relative, sep } from 'node:path';
import { LoadLogger, errorMessage, parseDocument } from '@modweave/kernel';
import type { ContentCache, DocumentNode, ModFileSystem } from '@modweave/kernel';

export type ContentLoadResult =
  | { readonly ok: true; readonly path: string; readonly key: string }
  | { readonly ok: false; readonly path: string; readonly error: string };

export interface ContentFolderOptions {
  /** Prepended to every key, e.g. the content type `items`. */
  readonly prefix?: string | undefined;
  /** Owning mod, for log events. Absent for base content. */
  readonly modId?: string | undefined;
}

/**
 * Store key for a content file: its path relative to the folder, `/`
 * separated, without the `.json` extension.
 */
export function contentKey(folder: string, file: string, prefix?: string): string {
  const rel = relative(folder, file).split(sep).join('/').replace(/\.json$/, '');
  return prefix === undefined || prefix === '' ? rel : `${prefix}/${rel}`;
}

type ReadOutcome =
  | { readonly ok: true; readonly path: string; readonly document: DocumentNode }
  | { readonly ok: false; readonly path: string; readonly error: string };

export class ContentLoader {
  constructor(
    private readonly fs: ModFileSystem,
    private readonly store: ContentCache,
    private readonly logger: LoadLogger = new LoadLogger(),
  ) {}

  /**
   * Load every `.json` file under `folder`, recursively.
   *
   * @returns One result per file, in sorted path order
   */
  async loadFolder(folder: string, options: ContentFolderOptions = {}): Promise<ContentLoadResult[]> {
    const files = await this.fs.listFiles(folder, '.json', true);
    const outcomes = await Promise.all(files.map((path) => this.read(path)));

    const results: ContentLoadResult[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        this.logger.warn('content.document_invalid', `Skipping content file ${outcome.path}: ${outcome.error}`, {
          modId: options.modId,
          fields: { path: outcome.path },
        });
        results.push(outcome);
        continue;
      }
      const key = contentKey(folder, outcome.path, options.prefix);
      this.store.addDocument(key, outcome.document);
      results.push({ ok: true, path: outcome.path, key });
    }

    const loaded = results.filter((r) => r.ok).length;
    this.logger.info('content.folder_loaded', `Loaded ${loaded} document(s) from ${folder}`, {
      modId: options.modId,
      fields: { folder, loaded, failed: results.length - loaded },
    });
    return results;
  }

  private async read(path: string): Promise<ReadOutcome> {
    try {
      const text = await this.fs.readText(path);
      return { ok: true, path, document: parseDocument(text, path) };
    } catch (err: unknown) {
      return { ok: false, path, error: errorMessage(err) };
    }
  }
}
