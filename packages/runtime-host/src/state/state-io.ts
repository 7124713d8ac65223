/**
 * Modweave Runtime Host — StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading/writing JSON state
 * files and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under the modweave home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Sinks and commands inject StateIO rather than building paths under the
 * home directory themselves.
 */

import { mkdirSync, readFileSync, writeFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Narrows a parsed JSON value to the shape a caller expects.
 * readJson returns the fallback when the guard rejects the stored value.
 */
export type JsonGuard<T> = (value: unknown) => value is T;

/**
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - Files from one StateIO instance cannot be accessed from another
 */
export interface StateIO {
  /**
   * Read a JSON file and parse it.
   *
   * Returns `fallback` if the file does not exist, cannot be parsed, or does
   * not pass `guard`.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'last-load.json')
   */
  readJson<T>(filename: string, fallback: T, guard: JsonGuard<T>): T;

  /**
   * Serialize a value as JSON and write it to a file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line to a log file. A newline is appended after the content.
   * Creates the logs subdirectory if it does not exist.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'load-events.jsonl')
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or '' if it does not exist.
   * Used by readLog() for dedupe-on-read.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO rooted at a home directory.
 *
 * Reads and writes JSON state at `<homeDir>/state/<filename>`.
 * Appends log lines to          `<homeDir>/logs/<logfilename>`.
 *
 * Synchronous I/O: a log line is on disk before append returns.
 * ENOENT and SyntaxError are recoverable (return fallback); other I/O errors
 * are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson<T>(filename: string, fallback: T, guard: JsonGuard<T>): T {
    const filePath = join(this.homeDir, 'state', filename);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
    return guard(parsed) ? parsed : fallback;
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. No file system access.
 *
 * writeJson round-trips through JSON serialization to match FileStateIO
 * (undefined values are dropped, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, unknown> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson<T>(filename: string, fallback: T, guard: JsonGuard<T>): T {
    const value = this.store.get(filename);
    return guard(value) ? value : fallback;
  }

  writeJson(filename: string, value: unknown): void {
    const parsed: unknown = JSON.parse(JSON.stringify(value));
    this.store.set(filename, parsed);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   *
   * Specific to MemoryStateIO; not part of the StateIO interface.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Each appendLine adds 'line\n', so raw content is 'a\nb\n'.
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
