/**
 * Modweave Runtime Host — Home and Loader Configuration
 *
 * Resolves the modweave home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. MODWEAVE_HOME environment variable
 *   3. Default: ~/.modweave
 *
 * Everything the tool persists lives under the resolved home:
 *
 *   <MODWEAVE_HOME>/
 *     logs/
 *       load-events.jsonl
 *     state/
 *       last-load.json
 *
 * resolveLoaderConfig() adds the directories the loader reads from and the
 * console log level, each with the same flag → env → default precedence.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import type { LogLevel } from '@modweave/kernel';
import { isLogLevel } from '@modweave/kernel';

export const MANIFEST_FILENAME = 'mod.json';

// ---------------------------------------------------------------------------
// Home
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /**
   * Create the directory when it does not exist. Default: true.
   * Read-only commands pass false.
   */
  readonly create?: boolean | undefined;
}

function fromEnv(name: string): string | undefined {
  const value = process.env[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Resolve the modweave home directory.
 *
 * @returns An absolute path
 */
export function resolveModweaveHome(opts?: ResolveHomeOptions): string {
  const explicit = opts?.home !== undefined && opts.home !== '' ? opts.home : undefined;
  const home = resolve(explicit ?? fromEnv('MODWEAVE_HOME') ?? join(homedir(), '.modweave'));

  if (opts?.create !== false && !existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}

// ---------------------------------------------------------------------------
// Loader configuration
// ---------------------------------------------------------------------------

export interface LoaderConfig {
  readonly home: string;
  /** Root directory scanned for mod subdirectories. */
  readonly modsDir: string;
  /** Base content loaded before any mod. */
  readonly contentDir: string;
  /** Minimum level printed to the console. */
  readonly logLevel: LogLevel;
}

export interface LoaderConfigOptions extends ResolveHomeOptions {
  readonly modsDir?: string | undefined;
  readonly contentDir?: string | undefined;
  readonly logLevel?: string | undefined;
  /** Base for relative paths and defaults. Default: process.cwd(). */
  readonly cwd?: string | undefined;
}

/**
 * Resolve the loader configuration.
 *
 * Precedence per setting: option → environment
 * (MODWEAVE_MODS_DIR, MODWEAVE_CONTENT_DIR, MODWEAVE_LOG_LEVEL) → default
 * (`<cwd>/Mods`, `<cwd>/Content`, `info`).
 *
 * @throws {Error} If the log level is not one of debug, info, warn, error
 */
export function resolveLoaderConfig(opts: LoaderConfigOptions = {}): LoaderConfig {
  const cwd = opts.cwd ?? process.cwd();
  const absolute = (path: string): string => (isAbsolute(path) ? path : resolve(cwd, path));

  const logLevel = opts.logLevel ?? fromEnv('MODWEAVE_LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid log level "${logLevel}" (expected debug, info, warn or error)`);
  }

  return {
    home: resolveModweaveHome(opts),
    modsDir: absolute(opts.modsDir ?? fromEnv('MODWEAVE_MODS_DIR') ?? 'Mods'),
    contentDir: absolute(opts.contentDir ?? fromEnv('MODWEAVE_CONTENT_DIR') ?? 'Content'),
    logLevel,
  };
}
