/**
 * Modweave CLI — Runtime wiring
 *
 * Builds the loader stack every loading command shares: configuration,
 * filesystem adapter, JSONL event log plus console output, and the
 * ModLoader itself.
 */

import { CompositeLogSink, LoadLogger } from '@modweave/kernel';
import { ImportScriptHost, ModLoader } from '@modweave/mod-loader';
import {
  FileLogSink,
  FileStateIO,
  NodeModFileSystem,
  resolveLoaderConfig,
} from '@modweave/runtime-host';
import type { LoaderConfig } from '@modweave/runtime-host';
import { Option } from 'commander';
import type { Command } from 'commander';
import { ConsoleLogSink } from './console-log-sink.js';
import type { Printer } from './output.js';

/** Options shared by every command that touches the mods directory. */
export interface LoaderCliOptions {
  home?: string | undefined;
  mods?: string | undefined;
  content?: string | undefined;
  logLevel?: string | undefined;
  cwd?: string | undefined;
}

export function addLoaderOptions(command: Command): Command {
  return command
    .option('--home <dir>', 'Modweave home (default: $MODWEAVE_HOME or ~/.modweave)')
    .option('--mods <dir>', 'Mods directory (default: $MODWEAVE_MODS_DIR or ./Mods)')
    .addOption(
      new Option('--log-level <level>', 'Console log level (default: $MODWEAVE_LOG_LEVEL or info)')
        .choices(['debug', 'info', 'warn', 'error']),
    );
}

export interface Runtime {
  readonly config: LoaderConfig;
  readonly fs: NodeModFileSystem;
  readonly stateIO: FileStateIO;
  readonly logger: LoadLogger;
  readonly loader: ModLoader;
}

export function buildRuntime(options: LoaderCliOptions, printer: Printer): Runtime {
  const config = resolveLoaderConfig({
    home: options.home,
    modsDir: options.mods,
    contentDir: options.content,
    logLevel: options.logLevel,
    cwd: options.cwd,
  });
  const fs = new NodeModFileSystem();
  const stateIO = new FileStateIO(config.home);
  const logger = new LoadLogger(
    new CompositeLogSink(new FileLogSink(stateIO), new ConsoleLogSink(printer, config.logLevel)),
  );
  const loader = new ModLoader({
    modsDir: config.modsDir,
    fs,
    scriptHost: new ImportScriptHost(config.modsDir, logger),
    logger,
  });
  return { config, fs, stateIO, logger, loader };
}
