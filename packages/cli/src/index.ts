/**
 * @modweave/cli
 *
 * The `modweave` command. Command runners are exported for embedding and
 * tests; src/bin/modweave.ts is the executable entry point.
 */

export { program } from './commands/index.js';
export { runOrder } from './commands/order.js';
export type { OrderOptions } from './commands/order.js';
export { runValidate } from './commands/validate.js';
export { runLoad } from './commands/load.js';
export type { LoadOptions } from './commands/load.js';
export { runPatch } from './commands/patch.js';
export type { PatchOptions } from './commands/patch.js';
export { runLog } from './commands/log.js';
export type { LogOptions } from './commands/log.js';
export { runStatus } from './commands/status.js';
export type { StatusOptions } from './commands/status.js';
export { ConsoleLogSink, formatEventLine } from './console-log-sink.js';
export { BufferPrinter, consolePrinter } from './output.js';
export type { Printer } from './output.js';
export { LAST_LOAD_FILE, isLastLoadRecord, toLastLoadRecord } from './last-load.js';
export type { LastLoadRecord } from './last-load.js';
export { addLoaderOptions, buildRuntime } from './runtime.js';
export type { LoaderCliOptions, Runtime } from './runtime.js';
