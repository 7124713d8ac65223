/**
 * @modweave/runtime-host
 *
 * Side-effectful host services. Depends on @modweave/kernel (interfaces);
 * implements them with Node.js built-ins.
 *
 * No kernel code imports from this package.
 */

// Filesystem adapter
export { NodeModFileSystem } from './adapters/fs.js';

// Logging
export type { FileLogSinkOptions } from './logging/file-log-sink.js';
export { FileLogSink, LOAD_EVENTS_LOG } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';
export type { LoadEventRecord, LogFilter, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { filterEvents, readLog } from './logging/log-reader.js';

// StateIO — home-scoped I/O abstraction
export type { JsonGuard, StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

// Home and loader configuration
export type { LoaderConfig, LoaderConfigOptions, ResolveHomeOptions } from './home.js';
export { MANIFEST_FILENAME, resolveLoaderConfig, resolveModweaveHome } from './home.js';
