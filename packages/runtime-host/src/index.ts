/**
 * @modgate/runtime-host
 *
 * modgate runtime host — side-effectful implementations: home directory
 * resolution, JSONL log persistence and descriptor file reading. Depends on
 * @modgate/kernel for interfaces; no kernel code imports from this package.
 */

// Logging
export { FileLogSink, VALIDATION_LOG_FILE } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';
export type { LogReadResult, LogReadStats, ValidationLogEvent } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// Log storage
export type { LogStore } from './state/log-store.js';
export { FileLogStore, MemoryLogStore } from './state/log-store.js';

// MODGATE_HOME resolution
export type { ResolveHomeOptions } from './home.js';
export { getOsConfigPath, readHomeFromConfig, resolveModgateHome } from './home.js';

// Descriptor files
export type { BundleFileResult } from './bundle-file.js';
export { readBundleFile } from './bundle-file.js';
