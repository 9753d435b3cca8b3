/**
 * @modgate/cli
 *
 * Operator command-line interface for the modgate validator.
 *
 * Usage:
 *   modgate --help
 *   modgate validate <bundle-file> [--json] [--no-log] [--home <dir>]
 *   modgate graph <bundle-file> [--json]
 *   modgate log [--limit <n>] [--json] [--home <dir>]
 */

export { program } from './commands/index.js'
export { runValidate, type ValidateOptions } from './commands/validate.js'
export { runGraph } from './commands/graph.js'
export { runLog, type LogOptions } from './commands/log.js'
export { ExitCode, consoleIO, type CommandIO } from './commands/io.js'
