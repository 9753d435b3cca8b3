#!/usr/bin/env node
/**
 * bin/modgate.ts — entry point for the `modgate` CLI command.
 *
 * modgate validate bundle.json   → exit 0 / 1 / 2
 * modgate graph bundle.json
 * modgate log --limit 5
 */

const { program } = await import('../commands/index.js')
program.parse()
