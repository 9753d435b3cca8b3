/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/modgate.ts   (executable entry point)
 *   src/index.ts         (package entry)
 */

import { program } from 'commander'
import { validateCommand } from './validate.js'
import { graphCommand } from './graph.js'
import { logCommand } from './log.js'

program
  .name('modgate')
  .description(
    'modgate — module dependency graph validator for multi-module bundles.\n' +
    'Checks the root module, declared identifiers, dependency references,\n' +
    'cycles and install-time / on-demand delivery ordering.',
  )
  .version('0.1.0')

program.addCommand(validateCommand)
program.addCommand(graphCommand)
program.addCommand(logCommand)

export { program }
