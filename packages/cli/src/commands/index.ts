/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/modweave.ts.
 */

import { program } from 'commander'
import { orderCommand } from './order.js'
import { validateCommand } from './validate.js'
import { loadCommand } from './load.js'
import { patchCommand } from './patch.js'
import { logCommand } from './log.js'
import { statusCommand } from './status.js'

program
  .name('modweave')
  .description(
    'Modweave — mod discovery, deterministic load ordering and JSON content patching.\n' +
    'Fatal dependency problems exit with status 1; per-mod problems are reported and skipped.',
  )
  .version('0.1.0')

program.addCommand(orderCommand)
program.addCommand(validateCommand)
program.addCommand(loadCommand)
program.addCommand(patchCommand)
program.addCommand(logCommand)
program.addCommand(statusCommand)

export { program }
