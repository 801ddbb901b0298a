/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/tollgate.ts   (entry point)
 *   src/index.ts          (library consumers and tests)
 */

import { program } from 'commander'
import { selectorCommand } from './selector.js'
import { keygenCommand } from './keygen.js'
import { credentialCommand } from './credential.js'
import { demoCommand } from './demo.js'
import { logCommand } from './log.js'

program
  .name('tollgate')
  .description(
    'Tollgate — registration and call-gating protocol for integrations.\n' +
    'Guarded operations run only when a security module accepts their payload.',
  )
  .version('0.1.0')

program.addCommand(selectorCommand)
program.addCommand(keygenCommand)
program.addCommand(credentialCommand)
program.addCommand(demoCommand)
program.addCommand(logCommand)

export { program }
