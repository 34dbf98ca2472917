import type { Command } from 'commander'
import { format, validate, ValidationError } from '../../cedula/index.js'
import { output } from '../output.js'

/**
 * Register the `format` command on the Commander program.
 *
 * Validates first, since formatting garbage produces garbage.
 */
export function registerFormatCommand(program: Command): void {
  program
    .command('format')
    .description('Print a cedula in XXX-XXXXXXX-X form')
    .argument('<number>', 'cedula to format')
    .action((number: string) => {
      let compactNumber: string
      try {
        compactNumber = validate(number)
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err
        output.error(`${number}: ${err.message}`)
        process.exit(1)
        return
      }
      output.info(format(compactNumber))
    })
}
