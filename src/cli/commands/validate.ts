import type { Command } from 'commander'
import { validate, ValidationError } from '../../cedula/index.js'
import { output } from '../output.js'

/**
 * Register the `validate` command on the Commander program.
 *
 * Prints the compact form of every valid number and the reason for every
 * invalid one. Exit code 1 if any number is invalid.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate one or more cedulas')
    .argument('<numbers...>', 'cedulas to check, separators allowed')
    .action((numbers: string[]) => {
      let failures = 0
      for (const number of numbers) {
        try {
          output.success(validate(number))
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err
          output.error(`${number}: ${err.message}`)
          failures++
        }
      }
      if (failures > 0) {
        process.exit(1)
      }
    })
}
