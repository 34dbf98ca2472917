import { Command } from 'commander'
import { registerFormatCommand } from './commands/format.js'
import { registerInitCommand } from './commands/init.js'
import { registerLookupCommand } from './commands/lookup.js'
import { registerValidateCommand } from './commands/validate.js'

export const CLI_VERSION = '0.1.0'

/** Build the `cedula` program with every command registered. */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('cedula')
    .description('Validate, format and look up Dominican Republic cedulas')
    .version(CLI_VERSION)

  registerValidateCommand(program)
  registerFormatCommand(program)
  registerLookupCommand(program)
  registerInitCommand(program)

  return program
}
