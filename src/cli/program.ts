import { Command } from 'commander'
import { registerCreateCommand } from './commands/create.js'
import { registerInfoCommand } from './commands/info.js'
import { registerTableCommands } from './commands/table.js'
import { registerHistoryCommands } from './commands/history.js'

/**
 * Build the `stratum` program with all commands registered.
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('stratum')
    .description('Versioned SQLite container for tabular data')
    .version('0.1.0')
    .option('-c, --config <path>', 'configuration file path', 'stratum.config.json')
    .option('-v, --verbose', 'print detailed progress')
    .option('-q, --quiet', 'print nothing but results and errors')

  registerCreateCommand(program)
  registerInfoCommand(program)
  registerTableCommands(program)
  registerHistoryCommands(program)

  return program
}
