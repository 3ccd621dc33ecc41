import type { Command } from 'commander'
import { withStore } from '../../store/store.js'
import { output } from '../../output.js'
import { fail, resolveConfig, storeOptions } from '../context.js'

/**
 * Register the `add-table` and `drop-table` commands.
 *
 * Columns are given in their textual form, e.g. "id INTEGER, name TEXT".
 */
export function registerTableCommands(program: Command): void {
  program
    .command('add-table <path> <name> <columns>')
    .description('Add a table, replacing an existing one after confirmation')
    .option('-f, --force', 'replace an existing table without asking', false)
    .action((path: string, name: string, columns: string, options: { force: boolean }, command: Command) => {
      try {
        const config = resolveConfig(command)
        const outcome = withStore(path, (store) => store.addTable(name, columns, { force: options.force }), storeOptions(command, config))
        if (outcome === 'declined') {
          output.info('Cancelled')
          return
        }
        output.success(`Table ${name} added to ${path}`)
      } catch (err) {
        fail(err)
      }
    })

  program
    .command('drop-table <path> <name>')
    .description('Drop a table after confirmation')
    .option('-f, --force', 'drop without asking', false)
    .action((path: string, name: string, options: { force: boolean }, command: Command) => {
      try {
        const config = resolveConfig(command)
        const outcome = withStore(path, (store) => store.dropTable(name, { force: options.force }), storeOptions(command, config))
        if (outcome === 'declined') {
          output.info('Cancelled')
          return
        }
        output.success(`Table ${name} dropped from ${path}`)
      } catch (err) {
        fail(err)
      }
    })
}
