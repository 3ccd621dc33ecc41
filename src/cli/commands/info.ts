import type { Command } from 'commander'
import { withStore } from '../../store/store.js'
import { output } from '../../output.js'
import { fail, resolveConfig, storeOptions } from '../context.js'

/**
 * Register the `info` command: prints the version and tables of a store.
 */
export function registerInfoCommand(program: Command): void {
  program
    .command('info [path]')
    .description('Show the version and tables of a store')
    .action((pathArg: string | undefined, _options: Record<string, never>, command: Command) => {
      try {
        const config = resolveConfig(command)
        const path = pathArg ?? config.store.path
        withStore(
          path,
          (store) => {
            output.info(`Path:    ${path}`)
            output.info(`Version: ${store.resolveVersion()}`)
            const tables = store.listTables()
            output.info(`Tables:  ${tables.length > 0 ? tables.join(', ') : '(none)'}`)
          },
          { ...storeOptions(command, config), verbosity: 0 },
        )
      } catch (err) {
        fail(err)
      }
    })
}
