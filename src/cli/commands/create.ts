import type { Command } from 'commander'
import { Store } from '../../store/store.js'
import { output } from '../../output.js'
import { fail, resolveConfig, storeOptions } from '../context.js'

/**
 * Register the `create` command on the Commander program.
 *
 * Creates a new store file. An existing file is replaced only after
 * confirmation or with --force.
 */
export function registerCreateCommand(program: Command): void {
  program
    .command('create [path]')
    .description('Create a new store file')
    .option('-s, --store-version <version>', 'version stamped into the new store')
    .option('-f, --force', 'overwrite an existing file without asking', false)
    .action((pathArg: string | undefined, options: { storeVersion?: string; force: boolean }, command: Command) => {
      try {
        const config = resolveConfig(command)
        const path = pathArg ?? config.store.path
        const store = new Store(storeOptions(command, config))
        const outcome = store.create(path, options.storeVersion ?? config.store.version, { force: options.force })
        if (outcome === 'declined') {
          output.info('Cancelled')
          return
        }
        const version = store.version
        store.close()
        output.success(`Created ${path} (version ${version})`)
      } catch (err) {
        fail(err)
      }
    })
}
