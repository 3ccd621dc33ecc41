import type { Command } from 'commander'
import { Value } from '@sinclair/typebox/value'
import { withStore } from '../../store/store.js'
import { HistoryKindSchema, type HistoryKind } from '../../types/history.js'
import { output } from '../../output.js'
import { fail, resolveConfig, storeOptions } from '../context.js'

const LOGGABLE = ['message', 'warning', 'error'] as const
type LoggableKind = (typeof LOGGABLE)[number]

function isLoggable(kind: string): kind is LoggableKind {
  return LOGGABLE.some((k) => k === kind)
}

/**
 * Register the `log` and `history` commands.
 *
 *   - log <path> <kind> <text>  Append a message, warning or error
 *   - history <path>            Show the history table
 */
export function registerHistoryCommands(program: Command): void {
  program
    .command('log <path> <kind> <text>')
    .description('Append a message, warning or error to the history')
    .action((path: string, kind: string, text: string, _options: Record<string, never>, command: Command) => {
      if (!isLoggable(kind)) {
        output.error(`Invalid kind: ${kind} (expected one of ${LOGGABLE.join(', ')})`)
        process.exit(1)
        return
      }
      const loggable: LoggableKind = kind
      try {
        const config = resolveConfig(command)
        const entry = withStore(path, (store) => store.append(loggable, text), storeOptions(command, config))
        output.success(`Logged ${entry.kind} #${entry.sequence}`)
      } catch (err) {
        fail(err)
      }
    })

  program
    .command('history <path>')
    .description('Show the history of a store')
    .option('-k, --kind <kind>', 'only show entries of this kind')
    .action((path: string, options: { kind?: string }, command: Command) => {
      const kind = options.kind
      if (kind !== undefined && !Value.Check(HistoryKindSchema, kind)) {
        output.error(`Invalid kind: ${kind}`)
        process.exit(1)
        return
      }
      const filter: HistoryKind | undefined = kind
      try {
        const config = resolveConfig(command)
        const entries = withStore(path, (store) => store.history(filter), { ...storeOptions(command, config), verbosity: 0 })
        if (entries.length === 0) {
          output.info('No history entries')
          return
        }
        output.table(
          entries.map((e) => ({
            '#': String(e.sequence),
            Time: new Date(e.timestamp * 1000).toISOString(),
            Kind: e.kind,
            Event: e.payload,
          })),
        )
      } catch (err) {
        fail(err)
      }
    })
}
