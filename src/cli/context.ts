import type { Command } from 'commander'
import { gateForPolicy, loadConfig } from '../config/index.js'
import type { StoreOptions } from '../store/store.js'
import type { StratumConfig } from '../types/config.js'
import { output } from '../output.js'

/** Options registered on the root program. */
export interface GlobalOptions {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

/**
 * Load configuration named by the global --config option.
 */
export function resolveConfig(command: Command): StratumConfig {
  const { config } = command.optsWithGlobals<GlobalOptions>()
  return loadConfig(config)
}

/**
 * Build Store options from configuration plus -v/-q.
 */
export function storeOptions(command: Command, config: StratumConfig): StoreOptions {
  const { verbose, quiet } = command.optsWithGlobals<GlobalOptions>()
  const verbosity = quiet ? 0 : verbose ? 2 : config.verbosity
  return {
    verbosity,
    confirm: gateForPolicy(config.confirm),
  }
}

/** Print a failure and exit 1. */
export function fail(err: unknown): void {
  output.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
}
