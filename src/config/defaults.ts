import type { StratumConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: StratumConfig = {
  store: {
    path: './data/store.db',
    version: '1.0',
  },
  verbosity: 1,
  confirm: 'prompt',
}
