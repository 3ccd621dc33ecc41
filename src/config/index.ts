export { loadConfig, ConfigError } from './loader.js'
export { DEFAULT_CONFIG } from './defaults.js'
export { gateForPolicy } from './policy.js'
