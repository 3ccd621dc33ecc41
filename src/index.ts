export * from './store/index.js'
export { SqliteStorage, connectSqlite } from './storage/index.js'
export type { StorageEngine, RunResult, ConnectFn, ConnectOptions } from './storage/index.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG, gateForPolicy } from './config/index.js'
export type { StratumConfig, ConfirmPolicy, HistoryEntry, HistoryKind, ColumnDefinition, ColumnSpec } from './types/index.js'
