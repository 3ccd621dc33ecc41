// Common types
export { IdentifierString, EpochSeconds } from './common.js'

// Configuration
export { StratumConfigSchema, ConfirmPolicy } from './config.js'
export type { StratumConfig } from './config.js'

// History
export { HistoryEntrySchema, HistoryKindSchema } from './history.js'
export type { HistoryEntry, HistoryKind } from './history.js'

// Tables
export { ColumnDefinitionSchema, ColumnSpecSchema, ColumnTypeString } from './table.js'
export type { ColumnDefinition, ColumnSpec } from './table.js'
