export { Store, withStore, VERSION_UNSET } from './store.js'
export type { StoreOptions, StoreState, Outcome, Reporter, ForceOption } from './store.js'
export { HistoryLog } from './history.js'
export type { Clock } from './history.js'
export { StoreError } from './errors.js'
export type { StoreErrorCode } from './errors.js'
export { allowAll, denyAll, createTerminalGate, readStdinLine } from './gate.js'
export type { ConfirmationGate, EntityKind, LineReaderOptions, TerminalIo } from './gate.js'
export { parseColumnSpec, isIdentifier } from './columns.js'
