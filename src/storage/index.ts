export type { StorageEngine, RunResult, ConnectFn, ConnectOptions } from './interface.js'
export { SqliteStorage, connectSqlite } from './sqlite.js'
export { HISTORY_TABLE, CREATE_HISTORY_TABLE } from './schema.js'
