/**
 * Result from a SQL write operation.
 */
export interface RunResult {
  changes: number
  lastInsertRowid: number | bigint
}

/**
 * Thin storage engine abstraction.
 *
 * Provides raw SQL access via run/get/all with transaction support over a
 * single connection. The connection is established by the implementation's
 * constructor and released by close().
 */
export interface StorageEngine {
  /** Whether the connection is still held. */
  readonly open: boolean

  /** Close the database connection. */
  close(): void

  /** Execute a write or DDL statement. Returns changes count and last insert rowid. */
  run(sql: string, params?: unknown[]): RunResult

  /** Execute a read SQL statement. Returns a single row or undefined. */
  get<T>(sql: string, params?: unknown[]): T | undefined

  /** Execute a read SQL statement. Returns all matching rows. */
  all<T>(sql: string, params?: unknown[]): T[]

  /** Execute a function inside a database transaction. Rolls back on error. */
  transaction<T>(fn: () => T): T
}

/** Options for establishing a connection. */
export interface ConnectOptions {
  /** Fail instead of creating the file when it does not exist. */
  mustExist: boolean
}

/** Establishes a connection to the store file at `path`. */
export type ConnectFn = (path: string, options: ConnectOptions) => StorageEngine
