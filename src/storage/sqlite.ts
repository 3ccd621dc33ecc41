import Database from 'better-sqlite3'
import type { ConnectOptions, StorageEngine, RunResult } from './interface.js'

/**
 * SQLite implementation of the StorageEngine interface.
 *
 * Uses better-sqlite3 for synchronous database operations with WAL mode
 * and foreign key enforcement. Supports both file-backed and in-memory
 * databases (pass ':memory:' for tests).
 */
export class SqliteStorage implements StorageEngine {
  private db: Database.Database

  /**
   * @param path - Path to the SQLite database file, or ':memory:' for in-memory
   */
  constructor(path: string, options: ConnectOptions = { mustExist: false }) {
    this.db = new Database(path, { fileMustExist: options.mustExist })
    try {
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('foreign_keys = ON')
    } catch (err) {
      // Not a database file; don't hold the handle
      this.db.close()
      throw err
    }
  }

  get open(): boolean {
    return this.db.open
  }

  close(): void {
    this.db.close()
  }

  run(sql: string, params: unknown[] = []): RunResult {
    const result = this.db.prepare(sql).run(...params)
    return {
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    }
  }

  get<T>(sql: string, params: unknown[] = []): T | undefined {
    return this.db.prepare(sql).get(...params) as T | undefined
  }

  all<T>(sql: string, params: unknown[] = []): T[] {
    return this.db.prepare(sql).all(...params) as T[]
  }

  transaction<T>(fn: () => T): T {
    const wrapped = this.db.transaction(fn)
    return wrapped()
  }
}

/** Default ConnectFn backed by SqliteStorage. */
export function connectSqlite(path: string, options: ConnectOptions): StorageEngine {
  return new SqliteStorage(path, options)
}
