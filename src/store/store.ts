import { existsSync, rmSync, statSync } from 'node:fs'
import type { ConnectFn, StorageEngine } from '../storage/interface.js'
import { connectSqlite } from '../storage/sqlite.js'
import { CREATE_HISTORY_TABLE, HISTORY_TABLE } from '../storage/schema.js'
import type { HistoryEntry, HistoryKind } from '../types/history.js'
import type { ColumnSpec } from '../types/table.js'
import { output } from '../output.js'
import { isIdentifier, parseColumnSpec, quoteIdentifier, renderColumns } from './columns.js'
import { StoreError, engineError } from './errors.js'
import { createTerminalGate, type ConfirmationGate } from './gate.js'
import { HistoryLog, type Clock } from './history.js'

/** Version value while no store is open. */
export const VERSION_UNSET = -1

export type StoreState = 'open' | 'closed'

/**
 * Result of a gated operation. `declined` means the confirmation gate said
 * no and nothing was changed; it is not an error.
 */
export type Outcome = 'completed' | 'declined'

/** Where trace lines are echoed. */
export interface Reporter {
  info(message: string): void
  warn(message: string): void
}

export interface StoreOptions {
  /** 0 silent, 1 normal, 2 detailed. Defaults to 1. */
  verbosity?: number
  /** Consulted before overwriting a file or table. Defaults to a terminal prompt. */
  confirm?: ConfirmationGate
  connect?: ConnectFn
  clock?: Clock
  reporter?: Reporter
}

export interface ForceOption {
  /** Skip the confirmation gate. */
  force?: boolean
}

interface Session {
  engine: StorageEngine
  log: HistoryLog
  path: string
  version: string
}

/** Closes the connection of a Store dropped without close(). */
export function releaseEngine(engine: StorageEngine): void {
  if (engine.open) engine.close()
}

const abandoned = new FinalizationRegistry<StorageEngine>(releaseEngine)

/** Deletes a store file together with its WAL sidecars. */
function removeStoreFile(path: string, action: string): void {
  try {
    for (const file of [path, `${path}-wal`, `${path}-shm`]) {
      rmSync(file, { force: true })
    }
  } catch (err) {
    throw engineError(action, err, { path })
  }
}

/**
 * One backing SQLite file with its history log.
 *
 * A Store is either closed or holds exactly one connection. Every
 * transition other than closed -> open (open/create) and open -> closed
 * (close) is rejected without touching state.
 */
export class Store {
  verbosity: number
  confirm: ConfirmationGate
  private readonly connect: ConnectFn
  private readonly clock: Clock
  private readonly reporter: Reporter
  private session: Session | undefined

  constructor(options: StoreOptions = {}) {
    this.verbosity = options.verbosity ?? 1
    this.confirm = options.confirm ?? createTerminalGate()
    this.connect = options.connect ?? connectSqlite
    this.clock = options.clock ?? Date.now
    this.reporter = options.reporter ?? output
  }

  get state(): StoreState {
    return this.session ? 'open' : 'closed'
  }

  /** Backing file of the open store. */
  get path(): string | undefined {
    return this.session?.path
  }

  /** Cached version of the open store, or VERSION_UNSET. */
  get version(): string | typeof VERSION_UNSET {
    return this.session?.version ?? VERSION_UNSET
  }

  // --- lifecycle ---

  /**
   * Open an existing store file and resolve its version.
   *
   * @throws StoreError ALREADY_OPEN, NOT_FOUND, ENGINE_ERROR or NO_VERSION_RECORDED
   */
  open(path: string): void {
    this.requireClosed(path)
    if (!statSync(path, { throwIfNoEntry: false })?.isFile()) {
      throw new StoreError('NOT_FOUND', `File ${path} could not be found`, { path })
    }

    const engine = this.connectTo(path, true)
    const log = new HistoryLog(engine, this.clock, path)
    let version: string
    try {
      version = log.resolveVersion()
    } catch (err) {
      engine.close()
      throw err
    }

    this.attach({ engine, log, path, version })
    this.chatter(`File: ${path} (version: ${version}) opened successfully`, 1)
  }

  /**
   * Create a new store file stamped with `version`.
   *
   * An existing file at `path` is deleted only if `force` is set or the
   * confirmation gate agrees; otherwise nothing is touched and the result
   * is `declined`.
   *
   * @throws StoreError ALREADY_OPEN or ENGINE_ERROR
   */
  create(path: string, version: string, options: ForceOption = {}): Outcome {
    this.requireClosed(path)

    if (existsSync(path)) {
      if (!options.force && !this.confirm(path, 'store file')) {
        this.chatter(`Create store file ${path} operation cancelled`, 1)
        return 'declined'
      }
      this.chatter(`Deleting store file ${path}`, 1, 'warn')
      removeStoreFile(path, `Failed to delete existing file ${path}`)
    }

    const engine = this.connectTo(path, false)
    const log = new HistoryLog(engine, this.clock, path)
    try {
      engine.transaction(() => {
        engine.run(CREATE_HISTORY_TABLE)
        log.append('message', 'file created')
        log.append('version', version)
      })
    } catch (err) {
      engine.close()
      removeStoreFile(path, `Failed to remove partly created file ${path}`)
      throw err instanceof StoreError ? err : engineError(`Failed to initialise ${path}`, err, { path })
    }

    this.attach({ engine, log, path, version })
    this.chatter(`File: ${path} (version: ${version}) created`, 1)
    return 'completed'
  }

  /**
   * Release the connection and reset the cached version.
   *
   * @throws StoreError NOT_OPEN when no store is open
   */
  close(): void {
    const session = this.session
    if (!session) {
      throw new StoreError('NOT_OPEN', 'Trying to close a store that is not open')
    }
    this.session = undefined
    abandoned.unregister(this)
    try {
      session.engine.close()
    } catch (err) {
      throw engineError(`Failed to close ${session.path}`, err, { path: session.path })
    }
    this.chatter(`File: ${session.path} closed`, 2)
  }

  // --- tables ---

  /**
   * Create table `name`, replacing an existing one if allowed.
   *
   * Drop and create run in one transaction: on failure the previous table
   * is left as it was.
   *
   * @throws StoreError NOT_OPEN, INVALID_NAME or ENGINE_ERROR
   */
  addTable(name: string, columns: ColumnSpec | string, options: ForceOption = {}): Outcome {
    const session = this.requireOpen(`add table ${name}`)
    this.checkTableName(name)
    const body = renderColumns(name, typeof columns === 'string' ? parseColumnSpec(columns) : columns)

    const exists = this.tableExists(session, name)
    if (exists && !options.force && !this.confirm(name, 'table')) {
      this.chatter(`Add table ${name} operation cancelled`, 1)
      return 'declined'
    }

    const table = quoteIdentifier(name)
    this.inTransaction(session, `Failed to add table ${name}`, name, () => {
      session.engine.run(`DROP TABLE IF EXISTS ${table}`)
      session.engine.run(`CREATE TABLE ${table} (${body})`)
      session.log.append('message', exists ? `table ${name} replaced` : `table ${name} added`)
    })
    this.chatter(`Table ${name} added to ${session.path}`, 2)
    return 'completed'
  }

  /**
   * Drop table `name` if it exists, gated like addTable's replace step.
   *
   * @throws StoreError NOT_OPEN, INVALID_NAME or ENGINE_ERROR
   */
  dropTable(name: string, options: ForceOption = {}): Outcome {
    const session = this.requireOpen(`drop table ${name}`)
    this.checkTableName(name)

    if (!this.tableExists(session, name)) {
      this.chatter(`Table ${name} does not exist in ${session.path}`, 1)
      return 'completed'
    }
    if (!options.force && !this.confirm(name, 'table')) {
      this.chatter(`Drop table ${name} operation cancelled`, 1)
      return 'declined'
    }

    this.inTransaction(session, `Failed to drop table ${name}`, name, () => {
      session.engine.run(`DROP TABLE ${quoteIdentifier(name)}`)
      session.log.append('message', `table ${name} dropped`)
    })
    this.chatter(`Table ${name} dropped from ${session.path}`, 2)
    return 'completed'
  }

  hasTable(name: string): boolean {
    const session = this.requireOpen(`look up table ${name}`)
    return this.tableExists(session, name)
  }

  /** Caller-defined tables, sorted by name. */
  listTables(): string[] {
    const session = this.requireOpen('list tables')
    try {
      return session.engine
        .all<{ name: string }>(
          `SELECT name FROM sqlite_master
           WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' AND name <> ?
           ORDER BY name`,
          [HISTORY_TABLE],
        )
        .map((row) => row.name)
    } catch (err) {
      throw engineError(`Failed to list tables of ${session.path}`, err, { path: session.path })
    }
  }

  // --- history ---

  /** @throws StoreError NOT_OPEN or ENGINE_ERROR */
  append(kind: HistoryKind, text: string): HistoryEntry {
    const session = this.requireOpen(`log ${kind}`)
    const entry = session.log.append(kind, text)
    if (kind === 'version') {
      session.version = session.log.resolveVersion()
    }
    return entry
  }

  logMessage(message: string): HistoryEntry {
    return this.append('message', message)
  }

  logWarning(warning: string): HistoryEntry {
    return this.append('warning', warning)
  }

  logError(error: string): HistoryEntry {
    return this.append('error', error)
  }

  logVersion(version: string): HistoryEntry {
    return this.append('version', version)
  }

  /** @throws StoreError NOT_OPEN, ENGINE_ERROR or NO_VERSION_RECORDED */
  resolveVersion(): string {
    return this.requireOpen('resolve version').log.resolveVersion()
  }

  history(kind?: HistoryKind): HistoryEntry[] {
    return this.requireOpen('read history').log.entries(kind)
  }

  // --- internals ---

  private chatter(message: string, level: number, channel: keyof Reporter = 'info'): void {
    if (this.verbosity >= level) {
      this.reporter[channel](message)
    }
  }

  private attach(session: Session): void {
    this.session = session
    abandoned.register(this, session.engine, this)
  }

  private connectTo(path: string, mustExist: boolean): StorageEngine {
    try {
      return this.connect(path, { mustExist })
    } catch (err) {
      throw engineError(`Failed to connect to ${path}`, err, { path })
    }
  }

  private requireClosed(path: string): void {
    if (this.session) {
      throw new StoreError(
        'ALREADY_OPEN',
        `Cannot use ${path}: ${this.session.path} is already open`,
        { path: this.session.path },
      )
    }
  }

  private requireOpen(action: string): Session {
    if (!this.session) {
      throw new StoreError('NOT_OPEN', `Cannot ${action}: no store is open`)
    }
    return this.session
  }

  private checkTableName(name: string): void {
    if (!isIdentifier(name)) {
      throw new StoreError('INVALID_NAME', `Invalid table name "${name}"`, { table: name })
    }
    const lower = name.toLowerCase()
    if (lower === HISTORY_TABLE || lower.startsWith('sqlite_')) {
      throw new StoreError('INVALID_NAME', `Table name "${name}" is reserved`, { table: name })
    }
  }

  private tableExists(session: Session, name: string): boolean {
    try {
      const row = session.engine.get<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE",
        [name],
      )
      return row !== undefined
    } catch (err) {
      throw engineError(`Failed to look up table ${name}`, err, { path: session.path, table: name })
    }
  }

  private inTransaction(session: Session, action: string, table: string, fn: () => void): void {
    try {
      session.engine.transaction(fn)
    } catch (err) {
      if (err instanceof StoreError) throw err
      throw engineError(`${action} in ${session.path}`, err, { path: session.path, table })
    }
  }
}

/**
 * Open the store at `path`, run `fn`, and close it on every exit path.
 */
export function withStore<T>(path: string, fn: (store: Store) => T, options: StoreOptions = {}): T {
  const store = new Store(options)
  store.open(path)
  try {
    return fn(store)
  } finally {
    if (store.state === 'open') store.close()
  }
}
