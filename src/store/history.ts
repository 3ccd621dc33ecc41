/**
 * Append-only history log stored in the reserved `history` table.
 *
 * Every append is its own committed statement, so a crash between calls
 * never loses an earlier entry. The store version is derived from this log
 * (newest `version` entry) and never stored anywhere else.
 */

import { Value } from '@sinclair/typebox/value'
import type { StorageEngine } from '../storage/interface.js'
import { HISTORY_TABLE } from '../storage/schema.js'
import { HistoryKindSchema, type HistoryEntry, type HistoryKind } from '../types/history.js'
import { StoreError, engineError } from './errors.js'

/** Row shape for history table reads. */
interface HistoryRow {
  sequence: number
  time: number
  type: string
  event: string
}

/** Milliseconds since the epoch, as returned by Date.now(). */
export type Clock = () => number

export class HistoryLog {
  constructor(
    private readonly storage: StorageEngine,
    private readonly clock: Clock = Date.now,
    private readonly path?: string,
  ) {}

  /**
   * Write one entry stamped with the current time in whole seconds.
   *
   * @throws StoreError ENGINE_ERROR when the insert fails
   */
  append(kind: HistoryKind, text: string): HistoryEntry {
    const timestamp = Math.floor(this.clock() / 1000)
    try {
      const result = this.storage.run(
        `INSERT INTO ${HISTORY_TABLE} (time, type, event) VALUES (?, ?, ?)`,
        [timestamp, kind, text],
      )
      return { sequence: Number(result.lastInsertRowid), timestamp, kind, payload: text }
    } catch (err) {
      throw engineError(`Failed to append ${kind} to history of ${this.path ?? 'store'}`, err, {
        path: this.path,
      })
    }
  }

  /**
   * Payload of the most recent version entry, ordered by time then insertion.
   *
   * @throws StoreError NO_VERSION_RECORDED when the log has no version entry
   */
  resolveVersion(): string {
    let row: Pick<HistoryRow, 'event'> | undefined
    try {
      row = this.storage.get<Pick<HistoryRow, 'event'>>(
        `SELECT event FROM ${HISTORY_TABLE} WHERE type = ? ORDER BY time DESC, rowid DESC LIMIT 1`,
        ['version'],
      )
    } catch (err) {
      throw engineError(`Failed to read version from ${this.path ?? 'store'}`, err, { path: this.path })
    }
    if (!row) {
      throw new StoreError('NO_VERSION_RECORDED', `No version recorded in ${this.path ?? 'store'}`, {
        path: this.path,
      })
    }
    return row.event
  }

  /**
   * All entries in insertion order, optionally limited to one kind.
   */
  entries(kind?: HistoryKind): HistoryEntry[] {
    let rows: HistoryRow[]
    try {
      rows =
        kind === undefined
          ? this.storage.all<HistoryRow>(
              `SELECT rowid AS sequence, time, type, event FROM ${HISTORY_TABLE} ORDER BY rowid`,
            )
          : this.storage.all<HistoryRow>(
              `SELECT rowid AS sequence, time, type, event FROM ${HISTORY_TABLE} WHERE type = ? ORDER BY rowid`,
              [kind],
            )
    } catch (err) {
      throw engineError(`Failed to read history of ${this.path ?? 'store'}`, err, { path: this.path })
    }
    return rows.map((row) => this.rowToEntry(row))
  }

  private rowToEntry(row: HistoryRow): HistoryEntry {
    if (!Value.Check(HistoryKindSchema, row.type)) {
      throw new StoreError(
        'ENGINE_ERROR',
        `Unrecognised history kind "${row.type}" at entry ${row.sequence} of ${this.path ?? 'store'}`,
        { path: this.path },
      )
    }
    return {
      sequence: row.sequence,
      timestamp: row.time,
      kind: row.type,
      payload: row.event,
    }
  }
}
