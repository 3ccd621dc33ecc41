import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { SqliteStorage } from './sqlite.js'
import { CREATE_HISTORY_TABLE } from './schema.js'

describe('SqliteStorage', () => {
  let storage: SqliteStorage

  beforeEach(() => {
    storage = new SqliteStorage(':memory:')
    storage.run(CREATE_HISTORY_TABLE)
  })

  afterEach(() => {
    if (storage.open) storage.close()
  })

  describe('connection', () => {
    it('should report open until closed', () => {
      expect(storage.open).toBe(true)
      storage.close()
      expect(storage.open).toBe(false)
    })

    it('should enable WAL mode on file-backed databases', () => {
      const tempDir = mkdtempSync(join(tmpdir(), 'stratum-wal-test-'))
      const dbPath = join(tempDir, 'wal-test.db')
      try {
        const fileStore = new SqliteStorage(dbPath)
        const row = fileStore.get<{ journal_mode: string }>('PRAGMA journal_mode')
        expect(row?.journal_mode).toBe('wal')
        fileStore.close()
      } finally {
        rmSync(tempDir, { recursive: true, force: true })
      }
    })

    it('should refuse a missing file when mustExist is set', () => {
      const tempDir = mkdtempSync(join(tmpdir(), 'stratum-missing-test-'))
      try {
        expect(() => new SqliteStorage(join(tempDir, 'absent.db'), { mustExist: true })).toThrow()
      } finally {
        rmSync(tempDir, { recursive: true, force: true })
      }
    })

    it('should reject a file that is not a database', () => {
      const tempDir = mkdtempSync(join(tmpdir(), 'stratum-garbage-test-'))
      const path = join(tempDir, 'notes.txt')
      writeFileSync(path, 'this is plain text, not sqlite, padded out well past one header'.repeat(4))
      try {
        expect(() => new SqliteStorage(path, { mustExist: true })).toThrow(/not a database/)
      } finally {
        rmSync(tempDir, { recursive: true, force: true })
      }
    })
  })

  describe('statements', () => {
    it('should execute INSERT and return changes count and rowid', () => {
      const result = storage.run('INSERT INTO history (time, type, event) VALUES (?, ?, ?)', [100, 'message', 'hello'])
      expect(result.changes).toBe(1)
      expect(result.lastInsertRowid).toBe(1)
    })

    it('should return single row with get()', () => {
      storage.run('INSERT INTO history (time, type, event) VALUES (?, ?, ?)', [100, 'version', '1.0'])
      const row = storage.get<{ event: string }>('SELECT event FROM history WHERE type = ?', ['version'])
      expect(row?.event).toBe('1.0')
    })

    it('should return undefined for missing row with get()', () => {
      const row = storage.get('SELECT * FROM history WHERE type = ?', ['version'])
      expect(row).toBeUndefined()
    })

    it('should bind quotes as values rather than SQL', () => {
      storage.run('INSERT INTO history (time, type, event) VALUES (?, ?, ?)', [1, 'message', "it's done'); DROP TABLE history; --"])
      const rows = storage.all<{ event: string }>('SELECT event FROM history')
      expect(rows).toEqual([{ event: "it's done'); DROP TABLE history; --" }])
    })
  })

  describe('transactions', () => {
    it('should commit on success', () => {
      storage.transaction(() => {
        storage.run('INSERT INTO history (time, type, event) VALUES (?, ?, ?)', [1, 'message', 'a'])
        storage.run('INSERT INTO history (time, type, event) VALUES (?, ?, ?)', [2, 'message', 'b'])
      })
      expect(storage.all('SELECT * FROM history')).toHaveLength(2)
    })

    it('should roll back DDL and DML on error', () => {
      storage.run('CREATE TABLE people (name TEXT)')
      storage.run('INSERT INTO people (name) VALUES (?)', ['Ada'])
      expect(() => {
        storage.transaction(() => {
          storage.run('DROP TABLE people')
          storage.run('CREATE TABLE people (id INTEGER)')
          throw new Error('Simulated failure')
        })
      }).toThrow('Simulated failure')
      const rows = storage.all<{ name: string }>('SELECT name FROM people')
      expect(rows).toEqual([{ name: 'Ada' }])
    })
  })

  describe('persistence', () => {
    it('should persist data across close/reopen cycles with file-backed DB', () => {
      const tempDir = mkdtempSync(join(tmpdir(), 'stratum-storage-test-'))
      const dbPath = join(tempDir, 'test.db')

      try {
        const store1 = new SqliteStorage(dbPath)
        store1.run(CREATE_HISTORY_TABLE)
        store1.run('INSERT INTO history (time, type, event) VALUES (?, ?, ?)', [5, 'message', 'kept'])
        store1.close()

        const store2 = new SqliteStorage(dbPath, { mustExist: true })
        const row = store2.get<{ time: number; event: string }>('SELECT time, event FROM history')
        expect(row).toEqual({ time: 5, event: 'kept' })
        store2.close()
      } finally {
        rmSync(tempDir, { recursive: true, force: true })
      }
    })
  })
})
