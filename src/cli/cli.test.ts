import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { Command } from 'commander'
import { createProgram } from './program.js'
import { Store } from '../store/store.js'
import { denyAll } from '../store/gate.js'

describe('CLI', () => {
  let tempDir: string
  let configPath: string
  let dbPath: string
  let stdout: string[]
  let stderr: string[]

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stratum-cli-test-'))
    configPath = join(tempDir, 'stratum.config.json')
    dbPath = join(tempDir, 'data.db')
    writeFileSync(configPath, JSON.stringify({ confirm: 'never', verbosity: 0 }))
    stdout = []
    stderr = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk))
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(tempDir, { recursive: true, force: true })
  })

  function program(): Command {
    return createProgram().exitOverride()
  }

  function run(...args: string[]): void {
    program().parse(['node', 'stratum', '-c', configPath, ...args])
  }

  function seedStore(version = '1.0'): void {
    const store = new Store({ verbosity: 0, confirm: denyAll })
    store.create(dbPath, version)
    store.close()
  }

  function withOpenStore<T>(fn: (store: Store) => T): T {
    const store = new Store({ verbosity: 0, confirm: denyAll })
    store.open(dbPath)
    try {
      return fn(store)
    } finally {
      store.close()
    }
  }

  describe('help output', () => {
    it('should list every command', () => {
      const help = program().helpInformation()
      for (const name of ['create', 'info', 'add-table', 'drop-table', 'log', 'history']) {
        expect(help).toContain(name)
      }
    })
  })

  describe('create command', () => {
    it('should create a store with the given version', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      run('create', dbPath, '--store-version', '3.1')

      expect(exitSpy).not.toHaveBeenCalled()
      expect(existsSync(dbPath)).toBe(true)
      expect(stdout).toContain(`OK: Created ${dbPath} (version 3.1)\n`)
      expect(withOpenStore((s) => s.resolveVersion())).toBe('3.1')
    })

    it('should fall back to the configured version', () => {
      writeFileSync(configPath, JSON.stringify({ confirm: 'never', verbosity: 0, store: { version: '9' } }))
      run('create', dbPath)
      expect(withOpenStore((s) => s.resolveVersion())).toBe('9')
    })

    it('should report a declined overwrite without failing', () => {
      seedStore('1.0')
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      run('create', dbPath, '--store-version', '2.0')

      expect(exitSpy).not.toHaveBeenCalled()
      expect(stdout).toContain('Cancelled\n')
      expect(withOpenStore((s) => s.resolveVersion())).toBe('1.0')
    })

    it('should overwrite with --force', () => {
      seedStore('1.0')
      run('create', dbPath, '--store-version', '2.0', '--force')
      expect(withOpenStore((s) => s.history().map((e) => e.payload))).toEqual(['file created', '2.0'])
    })
  })

  describe('info command', () => {
    it('should print the version and tables', () => {
      seedStore('1.0')
      withOpenStore((s) => s.addTable('people', 'id INTEGER, name TEXT'))
      run('info', dbPath)
      expect(stdout).toEqual([`Path:    ${dbPath}\n`, 'Version: 1.0\n', 'Tables:  people\n'])
    })

    it('should exit 1 with NOT_FOUND message for a missing file', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      run('info', join(tempDir, 'missing.db'))
      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr).toEqual([`Error: File ${join(tempDir, 'missing.db')} could not be found\n`])
    })
  })

  describe('table commands', () => {
    beforeEach(() => {
      seedStore()
    })

    it('should add a table from the textual column form', () => {
      run('add-table', dbPath, 'people', 'id INTEGER, name TEXT')
      expect(stdout).toContain(`OK: Table people added to ${dbPath}\n`)
      expect(withOpenStore((s) => s.listTables())).toEqual(['people'])
    })

    it('should decline replacing an existing table under the never policy', () => {
      run('add-table', dbPath, 'people', 'id INTEGER')
      run('add-table', dbPath, 'people', 'email TEXT')
      expect(stdout).toContain('Cancelled\n')
      expect(withOpenStore((s) => s.history('message').map((e) => e.payload))).toEqual([
        'file created',
        'table people added',
      ])
    })

    it('should replace with --force', () => {
      run('add-table', dbPath, 'people', 'id INTEGER')
      run('add-table', dbPath, 'people', 'email TEXT', '--force')
      expect(withOpenStore((s) => s.history().at(-1)?.payload)).toBe('table people replaced')
    })

    it('should drop when the policy allows it', () => {
      run('add-table', dbPath, 'people', 'id INTEGER')
      writeFileSync(configPath, JSON.stringify({ confirm: 'always', verbosity: 0 }))
      run('drop-table', dbPath, 'people')
      expect(stdout).toContain(`OK: Table people dropped from ${dbPath}\n`)
      expect(withOpenStore((s) => s.listTables())).toEqual([])
    })

    it('should exit 1 for a reserved table name', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      run('add-table', dbPath, 'history', 'id INTEGER')
      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr).toEqual(['Error: Table name "history" is reserved\n'])
    })
  })

  describe('history commands', () => {
    beforeEach(() => {
      seedStore()
    })

    it('should append a warning', () => {
      run('log', dbPath, 'warning', 'low disk')
      expect(stdout).toContain('OK: Logged warning #3\n')
      expect(withOpenStore((s) => s.history('warning').map((e) => e.payload))).toEqual(['low disk'])
    })

    it('should refuse to log a version through the log command', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      run('log', dbPath, 'version', '2.0')
      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr).toEqual(['Error: Invalid kind: version (expected one of message, warning, error)\n'])
      expect(withOpenStore((s) => s.resolveVersion())).toBe('1.0')
    })

    it('should print history entries as a table', () => {
      run('history', dbPath, '--kind', 'version')
      expect(stdout[0]).toMatch(/^#\s+Time\s+Kind\s+Event\s*\n$/)
      expect(stdout).toHaveLength(3)
      expect(stdout[2]).toMatch(/^2 {2}\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.000Z {2}version {2}1\.0 *\n$/)
    })

    it('should reject an unknown kind filter', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      run('history', dbPath, '--kind', 'debug')
      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr).toEqual(['Error: Invalid kind: debug\n'])
    })
  })
})
