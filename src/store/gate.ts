import { readSync } from 'node:fs'
import { output } from '../output.js'

/** Kind of entity an overwrite would destroy. */
export type EntityKind = 'store file' | 'table'

/**
 * Synchronous yes/no decision consulted before a destructive operation.
 * Returning false declines; the caller leaves all state untouched.
 */
export type ConfirmationGate = (entity: string, kind: EntityKind) => boolean

/** Gate that approves every overwrite (automated pipelines). */
export const allowAll: ConfirmationGate = () => true

/** Gate that declines every overwrite. */
export const denyAll: ConfirmationGate = () => false

/** Line-oriented terminal I/O used by the interactive gate. */
export interface TerminalIo {
  /** Read one line without its terminator, or null once input is exhausted. */
  read(): string | null
  write(text: string): void
}

const RESPONSES: Record<string, boolean> = { Y: true, N: false }
const CHOICES = Object.keys(RESPONSES)
  .map((k) => k.toLowerCase())
  .join(',')

export interface LineReaderOptions {
  /** Reads at most one byte into `buf`; returns the count. Defaults to fd 0. */
  readByte?: (buf: Buffer) => number
  /** Blocks the thread for `ms`. */
  sleep?: (ms: number) => void
}

const FIRST_BACKOFF_MS = 5
const MAX_BACKOFF_MS = 200

function errorCode(err: unknown): unknown {
  return err && typeof err === 'object' && 'code' in err ? err.code : undefined
}

function readStdinByte(buf: Buffer): number {
  return readSync(0, buf, 0, 1, null)
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)
}

/**
 * Blocking line reader over stdin.
 *
 * The gate is synchronous, so this reads byte-by-byte from fd 0 rather than
 * going through readline. A non-blocking fd answers EAGAIN until input
 * arrives; each retry waits twice as long as the last, up to MAX_BACKOFF_MS.
 */
export function readStdinLine(options: LineReaderOptions = {}): string | null {
  const readByte = options.readByte ?? readStdinByte
  const sleep = options.sleep ?? sleepSync
  const buf = Buffer.alloc(1)
  const bytes: number[] = []
  let backoff = FIRST_BACKOFF_MS
  for (;;) {
    let n: number
    try {
      n = readByte(buf)
    } catch (err) {
      const code = errorCode(err)
      if (code === 'EAGAIN') {
        sleep(backoff)
        backoff = Math.min(backoff * 2, MAX_BACKOFF_MS)
        continue
      }
      if (code === 'EOF') break
      throw err
    }
    backoff = FIRST_BACKOFF_MS
    if (n === 0) break
    if (buf[0] === 0x0a) return Buffer.from(bytes).toString('utf-8').replace(/\r$/, '')
    bytes.push(buf[0])
  }
  return bytes.length > 0 ? Buffer.from(bytes).toString('utf-8') : null
}

const stdio: TerminalIo = {
  read: () => readStdinLine(),
  write: output.write,
}

/**
 * Interactive gate: warns that the entity will be overwritten and asks
 * until it gets `y` or `n`. After an unrecognised answer the question is
 * repeated in its short form. End of input declines.
 */
export function createTerminalGate(io: TerminalIo = stdio): ConfirmationGate {
  return (entity, kind) => {
    let minimal = false
    for (;;) {
      if (minimal) {
        io.write(` Overwrite? (${CHOICES}) : `)
      } else {
        io.write(
          ` ****WARNING**** ${kind}: '${entity}' exists.\n` +
            ' If you continue it *WILL* be overwritten\n' +
            ` Overwrite? (${CHOICES}) : `,
        )
      }
      const line = io.read()
      if (line === null) {
        io.write('\n')
        return false
      }
      const option = line.trim().toUpperCase()
      if (option in RESPONSES) {
        io.write('*'.repeat(64) + '\n')
        return RESPONSES[option]
      }
      io.write(`ERROR: unrecognised choice '${option}'\n`)
      minimal = true
    }
  }
}
