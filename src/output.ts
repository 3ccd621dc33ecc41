/**
 * Consistent output helpers for the CLI and store traces.
 *
 * All output uses process.stdout/stderr.write for testability.
 * No colors, no emojis -- clean text output only.
 */
export const output = {
  /** Write text to stdout as-is, without a trailing newline. */
  write(text: string): void {
    process.stdout.write(text)
  },

  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a warning message to stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /**
   * Write rows as aligned columns under a dashed header rule.
   * Column order follows the keys of the first row.
   */
  table(rows: Record<string, string>[]): void {
    if (rows.length === 0) return
    const keys = Object.keys(rows[0])
    const widths = keys.map((k) => Math.max(k.length, ...rows.map((row) => (row[k] ?? '').length)))
    const line = (cells: string[]): string => cells.map((c, i) => c.padEnd(widths[i])).join('  ') + '\n'

    process.stdout.write(line(keys))
    process.stdout.write(line(widths.map((w) => '-'.repeat(w))))
    for (const row of rows) {
      process.stdout.write(line(keys.map((k) => row[k] ?? '')))
    }
  },
}
