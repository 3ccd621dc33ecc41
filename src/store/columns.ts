import { Value } from '@sinclair/typebox/value'
import { IdentifierString } from '../types/common.js'
import { ColumnSpecSchema, type ColumnSpec } from '../types/table.js'
import { StoreError } from './errors.js'

/** Whether `name` can be used unchanged as a table or column identifier. */
export function isIdentifier(name: string): boolean {
  return Value.Check(IdentifierString, name)
}

/** Double-quote an identifier that has already passed isIdentifier(). */
export function quoteIdentifier(name: string): string {
  return `"${name}"`
}

/**
 * Validate a column spec and render the body of a CREATE TABLE statement.
 *
 * @throws StoreError ENGINE_ERROR when the spec is empty or malformed
 */
export function renderColumns(table: string, columns: ColumnSpec): string {
  if (!Value.Check(ColumnSpecSchema, columns)) {
    const first = [...Value.Errors(ColumnSpecSchema, columns)][0]
    const where = first ? ` at ${first.path || '/'}: ${first.message}` : ''
    throw new StoreError('ENGINE_ERROR', `Malformed column spec for table ${table}${where}`, { table })
  }

  const seen = new Set<string>()
  for (const column of columns) {
    const key = column.name.toLowerCase()
    if (seen.has(key)) {
      throw new StoreError('ENGINE_ERROR', `Duplicate column ${column.name} in table ${table}`, { table })
    }
    seen.add(key)
  }

  return columns.map((c) => `${quoteIdentifier(c.name)} ${c.type}`).join(', ')
}

/** Split on commas that are not inside parentheses. */
function splitTopLevel(text: string): string[] {
  const parts: string[] = []
  let depth = 0
  let current = ''
  for (const ch of text) {
    if (ch === '(') depth++
    if (ch === ')') depth--
    if (ch === ',' && depth === 0) {
      parts.push(current)
      current = ''
      continue
    }
    current += ch
  }
  parts.push(current)
  return parts
}

/**
 * Parse the textual column form, e.g. `"Id INTEGER, Name TEXT, Price DECIMAL(10,2)"`.
 *
 * @throws StoreError ENGINE_ERROR when a column has no type or the result is invalid
 */
export function parseColumnSpec(text: string): ColumnSpec {
  const columns = splitTopLevel(text).map((part) => {
    const trimmed = part.trim().replace(/\s+/g, ' ')
    const space = trimmed.indexOf(' ')
    if (space <= 0) {
      throw new StoreError('ENGINE_ERROR', `Column "${trimmed}" needs a name and a type`)
    }
    return { name: trimmed.slice(0, space), type: trimmed.slice(space + 1) }
  })

  if (!Value.Check(ColumnSpecSchema, columns)) {
    const first = [...Value.Errors(ColumnSpecSchema, columns)][0]
    throw new StoreError('ENGINE_ERROR', `Malformed column spec "${text}": ${first?.message ?? 'invalid'}`)
  }
  return columns
}
