import { Type, type Static } from '@sinclair/typebox'
import { IdentifierString } from './common.js'

const SIZE = '( ?\\(\\d+( ?, ?\\d+)?\\))?'

/**
 * Declared column type with optional constraints, e.g. `TEXT`,
 * `DECIMAL(10, 2)` or `INTEGER NOT NULL DEFAULT 0`. Constraint words and
 * numeric literals are accepted; expressions and string literals
 * (`CHECK (x > 0)`, `DEFAULT 'a'`) are not.
 */
export const ColumnTypeString = Type.String({
  pattern: `^[A-Za-z][A-Za-z0-9_]*${SIZE}( ([A-Za-z][A-Za-z0-9_]*|[-+]?\\d+(\\.\\d+)?)${SIZE})*$`,
})

export const ColumnDefinitionSchema = Type.Object({
  name: IdentifierString,
  type: ColumnTypeString,
})

export type ColumnDefinition = Static<typeof ColumnDefinitionSchema>

/** Ordered, non-empty column list for a new table */
export const ColumnSpecSchema = Type.Array(ColumnDefinitionSchema, { minItems: 1 })

export type ColumnSpec = Static<typeof ColumnSpecSchema>
