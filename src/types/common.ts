import { Type, type Static } from '@sinclair/typebox'

/** SQL identifier usable as a table or column name */
export const IdentifierString = Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$' })
export type IdentifierString = Static<typeof IdentifierString>

/** Integer seconds since the Unix epoch */
export const EpochSeconds = Type.Integer({ minimum: 0 })
export type EpochSeconds = Static<typeof EpochSeconds>
