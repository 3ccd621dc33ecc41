import { Type, type Static } from '@sinclair/typebox'
import { EpochSeconds } from './common.js'

/** Kind of a history event */
export const HistoryKindSchema = Type.Union([
  Type.Literal('message'),
  Type.Literal('warning'),
  Type.Literal('error'),
  Type.Literal('version'),
])

export type HistoryKind = Static<typeof HistoryKindSchema>

/** One row of the history table, with its insertion sequence */
export const HistoryEntrySchema = Type.Object({
  sequence: Type.Integer({ minimum: 1 }),
  timestamp: EpochSeconds,
  kind: HistoryKindSchema,
  payload: Type.String(),
})

export type HistoryEntry = Static<typeof HistoryEntrySchema>
