import { Type, type Static } from '@sinclair/typebox'

/** What to do when an operation would overwrite a file or table */
export const ConfirmPolicy = Type.Union([
  Type.Literal('prompt'),
  Type.Literal('always'),
  Type.Literal('never'),
])
export type ConfirmPolicy = Static<typeof ConfirmPolicy>

/** Stratum configuration schema for stratum.config.json */
export const StratumConfigSchema = Type.Object({
  store: Type.Object({
    path: Type.String({ minLength: 1, default: './data/store.db' }),
    version: Type.String({ minLength: 1, default: '1.0' }),
  }),
  verbosity: Type.Integer({ minimum: 0, maximum: 2, default: 1 }),
  confirm: ConfirmPolicy,
})

export type StratumConfig = Static<typeof StratumConfigSchema>
