/** Typed store error codes for downstream error handling */
export type StoreErrorCode =
  | 'ALREADY_OPEN'
  | 'NOT_OPEN'
  | 'NOT_FOUND'
  | 'ENGINE_ERROR'
  | 'NO_VERSION_RECORDED'
  | 'INVALID_NAME'

/** Context attached to a store error */
export interface StoreErrorContext {
  path?: string
  table?: string
  cause?: unknown
}

/** Store lifecycle, table or history error with typed error code */
export class StoreError extends Error {
  readonly code: StoreErrorCode
  readonly path?: string
  readonly table?: string

  constructor(code: StoreErrorCode, message: string, context: StoreErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause })
    this.name = 'StoreError'
    this.code = code
    this.path = context.path
    this.table = context.table
  }
}

/**
 * Wrap an underlying engine failure as ENGINE_ERROR, keeping its message.
 */
export function engineError(action: string, err: unknown, context: StoreErrorContext = {}): StoreError {
  const detail = err instanceof Error ? err.message : String(err)
  return new StoreError('ENGINE_ERROR', `${action}: ${detail}`, { ...context, cause: err })
}
