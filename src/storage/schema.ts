/** Name of the reserved history table every store file carries. */
export const HISTORY_TABLE = 'history'

/**
 * DDL for the history table.
 *
 * Insertion order is the implicit rowid, which breaks ties between events
 * written within the same second.
 */
export const CREATE_HISTORY_TABLE = `
  CREATE TABLE ${HISTORY_TABLE} (
    time INTEGER NOT NULL,
    type TEXT NOT NULL,
    event TEXT NOT NULL
  )
`
