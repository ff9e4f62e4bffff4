/**
 * Legacy wire protocol client
 *
 * Frames OP_INSERT, OP_UPDATE, OP_DELETE and OP_QUERY requests and parses the
 * OP_REPLY that answers a query.
 *
 * @example
 * ```typescript
 * import { connect, insert, query } from 'legacy-wire-client'
 *
 * const conn = await connect('localhost')
 * await insert(conn, 'app.users', { name: 'Ada' })
 * const users = await query(conn, 'app.users', ['SlaveOK'], 0, 10, { name: 'Ada' })
 * await conn.close()
 * ```
 */

export * from './wire/index.js'
