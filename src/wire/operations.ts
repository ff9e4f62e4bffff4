/**
 * Client operations.
 *
 * Write-style operations (insert, update, delete) resolve with the request id
 * once the message has been written; the server sends nothing back for them.
 * `query` resolves with the returned documents.
 */

import type { Document } from 'bson'
import type { Connection } from './connection.js'
import { buildDeleteBody, buildInsertBody, buildQueryBody, buildUpdateBody } from './message.js'
import {
  OpCode,
  type Collection,
  type FieldSelector,
  type NumToReturn,
  type NumToSkip,
  type QueryOptionName,
  type RequestID,
  type Selector,
  type UpdateFlagName,
} from './types.js'

/**
 * Delete the documents matching `selector`.
 *
 * Named `deleteDocuments` because `delete` is a reserved word; also exported
 * as `remove`.
 */
export async function deleteDocuments(
  conn: Connection,
  collection: Collection,
  selector: Selector
): Promise<RequestID> {
  return conn.send(OpCode.OP_DELETE, buildDeleteBody(collection, selector, conn.codec))
}

export const remove = deleteDocuments

export async function insert(conn: Connection, collection: Collection, document: Document): Promise<RequestID> {
  return conn.send(OpCode.OP_INSERT, buildInsertBody(collection, [document], conn.codec))
}

/**
 * Insert all `documents` in a single message. No batching is done; keep the
 * total under the server's message size limit.
 */
export async function insertMany(
  conn: Connection,
  collection: Collection,
  documents: readonly Document[]
): Promise<RequestID> {
  return conn.send(OpCode.OP_INSERT, buildInsertBody(collection, documents, conn.codec))
}

export async function update(
  conn: Connection,
  collection: Collection,
  flags: Iterable<UpdateFlagName>,
  selector: Selector,
  updateDocument: Document
): Promise<RequestID> {
  return conn.send(OpCode.OP_UPDATE, buildUpdateBody(collection, flags, selector, updateDocument, conn.codec))
}

/**
 * Send an OP_QUERY and wait for its reply.
 *
 * Only the first batch is returned; the reply's cursor id is not followed.
 */
export async function query(
  conn: Connection,
  collection: Collection,
  options: Iterable<QueryOptionName>,
  numberToSkip: NumToSkip,
  numberToReturn: NumToReturn,
  selector: Selector,
  fieldSelector?: FieldSelector
): Promise<Document[]> {
  const body = buildQueryBody(
    collection,
    options,
    numberToSkip,
    numberToReturn,
    selector,
    fieldSelector,
    conn.codec
  )
  const reply = await conn.request(OpCode.OP_QUERY, body)
  return reply.documents
}
