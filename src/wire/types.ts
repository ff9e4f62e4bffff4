/**
 * Legacy Wire Protocol Types
 *
 * Message layouts for the pre-OP_MSG request/reply protocol: OP_INSERT,
 * OP_UPDATE, OP_DELETE and OP_QUERY requests answered by OP_REPLY.
 */

import type { Document } from 'bson'

/** Wire protocol opcodes */
export const OpCode = {
  /** Reply to a client request. responseTo is set */
  OP_REPLY: 1,
  /** Generic message command followed by a string */
  OP_MSG: 1000,
  /** Update document */
  OP_UPDATE: 2001,
  /** Insert new document */
  OP_INSERT: 2002,
  /** Reserved, never sent */
  OP_GET_BY_OID: 2003,
  /** Query a collection */
  OP_QUERY: 2004,
  /** Get more data from a query (not implemented by this client) */
  OP_GET_MORE: 2005,
  /** Delete documents */
  OP_DELETE: 2006,
  /** Tell the server the client is done with a cursor */
  OP_KILL_CURSORS: 2007,
} as const

export type OpCodeName = keyof typeof OpCode
export type OpCodeValue = (typeof OpCode)[OpCodeName]

/** OP_QUERY option bits */
export const QueryOption = {
  TailableCursor: 1 << 1,
  SlaveOK: 1 << 2,
  OpLogReplay: 1 << 3,
  NoCursorTimeout: 1 << 4,
} as const

export type QueryOptionName = keyof typeof QueryOption

/** OP_UPDATE flag bits */
export const UpdateFlag = {
  Upsert: 1 << 0,
  Multiupdate: 1 << 1,
} as const

export type UpdateFlagName = keyof typeof UpdateFlag

/** OP_REPLY response flag bits */
export const ReplyFlag = {
  CursorNotFound: 1 << 0,
  QueryFailure: 1 << 1,
  ShardConfigStale: 1 << 2,
  AwaitCapable: 1 << 3,
} as const

export type ReplyFlagName = keyof typeof ReplyFlag

/** Message header size in bytes */
export const HEADER_SIZE = 16

/** OP_REPLY fixed block size in bytes (flags + cursorID + startingFrom + numberReturned) */
export const REPLY_HEADER_SIZE = 20

/** Fully qualified collection name, e.g. `"app.users"` */
export type Collection = string
export type Selector = Document
export type FieldSelector = Document
/** Signed 32-bit correlation token */
export type RequestID = number
export type NumToSkip = number
export type NumToReturn = number

/**
 * Message header structure (16 bytes)
 * All integers are little-endian
 */
export interface MsgHeader {
  /** Total message size including this header */
  messageLength: number
  /** Client-generated identifier */
  requestID: RequestID
  /** For replies: requestID being replied to */
  responseTo: RequestID
  opCode: OpCodeValue
}

/** OP_REPLY block that follows the header (20 bytes) */
export interface ReplyHeader {
  responseFlags: number
  cursorID: bigint
  startingFrom: number
  numberReturned: number
}

/** Fully decoded OP_REPLY */
export interface OpReplyMessage {
  header: MsgHeader
  reply: ReplyHeader
  documents: Document[]
}

/** Stages of reply parsing, in the order they run */
export type ReplyStage = 'AwaitHeader' | 'AwaitReplyBlock' | 'AwaitDocuments' | 'Done'
