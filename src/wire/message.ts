/**
 * Legacy Wire Protocol Message Framing
 *
 * Handles the binary message format including:
 * - MsgHeader (16 bytes)
 * - OP_INSERT / OP_UPDATE / OP_DELETE / OP_QUERY request bodies
 * - OP_REPLY fixed block (20 bytes)
 *
 * All integers are little-endian and fixed width.
 */

import type { Document } from 'bson'
import { bsonCodec, type DocumentCodec } from './codec.js'
import { InvalidArgumentError } from './errors.js'
import { encodeQueryOptions, encodeUpdateFlags, opcodeToWire, wireToOpcode } from './opcodes.js'
import {
  HEADER_SIZE,
  OpCode,
  REPLY_HEADER_SIZE,
  type Collection,
  type FieldSelector,
  type MsgHeader,
  type NumToReturn,
  type NumToSkip,
  type OpCodeValue,
  type QueryOptionName,
  type ReplyHeader,
  type RequestID,
  type Selector,
  type UpdateFlagName,
} from './types.js'

const INT32_MIN = -0x80000000
const INT32_MAX = 0x7fffffff

function assertInt32(name: string, value: number): void {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new InvalidArgumentError(`${name} must be a signed 32-bit integer, got ${value}`)
  }
}

function int32(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(4)
  buffer.writeInt32LE(value, 0)
  return buffer
}

/**
 * Encode a collection name as raw UTF-8 followed by a single NUL.
 * No length prefix.
 */
export function encodeCString(value: string): Buffer {
  if (value.includes('\0')) {
    throw new InvalidArgumentError('Collection name cannot contain a null byte')
  }
  const bytes = Buffer.from(value, 'utf8')
  const buffer = Buffer.allocUnsafe(bytes.length + 1)
  bytes.copy(buffer, 0)
  buffer[bytes.length] = 0
  return buffer
}

/**
 * Parse a C-style null-terminated string
 */
function parseCString(buffer: Buffer, offset: number): [string, number] {
  const end = buffer.indexOf(0, offset)
  if (end === -1) {
    throw new RangeError(`Unterminated cstring at offset ${offset}`)
  }
  return [buffer.toString('utf8', offset, end), end + 1]
}

function encodeDocument(codec: DocumentCodec, document: Document): Buffer {
  const bytes = codec.encode(document)
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

/**
 * OP_DELETE body: reserved | collection | flags (0) | selector
 */
export function buildDeleteBody(
  collection: Collection,
  selector: Selector,
  codec: DocumentCodec = bsonCodec
): Buffer {
  return Buffer.concat([
    int32(0),
    encodeCString(collection),
    int32(0),
    encodeDocument(codec, selector),
  ])
}

/**
 * OP_INSERT body: reserved | collection | documents...
 *
 * Every document goes into the one body, in order. An empty list yields the
 * reserved field and the collection name only.
 */
export function buildInsertBody(
  collection: Collection,
  documents: readonly Document[],
  codec: DocumentCodec = bsonCodec
): Buffer {
  return Buffer.concat([
    int32(0),
    encodeCString(collection),
    ...documents.map((document) => encodeDocument(codec, document)),
  ])
}

/**
 * OP_QUERY body: options | collection | skip | return | selector | [fieldSelector]
 *
 * Without a field selector nothing is written after the selector.
 */
export function buildQueryBody(
  collection: Collection,
  options: Iterable<QueryOptionName>,
  numberToSkip: NumToSkip,
  numberToReturn: NumToReturn,
  selector: Selector,
  fieldSelector?: FieldSelector,
  codec: DocumentCodec = bsonCodec
): Buffer {
  assertInt32('numberToSkip', numberToSkip)
  assertInt32('numberToReturn', numberToReturn)

  const parts = [
    int32(encodeQueryOptions(options)),
    encodeCString(collection),
    int32(numberToSkip),
    int32(numberToReturn),
    encodeDocument(codec, selector),
  ]
  if (fieldSelector !== undefined) {
    parts.push(encodeDocument(codec, fieldSelector))
  }
  return Buffer.concat(parts)
}

/**
 * OP_UPDATE body: reserved | collection | flags | selector | update
 */
export function buildUpdateBody(
  collection: Collection,
  flags: Iterable<UpdateFlagName>,
  selector: Selector,
  update: Document,
  codec: DocumentCodec = bsonCodec
): Buffer {
  return Buffer.concat([
    int32(0),
    encodeCString(collection),
    int32(encodeUpdateFlags(flags)),
    encodeDocument(codec, selector),
    encodeDocument(codec, update),
  ])
}

/**
 * Parse the 16-byte message header
 */
export function parseHeader(buffer: Buffer): MsgHeader {
  if (buffer.length < HEADER_SIZE) {
    throw new RangeError(`Buffer too small for header: ${buffer.length} < ${HEADER_SIZE}`)
  }

  return {
    messageLength: buffer.readInt32LE(0),
    requestID: buffer.readInt32LE(4),
    responseTo: buffer.readInt32LE(8),
    opCode: wireToOpcode(buffer.readInt32LE(12)),
  }
}

/**
 * Serialize a message header to buffer
 */
export function serializeHeader(header: MsgHeader): Buffer {
  const buffer = Buffer.allocUnsafe(HEADER_SIZE)
  buffer.writeInt32LE(header.messageLength, 0)
  buffer.writeInt32LE(header.requestID, 4)
  buffer.writeInt32LE(header.responseTo, 8)
  buffer.writeInt32LE(opcodeToWire(header.opCode), 12)
  return buffer
}

/**
 * Wrap a body in a request envelope. responseTo is always 0 on requests.
 */
export function packMessage(opCode: OpCodeValue, requestID: RequestID, body: Buffer): Buffer {
  assertInt32('requestID', requestID)
  const header = serializeHeader({
    messageLength: HEADER_SIZE + body.length,
    requestID,
    responseTo: 0,
    opCode,
  })
  return Buffer.concat([header, body], HEADER_SIZE + body.length)
}

/**
 * Parse the 20-byte OP_REPLY block that follows the header
 */
export function parseReplyHeader(buffer: Buffer): ReplyHeader {
  if (buffer.length < REPLY_HEADER_SIZE) {
    throw new RangeError(`Buffer too small for reply block: ${buffer.length} < ${REPLY_HEADER_SIZE}`)
  }

  return {
    responseFlags: buffer.readInt32LE(0),
    cursorID: buffer.readBigInt64LE(4),
    startingFrom: buffer.readInt32LE(12),
    numberReturned: buffer.readInt32LE(16),
  }
}

export function serializeReplyHeader(reply: ReplyHeader): Buffer {
  const buffer = Buffer.allocUnsafe(REPLY_HEADER_SIZE)
  buffer.writeInt32LE(reply.responseFlags, 0)
  buffer.writeBigInt64LE(reply.cursorID, 4)
  buffer.writeInt32LE(reply.startingFrom, 12)
  buffer.writeInt32LE(reply.numberReturned, 16)
  return buffer
}

export interface SerializeReplyOptions {
  cursorID?: bigint
  responseFlags?: number
  startingFrom?: number
  /** Override the count written to the reply block */
  numberReturned?: number
  codec?: DocumentCodec
}

/**
 * Serialize an OP_REPLY envelope.
 *
 * The client never sends one; this exists so replies can be produced
 * in-process, e.g. by a stand-in server.
 */
export function serializeOpReply(
  requestID: RequestID,
  responseTo: RequestID,
  documents: readonly Document[],
  options: SerializeReplyOptions = {}
): Buffer {
  const codec = options.codec ?? bsonCodec
  const docBuffers = documents.map((document) => encodeDocument(codec, document))
  const docsSize = docBuffers.reduce((sum, buf) => sum + buf.length, 0)

  // header(16) + responseFlags(4) + cursorID(8) + startingFrom(4) + numberReturned(4) + docs
  const messageLength = HEADER_SIZE + REPLY_HEADER_SIZE + docsSize

  return Buffer.concat([
    serializeHeader({ messageLength, requestID, responseTo, opCode: OpCode.OP_REPLY }),
    serializeReplyHeader({
      responseFlags: options.responseFlags ?? 0,
      cursorID: options.cursorID ?? 0n,
      startingFrom: options.startingFrom ?? 0,
      numberReturned: options.numberReturned ?? documents.length,
    }),
    ...docBuffers,
  ])
}

/** Parsed OP_QUERY request */
export interface OpQueryMessage {
  header: MsgHeader
  flags: number
  fullCollectionName: string
  numberToSkip: number
  numberToReturn: number
  query: Document
  returnFieldsSelector?: Document
}

/**
 * Parse an OP_QUERY request envelope. Used to inspect what was written to a
 * stream.
 */
export function parseOpQuery(buffer: Buffer, codec: DocumentCodec = bsonCodec): OpQueryMessage {
  const header = parseHeader(buffer)

  if (header.opCode !== OpCode.OP_QUERY) {
    throw new InvalidArgumentError(`Expected OP_QUERY (${OpCode.OP_QUERY}), got ${header.opCode}`)
  }

  let offset = HEADER_SIZE

  const flags = buffer.readInt32LE(offset)
  offset += 4

  const [fullCollectionName, afterName] = parseCString(buffer, offset)
  offset = afterName

  const numberToSkip = buffer.readInt32LE(offset)
  offset += 4

  const numberToReturn = buffer.readInt32LE(offset)
  offset += 4

  const [query, queryLength] = codec.decode(buffer, offset)
  offset += queryLength

  let returnFieldsSelector: Document | undefined
  if (offset < header.messageLength) {
    ;[returnFieldsSelector] = codec.decode(buffer.subarray(0, header.messageLength), offset)
  }

  return {
    header,
    flags,
    fullCollectionName,
    numberToSkip,
    numberToReturn,
    query,
    returnFieldsSelector,
  }
}
