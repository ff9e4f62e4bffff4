/**
 * OP_REPLY parsing.
 *
 * Runs strictly in order: AwaitHeader → AwaitReplyBlock → AwaitDocuments →
 * Done. Each stage is a separate function so a failure names the stage that
 * rejected the reply. Nothing is returned until the whole reply is decoded.
 */

import type { Document } from 'bson'
import { bsonCodec, type DocumentCodec } from './codec.js'
import { ProtocolViolationError, WireErrorCode } from './errors.js'
import { parseHeader, parseReplyHeader } from './message.js'
import { describeReplyFlags } from './opcodes.js'
import type { StreamReader } from './stream-reader.js'
import {
  HEADER_SIZE,
  OpCode,
  REPLY_HEADER_SIZE,
  type MsgHeader,
  type OpReplyMessage,
  type ReplyHeader,
  type RequestID,
} from './types.js'

/**
 * Header must be an OP_REPLY answering `requestID`.
 */
export function checkReplyEnvelope(header: MsgHeader, requestID: RequestID): void {
  if (header.opCode !== OpCode.OP_REPLY) {
    throw new ProtocolViolationError(
      WireErrorCode.UNEXPECTED_OPCODE,
      'AwaitHeader',
      OpCode.OP_REPLY,
      header.opCode
    )
  }
  if (header.responseTo !== requestID) {
    throw new ProtocolViolationError(
      WireErrorCode.RESPONSE_TO_MISMATCH,
      'AwaitHeader',
      requestID,
      header.responseTo
    )
  }
}

/**
 * Size of the document region, i.e. messageLength minus both fixed blocks.
 */
export function documentRegionLength(header: MsgHeader): number {
  const remaining = header.messageLength - HEADER_SIZE - REPLY_HEADER_SIZE
  if (remaining < 0) {
    throw new ProtocolViolationError(
      WireErrorCode.MESSAGE_LENGTH,
      'AwaitHeader',
      `messageLength >= ${HEADER_SIZE + REPLY_HEADER_SIZE}`,
      header.messageLength
    )
  }
  return remaining
}

/**
 * Any nonzero response flag fails the reply; individual bits are only named
 * in the error.
 */
export function checkReplyBlock(reply: ReplyHeader): void {
  if (reply.responseFlags !== 0) {
    throw new ProtocolViolationError(
      WireErrorCode.RESPONSE_FLAGS,
      'AwaitReplyBlock',
      0,
      reply.responseFlags,
      describeReplyFlags(reply.responseFlags).join(', ')
    )
  }
}

/**
 * Decode exactly `count` documents that together fill `bytes`.
 */
export function decodeDocuments(
  bytes: Buffer,
  count: number,
  codec: DocumentCodec = bsonCodec
): Document[] {
  if (count < 0) {
    throw new ProtocolViolationError(
      WireErrorCode.DOCUMENT_FRAMING,
      'AwaitDocuments',
      'numberReturned >= 0',
      count
    )
  }

  const documents: Document[] = []
  let offset = 0
  for (let i = 0; i < count; i++) {
    try {
      const [document, consumed] = codec.decode(bytes, offset)
      documents.push(document)
      offset += consumed
    } catch (error) {
      throw new ProtocolViolationError(
        WireErrorCode.DOCUMENT_FRAMING,
        'AwaitDocuments',
        `${count} documents in ${bytes.length} bytes`,
        `${i} documents`,
        error instanceof Error ? error.message : String(error),
        { cause: error }
      )
    }
  }

  if (offset !== bytes.length) {
    throw new ProtocolViolationError(
      WireErrorCode.DOCUMENT_FRAMING,
      'AwaitDocuments',
      `${bytes.length} bytes consumed`,
      `${offset} bytes consumed`,
      `${bytes.length - offset} bytes left after ${count} documents`
    )
  }

  return documents
}

/**
 * Parse a complete reply envelope already held in memory.
 */
export function parseReply(
  buffer: Buffer,
  requestID: RequestID,
  codec: DocumentCodec = bsonCodec
): OpReplyMessage {
  const header = parseHeader(buffer.subarray(0, HEADER_SIZE))
  checkReplyEnvelope(header, requestID)
  const remaining = documentRegionLength(header)

  const start = HEADER_SIZE + REPLY_HEADER_SIZE
  if (buffer.length < start) {
    throw new ProtocolViolationError(
      WireErrorCode.MESSAGE_LENGTH,
      'AwaitReplyBlock',
      header.messageLength,
      buffer.length,
      'buffer shorter than declared messageLength'
    )
  }
  const reply = parseReplyHeader(buffer.subarray(HEADER_SIZE, start))
  checkReplyBlock(reply)

  const region = buffer.subarray(start, start + remaining)
  if (region.length !== remaining) {
    throw new ProtocolViolationError(
      WireErrorCode.MESSAGE_LENGTH,
      'AwaitDocuments',
      header.messageLength,
      start + region.length,
      'buffer shorter than declared messageLength'
    )
  }
  const documents = decodeDocuments(region, reply.numberReturned, codec)

  return { header, reply, documents }
}

/**
 * Read one reply for `requestID` off the stream.
 */
export async function readReply(
  reader: StreamReader,
  requestID: RequestID,
  codec: DocumentCodec = bsonCodec
): Promise<OpReplyMessage> {
  const header = parseHeader(await reader.readExactly(HEADER_SIZE))
  checkReplyEnvelope(header, requestID)
  const remaining = documentRegionLength(header)

  const reply = parseReplyHeader(await reader.readExactly(REPLY_HEADER_SIZE))
  checkReplyBlock(reply)

  const region = await reader.readExactly(remaining)
  const documents = decodeDocuments(region, reply.numberReturned, codec)

  return { header, reply, documents }
}
