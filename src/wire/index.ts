/**
 * Wire Protocol Module
 *
 * Exports for the legacy wire protocol client.
 */

// Types
export * from './types.js'

// Errors
export {
  WireErrorCode,
  WireProtocolError,
  UnrecognizedOpcodeError,
  ProtocolViolationError,
  TransportError,
  ConnectionError,
  InvalidArgumentError,
  type WireErrorCodeType,
} from './errors.js'

// Opcode and flag codec
export {
  opcodeToWire,
  wireToOpcode,
  opcodeName,
  encodeQueryOptions,
  encodeUpdateFlags,
  describeReplyFlags,
} from './opcodes.js'

// Document codec
export { bsonCodec, type DocumentCodec } from './codec.js'

// Message framing
export {
  encodeCString,
  buildDeleteBody,
  buildInsertBody,
  buildQueryBody,
  buildUpdateBody,
  parseHeader,
  serializeHeader,
  packMessage,
  parseReplyHeader,
  serializeReplyHeader,
  serializeOpReply,
  parseOpQuery,
  type SerializeReplyOptions,
  type OpQueryMessage,
} from './message.js'

// Reply parsing
export {
  checkReplyEnvelope,
  checkReplyBlock,
  documentRegionLength,
  decodeDocuments,
  parseReply,
  readReply,
} from './reply.js'

// Connection
export { RequestIdGenerator, entropySeed } from './request-id.js'
export { StreamReader } from './stream-reader.js'
export {
  Connection,
  connect,
  connectOnPort,
  DEFAULT_PORT,
  DEFAULT_CONNECTION_OPTIONS,
  type ConnectionOptions,
  type ConnectOptions,
} from './connection.js'

// Operations
export {
  deleteDocuments,
  deleteDocuments as delete,
  remove,
  insert,
  insertMany,
  update,
  query,
} from './operations.js'
