/**
 * Wire Protocol Error Classes
 *
 * Every failure the client can hit is one of these. None of them are
 * retryable: after a transport or protocol error the byte stream position is
 * unknown and the connection must be replaced.
 *
 * @module wire/errors
 *
 * @example
 * ```typescript
 * try {
 *   await query(conn, 'app.users', [], 0, 0, {})
 * } catch (error) {
 *   if (error instanceof ProtocolViolationError) {
 *     console.log(`${error.code} at ${error.stage}: expected ${error.expected}, got ${error.actual}`)
 *   }
 * }
 * ```
 */

import type { ReplyStage } from './types.js'

export const WireErrorCode = {
  /** Integer on the wire is not a known opcode */
  UNRECOGNIZED_OPCODE: 'UNRECOGNIZED_OPCODE',
  /** Reply carried an opcode other than OP_REPLY */
  UNEXPECTED_OPCODE: 'UNEXPECTED_OPCODE',
  /** Reply responseTo does not match the request id */
  RESPONSE_TO_MISMATCH: 'RESPONSE_TO_MISMATCH',
  /** Reply carried nonzero response flags */
  RESPONSE_FLAGS: 'RESPONSE_FLAGS',
  /** Declared message length is too small to hold the fixed blocks */
  MESSAGE_LENGTH: 'MESSAGE_LENGTH',
  /** Document region does not hold exactly numberReturned documents */
  DOCUMENT_FRAMING: 'DOCUMENT_FRAMING',
  /** Stream ended before the expected bytes arrived */
  STREAM_CLOSED: 'STREAM_CLOSED',
  /** Stream emitted an error or rejected a write */
  STREAM_ERROR: 'STREAM_ERROR',
  /** Connection was already failed or closed */
  CONNECTION_BROKEN: 'CONNECTION_BROKEN',
  /** TCP connection could not be established */
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  /** Caller passed a value that cannot be framed */
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const

export type WireErrorCodeType = (typeof WireErrorCode)[keyof typeof WireErrorCode]

/**
 * Base class for all wire protocol errors.
 */
export class WireProtocolError extends Error {
  readonly code: WireErrorCodeType
  readonly retryable: boolean = false

  constructor(code: WireErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(`${code}: ${message}`, options?.cause !== undefined ? { cause: options.cause } : undefined)

    this.name = 'WireProtocolError'
    this.code = code

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): { code: string; message: string; retryable: boolean } {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    }
  }
}

/**
 * Thrown when an int32 read off the wire is not one of the nine opcodes.
 */
export class UnrecognizedOpcodeError extends WireProtocolError {
  readonly value: number

  constructor(value: number) {
    super(WireErrorCode.UNRECOGNIZED_OPCODE, `unrecognized opcode ${value}`)
    this.name = 'UnrecognizedOpcodeError'
    this.value = value
  }
}

type ViolationCode =
  | typeof WireErrorCode.UNEXPECTED_OPCODE
  | typeof WireErrorCode.RESPONSE_TO_MISMATCH
  | typeof WireErrorCode.RESPONSE_FLAGS
  | typeof WireErrorCode.MESSAGE_LENGTH
  | typeof WireErrorCode.DOCUMENT_FRAMING

/**
 * A reply broke one of the framing invariants.
 *
 * `stage` names the parser stage that rejected it.
 */
export class ProtocolViolationError extends WireProtocolError {
  readonly stage: ReplyStage
  readonly expected: string
  readonly actual: string

  constructor(
    code: ViolationCode,
    stage: ReplyStage,
    expected: string | number | bigint,
    actual: string | number | bigint,
    detail?: string,
    options?: { cause?: unknown }
  ) {
    const suffix = detail ? ` (${detail})` : ''
    super(code, `expected ${expected}, got ${actual} while in ${stage}${suffix}`, options)
    this.name = 'ProtocolViolationError'
    this.stage = stage
    this.expected = String(expected)
    this.actual = String(actual)
  }

  override toJSON(): {
    code: string
    message: string
    retryable: boolean
    stage: ReplyStage
    expected: string
    actual: string
  } {
    return {
      ...super.toJSON(),
      stage: this.stage,
      expected: this.expected,
      actual: this.actual,
    }
  }
}

type TransportCode =
  | typeof WireErrorCode.STREAM_CLOSED
  | typeof WireErrorCode.STREAM_ERROR
  | typeof WireErrorCode.CONNECTION_BROKEN

/**
 * The underlying byte stream failed. Fatal to the connection.
 */
export class TransportError extends WireProtocolError {
  constructor(code: TransportCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options)
    this.name = 'TransportError'
  }
}

/**
 * Host unreachable, connection refused and similar.
 */
export class ConnectionError extends WireProtocolError {
  readonly host: string
  readonly port: number

  constructor(host: string, port: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(WireErrorCode.CONNECTION_FAILED, `could not connect to ${host}:${port}${reason}`, options)
    this.name = 'ConnectionError'
    this.host = host
    this.port = port
  }
}

export class InvalidArgumentError extends WireProtocolError {
  constructor(message: string) {
    super(WireErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}
