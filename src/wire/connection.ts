/**
 * Connection Session
 *
 * Owns one duplex byte stream and the request id generator for its lifetime.
 * Every send, and every send + receive pair, runs inside `exclusive()` so a
 * query's reply is always the next thing read off the stream.
 *
 * @module wire/connection
 *
 * @example
 * ```typescript
 * const conn = await connect('localhost')
 * try {
 *   const docs = await query(conn, 'app.users', [], 0, 10, { active: true })
 * } finally {
 *   await conn.close()
 * }
 * ```
 */

import { createConnection } from 'node:net'
import type { Duplex } from 'node:stream'
import { bsonCodec, type DocumentCodec } from './codec.js'
import { ConnectionError, TransportError, WireErrorCode } from './errors.js'
import { packMessage } from './message.js'
import { opcodeName } from './opcodes.js'
import { readReply } from './reply.js'
import { RequestIdGenerator } from './request-id.js'
import { StreamReader } from './stream-reader.js'
import type { OpCodeValue, OpReplyMessage, RequestID } from './types.js'

/** Connection configuration options */
export interface ConnectionOptions {
  /** Log every message sent and received */
  verbose?: boolean
  /** Document codec for bodies and replies (default: BSON) */
  codec?: DocumentCodec
  /** Fixed request id seed; by default one is drawn from the OS entropy source */
  seed?: bigint | number
}

/** Options for `connect`, which also picks the port */
export interface ConnectOptions extends ConnectionOptions {
  /** Port to connect to (default: 27017) */
  port?: number
}

export const DEFAULT_PORT = 27017

export const DEFAULT_CONNECTION_OPTIONS = {
  verbose: false,
  codec: bsonCodec,
} satisfies ConnectionOptions

let nextConnectionId = 1

export class Connection {
  readonly id: number
  readonly codec: DocumentCodec
  private readonly stream: Duplex
  private readonly reader: StreamReader
  private readonly requestIds: RequestIdGenerator
  private readonly verbose: boolean
  private queue: Promise<void> = Promise.resolve()
  private failure: Error | null = null
  private closed = false

  private constructor(stream: Duplex, options: ConnectionOptions) {
    const resolved = { ...DEFAULT_CONNECTION_OPTIONS, ...options }
    this.id = nextConnectionId++
    this.stream = stream
    this.codec = resolved.codec
    this.verbose = resolved.verbose
    this.requestIds = new RequestIdGenerator(resolved.seed)
    this.reader = new StreamReader(stream)
  }

  /**
   * Wrap an already connected duplex stream.
   */
  static fromStream(stream: Duplex, options: ConnectionOptions = {}): Connection {
    return new Connection(stream, options)
  }

  /** True once a transport or protocol error has poisoned the stream */
  get isBroken(): boolean {
    return this.failure !== null
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Run `task` after every previously queued task has settled.
   * A rejected task does not stop the queue; its caller receives the rejection.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    this.queue = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  /**
   * Frame `body` under a fresh request id and write it in one call.
   */
  send(opCode: OpCodeValue, body: Buffer): Promise<RequestID> {
    return this.exclusive(() => this.guard(() => this.write(opCode, body)))
  }

  /**
   * Send a message and read the reply that answers it.
   */
  request(opCode: OpCodeValue, body: Buffer): Promise<OpReplyMessage> {
    return this.exclusive(() =>
      this.guard(async () => {
        const requestID = await this.write(opCode, body)
        const reply = await readReply(this.reader, requestID, this.codec)
        this.log(
          `OP_REPLY responseTo=${reply.header.responseTo} numberReturned=${reply.reply.numberReturned} cursorID=${reply.reply.cursorID}`
        )
        return reply
      })
    )
  }

  /**
   * End and destroy the underlying stream. Pending reads reject.
   */
  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve()
    }
    this.closed = true
    this.log('closing')

    if (this.stream.closed) {
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this.stream.once('close', () => resolve())
      this.stream.destroy()
    })
  }

  private async write(opCode: OpCodeValue, body: Buffer): Promise<RequestID> {
    const requestID = this.requestIds.next()
    const message = packMessage(opCode, requestID, body)

    this.log(`${opcodeName(opCode)} requestID=${requestID} messageLength=${message.length}`)

    await new Promise<void>((resolve, reject) => {
      this.stream.write(message, (error) => {
        if (error) {
          reject(new TransportError(WireErrorCode.STREAM_ERROR, `write failed: ${error.message}`, { cause: error }))
        } else {
          resolve()
        }
      })
    })

    return requestID
  }

  /**
   * Refuse to run on a closed or failed connection, and mark the connection
   * failed if `task` throws: the stream position is unknown afterwards.
   */
  private async guard<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new TransportError(WireErrorCode.CONNECTION_BROKEN, 'connection is closed')
    }
    if (this.failure) {
      throw new TransportError(WireErrorCode.CONNECTION_BROKEN, 'connection failed earlier; reconnect', {
        cause: this.failure,
      })
    }

    try {
      return await task()
    } catch (error) {
      this.failure = error instanceof Error ? error : new Error(String(error))
      if (this.verbose) {
        console.error(`[conn ${this.id}] Connection failed:`, this.failure)
      }
      throw error
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[conn ${this.id}] ${message}`)
    }
  }
}

/**
 * Open a TCP connection to `host`. Port defaults to 27017.
 */
export function connect(host: string, options: ConnectOptions = {}): Promise<Connection> {
  const { port = DEFAULT_PORT, ...connectionOptions } = options
  return connectOnPort(host, port, connectionOptions)
}

export function connectOnPort(
  host: string,
  port: number,
  options: ConnectionOptions = {}
): Promise<Connection> {
  return new Promise<Connection>((resolve, reject) => {
    const socket = createConnection({ host, port })

    const onError = (error: Error): void => {
      socket.destroy()
      reject(new ConnectionError(host, port, { cause: error }))
    }

    socket.once('error', onError)
    socket.once('connect', () => {
      socket.off('error', onError)
      socket.setNoDelay(true)
      let connection: Connection
      try {
        connection = Connection.fromStream(socket, options)
      } catch (error) {
        socket.destroy()
        reject(error)
        return
      }
      if (options.verbose) {
        console.log(`[conn ${connection.id}] Connected to ${host}:${port}`)
      }
      resolve(connection)
    })
  })
}
