/**
 * Exact-length reads over a duplex byte stream.
 *
 * Incoming chunks are accumulated and handed out in precisely the sizes the
 * reply parser asks for. Only one read may be pending at a time.
 */

import type { Duplex } from 'node:stream'
import { InvalidArgumentError, TransportError, WireErrorCode } from './errors.js'

interface PendingRead {
  size: number
  resolve: (bytes: Buffer) => void
  reject: (error: Error) => void
}

export class StreamReader {
  private buffered: Buffer = Buffer.alloc(0)
  private pending: PendingRead | null = null
  private failure: TransportError | null = null

  constructor(stream: Duplex) {
    stream.on('data', (chunk: Buffer | string) => {
      this.onData(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
    })
    stream.on('end', () => {
      this.fail(new TransportError(WireErrorCode.STREAM_CLOSED, 'stream ended'))
    })
    stream.on('close', () => {
      this.fail(new TransportError(WireErrorCode.STREAM_CLOSED, 'stream closed'))
    })
    stream.on('error', (error: Error) => {
      this.fail(new TransportError(WireErrorCode.STREAM_ERROR, error.message, { cause: error }))
    })
  }

  /** Bytes received but not yet consumed */
  get bufferedLength(): number {
    return this.buffered.length
  }

  /**
   * Resolve with exactly `size` bytes once they have arrived.
   * Bytes already buffered are still delivered after the stream ends.
   */
  readExactly(size: number): Promise<Buffer> {
    if (!Number.isInteger(size) || size < 0) {
      return Promise.reject(new InvalidArgumentError(`Read size must be a non-negative integer, got ${size}`))
    }
    if (this.pending) {
      return Promise.reject(new InvalidArgumentError('Another read is already pending on this stream'))
    }
    if (this.buffered.length >= size) {
      return Promise.resolve(this.take(size))
    }
    if (this.failure) {
      return Promise.reject(this.failure)
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { size, resolve, reject }
    })
  }

  private take(size: number): Buffer {
    const bytes = this.buffered.subarray(0, size)
    this.buffered = this.buffered.subarray(size)
    return bytes
  }

  private onData(chunk: Buffer): void {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk])

    const pending = this.pending
    if (pending && this.buffered.length >= pending.size) {
      this.pending = null
      pending.resolve(this.take(pending.size))
    }
  }

  private fail(error: TransportError): void {
    if (!this.failure) {
      this.failure = error
    }

    const pending = this.pending
    if (pending) {
      this.pending = null
      pending.reject(this.failure)
    }
  }
}
