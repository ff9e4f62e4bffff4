/**
 * Connection and operation tests
 *
 * All traffic goes through an in-process duplex stand-in or a loopback
 * server started by the test.
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { BSON } from 'bson'
import { Connection, connect, connectOnPort } from '../../../src/wire/connection.js'
import {
  deleteDocuments,
  insert,
  insertMany,
  query,
  remove,
  update,
} from '../../../src/wire/operations.js'
import { parseHeader, parseOpQuery, serializeOpReply } from '../../../src/wire/message.js'
import { RequestIdGenerator } from '../../../src/wire/request-id.js'
import {
  ConnectionError,
  InvalidArgumentError,
  ProtocolViolationError,
  TransportError,
  WireErrorCode,
} from '../../../src/wire/errors.js'
import { OpCode } from '../../../src/wire/types.js'
import { FakeServerStream, replyWith } from '../../helpers/fake-stream.js'
import { startReplyServer, type ReplyServer } from '../../helpers/reply-server.js'

describe('write operations', () => {
  it('should write one insert envelope and return its request id', async () => {
    const stream = new FakeServerStream()
    const conn = Connection.fromStream(stream, { seed: 1 })

    const requestID = await insert(conn, 'app.users', { name: 'Ada' })

    expect(stream.writes).toHaveLength(1)
    const message = stream.writes[0]
    const header = parseHeader(message)
    expect(header.requestID).toBe(requestID)
    expect(header.opCode).toBe(OpCode.OP_INSERT)
    expect(header.responseTo).toBe(0)
    expect(header.messageLength).toBe(message.length)
    expect(BSON.deserialize(message.subarray(16 + 4 + 10))).toEqual({ name: 'Ada' })
  })

  it('should draw ids from the connection generator in order', async () => {
    const stream = new FakeServerStream()
    const conn = Connection.fromStream(stream, { seed: 42 })
    const expected = new RequestIdGenerator(42)

    const first = await insertMany(conn, 'app.users', [])
    const second = await update(conn, 'app.users', ['Upsert'], { name: 'Ada' }, { $set: { age: 36 } })
    const third = await deleteDocuments(conn, 'app.users', { name: 'Ada' })

    expect([first, second, third]).toEqual([expected.next(), expected.next(), expected.next()])
    expect(stream.writes.map((message) => parseHeader(message).opCode)).toEqual([
      OpCode.OP_INSERT,
      OpCode.OP_UPDATE,
      OpCode.OP_DELETE,
    ])
  })

  it('should write an empty insertMany as reserved field and name only', async () => {
    const stream = new FakeServerStream()
    const conn = Connection.fromStream(stream)

    await insertMany(conn, 'app.users', [])

    const message = stream.writes[0]
    expect(message.length).toBe(16 + 4 + 10)
    expect(message.readInt32LE(0)).toBe(30)
  })

  it('should expose remove as an alias of deleteDocuments', async () => {
    const stream = new FakeServerStream()
    const conn = Connection.fromStream(stream)

    await remove(conn, 'app.users', {})

    expect(remove).toBe(deleteDocuments)
    expect(parseHeader(stream.writes[0]).opCode).toBe(OpCode.OP_DELETE)
  })

  it('should reject unframeable arguments without breaking the connection', async () => {
    const stream = new FakeServerStream()
    const conn = Connection.fromStream(stream)

    await expect(insert(conn, 'app\0users', {})).rejects.toBeInstanceOf(InvalidArgumentError)
    expect(conn.isBroken).toBe(false)
    expect(stream.writes).toHaveLength(0)

    await insert(conn, 'app.users', {})
    expect(stream.writes).toHaveLength(1)
  })

  it('should surface write failures as transport errors and break the connection', async () => {
    const stream = new FakeServerStream()
    stream.writeError = new Error('EPIPE')
    const conn = Connection.fromStream(stream)

    await expect(insert(conn, 'app.users', {})).rejects.toMatchObject({
      code: WireErrorCode.STREAM_ERROR,
    })
    expect(conn.isBroken).toBe(true)
    await expect(insert(conn, 'app.users', {})).rejects.toMatchObject({
      code: WireErrorCode.CONNECTION_BROKEN,
    })
  })
})

describe('query', () => {
  it('should send the query and return the reply documents', async () => {
    const stream = new FakeServerStream(replyWith(() => [{ name: 'Ada' }, { name: 'Grace' }]))
    const conn = Connection.fromStream(stream)

    const documents = await query(conn, 'app.users', ['SlaveOK'], 0, 2, { active: true }, { name: 1 })

    expect(documents).toEqual([{ name: 'Ada' }, { name: 'Grace' }])
    const sent = parseOpQuery(stream.writes[0])
    expect(sent.flags).toBe(4)
    expect(sent.fullCollectionName).toBe('app.users')
    expect(sent.numberToSkip).toBe(0)
    expect(sent.numberToReturn).toBe(2)
    expect(sent.query).toEqual({ active: true })
    expect(sent.returnFieldsSelector).toEqual({ name: 1 })
  })

  it('should omit the field selector bytes when none is given', async () => {
    const stream = new FakeServerStream(replyWith(() => []))
    const conn = Connection.fromStream(stream)

    await query(conn, 'db.c', [], 0, 0, {})

    expect(stream.writes[0].length).toBe(16 + 4 + 5 + 4 + 4 + 5)
    expect(parseOpQuery(stream.writes[0]).returnFieldsSelector).toBeUndefined()
  })

  it('should keep concurrent queries paired with their own replies', async () => {
    const stream = new FakeServerStream(replyWith((_request, index) => [{ batch: index }]))
    const conn = Connection.fromStream(stream)

    const results = await Promise.all([
      query(conn, 'db.c', [], 0, 0, { q: 0 }),
      query(conn, 'db.c', [], 0, 0, { q: 1 }),
      query(conn, 'db.c', [], 0, 0, { q: 2 }),
    ])

    expect(results).toEqual([[{ batch: 0 }], [{ batch: 1 }], [{ batch: 2 }]])
    expect(stream.writes.map((message) => parseOpQuery(message).query)).toEqual([{ q: 0 }, { q: 1 }, { q: 2 }])
  })

  it('should fail on a reply to another request and refuse further use', async () => {
    const stream = new FakeServerStream((message, server) => {
      const header = parseHeader(message)
      server.reply(serializeOpReply(1, header.requestID ^ 1, []))
    })
    const conn = Connection.fromStream(stream, { seed: 3 })
    const expectedID = new RequestIdGenerator(3).next()

    const failure = query(conn, 'db.c', [], 0, 0, {})
    await expect(failure).rejects.toBeInstanceOf(ProtocolViolationError)
    await expect(failure).rejects.toMatchObject({
      code: WireErrorCode.RESPONSE_TO_MISMATCH,
      expected: String(expectedID),
    })

    expect(conn.isBroken).toBe(true)
    await expect(query(conn, 'db.c', [], 0, 0, {})).rejects.toBeInstanceOf(TransportError)
    expect(stream.writes).toHaveLength(1)
  })

  it('should fail on nonzero response flags', async () => {
    const stream = new FakeServerStream((message, server) => {
      const header = parseHeader(message)
      server.reply(serializeOpReply(1, header.requestID, [{ $err: 'cursor gone' }], { responseFlags: 1 }))
    })
    const conn = Connection.fromStream(stream)

    await expect(query(conn, 'db.c', [], 0, 0, {})).rejects.toMatchObject({
      code: WireErrorCode.RESPONSE_FLAGS,
      stage: 'AwaitReplyBlock',
    })
  })

  it('should fail when the server hangs up mid-reply', async () => {
    const stream = new FakeServerStream((message, server) => {
      const header = parseHeader(message)
      server.reply(serializeOpReply(1, header.requestID, [{ n: 1 }]).subarray(0, 20))
      server.hangUp()
    })
    const conn = Connection.fromStream(stream)

    await expect(query(conn, 'db.c', [], 0, 0, {})).rejects.toMatchObject({
      code: WireErrorCode.STREAM_CLOSED,
    })
    expect(conn.isBroken).toBe(true)
  })
})

describe('Connection lifecycle', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should refuse operations after close', async () => {
    const stream = new FakeServerStream()
    const conn = Connection.fromStream(stream)

    await conn.close()
    await conn.close()

    expect(conn.isClosed).toBe(true)
    expect(stream.destroyed).toBe(true)
    await expect(insert(conn, 'db.c', {})).rejects.toMatchObject({
      code: WireErrorCode.CONNECTION_BROKEN,
    })
  })

  it('should log each message when verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const stream = new FakeServerStream(replyWith(() => [{ n: 1 }]))
    const conn = Connection.fromStream(stream, { verbose: true, seed: 5 })
    const requestID = new RequestIdGenerator(5).next()

    await query(conn, 'db.c', [], 0, 0, {})

    expect(log).toHaveBeenCalledWith(`[conn ${conn.id}] OP_QUERY requestID=${requestID} messageLength=38`)
    expect(log).toHaveBeenCalledWith(`[conn ${conn.id}] OP_REPLY responseTo=${requestID} numberReturned=1 cursorID=0`)
  })

  it('should stay quiet when not verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const conn = Connection.fromStream(new FakeServerStream())

    await insert(conn, 'db.c', {})

    expect(log).not.toHaveBeenCalled()
  })

  it('should reject a seed that is not an integer', () => {
    expect(() => Connection.fromStream(new FakeServerStream(), { seed: 1.5 })).toThrow(InvalidArgumentError)
  })
})

describe('connectOnPort', () => {
  let server: ReplyServer | undefined

  afterEach(async () => {
    await server?.close()
    server = undefined
  })

  it('should query a server over TCP', async () => {
    server = await startReplyServer((request) => {
      const parsed = parseOpQuery(request)
      return serializeOpReply(1, parsed.header.requestID, [{ echo: parsed.query }])
    })

    const conn = await connectOnPort('127.0.0.1', server.port)
    try {
      const documents = await query(conn, 'app.users', [], 0, 1, { name: 'Ada' })
      expect(documents).toEqual([{ echo: { name: 'Ada' } }])
    } finally {
      await conn.close()
    }
  })

  it('should report a refused connection as ConnectionError', async () => {
    const closed = await startReplyServer(() => null)
    const port = closed.port
    await closed.close()

    const attempt = connectOnPort('127.0.0.1', port)
    await expect(attempt).rejects.toBeInstanceOf(ConnectionError)
    await expect(attempt).rejects.toMatchObject({ host: '127.0.0.1', port, code: WireErrorCode.CONNECTION_FAILED })
  })

  it('should reject and release the socket when the options are invalid', async () => {
    server = await startReplyServer(() => null)

    await expect(connectOnPort('127.0.0.1', server.port, { seed: 1.5 })).rejects.toBeInstanceOf(
      InvalidArgumentError
    )
  })
})

describe('connect', () => {
  let server: ReplyServer | undefined

  afterEach(async () => {
    await server?.close()
    server = undefined
  })

  it('should connect on the port given in the options', async () => {
    server = await startReplyServer((request) => {
      const parsed = parseOpQuery(request)
      return serializeOpReply(1, parsed.header.requestID, [{ ok: 1 }])
    })

    const conn = await connect('127.0.0.1', { port: server.port })
    try {
      expect(await query(conn, 'app.users', [], 0, 1, {})).toEqual([{ ok: 1 }])
    } finally {
      await conn.close()
    }
  })

  it('should default to port 27017', async () => {
    await expect(connect('127.0.0.1')).rejects.toMatchObject({
      host: '127.0.0.1',
      port: 27017,
      code: WireErrorCode.CONNECTION_FAILED,
    })
  })
})
