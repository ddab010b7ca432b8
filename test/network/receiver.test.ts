import { deepStrictEqual, rejects, strictEqual, throws } from 'node:assert'
import { once } from 'node:events'
import { connect, type Socket } from 'node:net'
import test from 'node:test'
import { pack } from 'msgpackr'
import {
  createJsonEncoder,
  createMsgpackEncoder,
  createRecord,
  DecodeError,
  Encodings,
  Receiver,
  UserError
} from '../../src/index.ts'
import { createCreationChannelVerifier, createReceiver } from '../helpers.ts'

async function connectTo (port: number): Promise<Socket> {
  const socket = connect(port, '127.0.0.1')
  await once(socket, 'connect')
  return socket
}

test('Receiver constructor', () => {
  const created = createCreationChannelVerifier<Receiver>(event => event.type === 'receiver')
  const receiver = new Receiver()

  strictEqual(receiver.encoding, Encodings.MSGPACK)
  strictEqual(receiver.received, 0)
  strictEqual(receiver.dropped, 0)
  strictEqual(receiver.port, undefined)
  strictEqual(created(), receiver)
})

test('Receiver constructor should validate options', () => {
  throws(
    () => new Receiver(JSON.parse('{"encoding":"xml"}')),
    (error: unknown) =>
      error instanceof UserError && error.message === '/options/encoding should be one of msgpack or json.'
  )
})

test('Receiver.listen should bind an ephemeral port', async t => {
  const { receiver, port } = await createReceiver(t)

  strictEqual(receiver.port, port)
  strictEqual(port > 0, true)
})

test('Receiver should decode and count MessagePack records', async t => {
  const { receiver, port, records } = await createReceiver(t)
  const encode = createMsgpackEncoder()
  const buffer = Buffer.concat([encode(createRecord(0)), encode(createRecord(1)), encode(createRecord(2))])

  const socket = await connectTo(port)
  const ended = once(receiver, 'end')
  socket.end(buffer)

  const [totals] = (await ended)

  deepStrictEqual(totals, { received: 3, dropped: 0, bytes: buffer.length })
  deepStrictEqual(records, [createRecord(0), createRecord(1), createRecord(2)])
  strictEqual(receiver.received, 3)
  strictEqual(receiver.dropped, 0)
})

test('Receiver should drop values which are not records', async t => {
  const { receiver, port, records } = await createReceiver(t)
  const encode = createMsgpackEncoder()
  const buffer = Buffer.concat([
    pack({ id: 42, source: 'app/echo', parent: { child: 'item' } }),
    encode(createRecord(0)),
    pack('le message - 1')
  ])

  const socket = await connectTo(port)
  const ended = once(receiver, 'end')
  socket.end(buffer)

  const [totals] = (await ended)

  deepStrictEqual(totals, { received: 1, dropped: 2, bytes: buffer.length })
  deepStrictEqual(records, [createRecord(0)])
  strictEqual(receiver.dropped, 2)
})

test('Receiver should drop values with a message but another shape', async t => {
  const { receiver, port, records } = await createReceiver(t)
  const buffer = Buffer.concat([
    pack({ message: 'le message - 0' }),
    pack({ ...createRecord(1), extra: true }),
    createMsgpackEncoder()(createRecord(2))
  ])

  const socket = await connectTo(port)
  const ended = once(receiver, 'end')
  socket.end(buffer)

  const [totals] = await ended

  deepStrictEqual(totals, { received: 1, dropped: 2, bytes: buffer.length })
  deepStrictEqual(records, [createRecord(2)])
})

test('Receiver should decode JSON lines', async t => {
  const { receiver, port, records } = await createReceiver(t, { encoding: Encodings.JSON })
  const encode = createJsonEncoder()
  const buffer = Buffer.concat([encode(createRecord(0)), encode(createRecord(1))])

  strictEqual(receiver.encoding, Encodings.JSON)

  const socket = await connectTo(port)
  const ended = once(receiver, 'end')
  socket.end(buffer)

  const [totals] = (await ended)

  deepStrictEqual(totals, { received: 2, dropped: 0, bytes: buffer.length })
  deepStrictEqual(records, [createRecord(0), createRecord(1)])
})

test('Receiver should keep totals per connection', async t => {
  const { receiver, port } = await createReceiver(t)
  const encode = createMsgpackEncoder()

  for (const count of [2, 1]) {
    const buffers: Buffer[] = []

    for (let i = 0; i < count; i++) {
      buffers.push(encode(createRecord(i)))
    }

    const socket = await connectTo(port)
    const ended = once(receiver, 'end')
    socket.end(Buffer.concat(buffers))

    const [totals] = (await ended)
    strictEqual(totals.received, count)
  }

  strictEqual(receiver.received, 3)
})

test('Receiver should report undecodable input and close the connection', async t => {
  const { receiver, port, records } = await createReceiver(t)

  const socket = await connectTo(port)
  const failed = once(receiver, 'error')
  const closed = once(socket, 'close')
  socket.write(Buffer.from([0xd4, 0x10, 0x00]))

  const [error] = await failed
  await closed

  strictEqual(error instanceof DecodeError, true)
  deepStrictEqual(records, [])
})

test('Receiver.listen should fail when the port is taken', async t => {
  const { port } = await createReceiver(t)
  const other = new Receiver()

  await rejects(other.listen(port), (error: unknown) => error instanceof Error && 'code' in error && error.code === 'EADDRINUSE')
})

test('Receiver.close should be a no-op when not listening', async () => {
  const receiver = new Receiver()
  await receiver.close()
  strictEqual(receiver.port, undefined)
})
