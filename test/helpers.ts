import { type ChannelListener, subscribe, unsubscribe } from 'node:diagnostics_channel'
import { once } from 'node:events'
import { type AddressInfo, createServer as createNetworkServer, type Server, type Socket } from 'node:net'
import { type TestContext } from 'node:test'
import { fileURLToPath } from 'node:url'
import {
  type CreationEvent,
  instancesChannel,
  type MessageRecord,
  PromiseWithResolvers,
  Receiver,
  type ReceiverOptions,
  type TracingChannelWithName
} from '../src/index.ts'

export const servicesFixture = fileURLToPath(new URL('./fixtures/services', import.meta.url))

export interface CollectingServer {
  server: Server
  port: number
  connections: () => number
  // Resolves with every byte the first peer sent, once it ends its side
  data: Promise<Buffer>
}

export function createServer (t: TestContext, onConnection?: (socket: Socket) => void): Promise<CollectingServer> {
  const server = createNetworkServer()
  const { promise, resolve, reject } = PromiseWithResolvers<CollectingServer>()
  const data = PromiseWithResolvers<Buffer>()
  const sockets: Socket[] = []

  server.once('listening', () => {
    resolve({
      server,
      port: (server.address() as AddressInfo).port,
      connections: () => sockets.length,
      data: data.promise
    })
  })
  server.once('error', reject)
  server.on('connection', socket => {
    const chunks: Buffer[] = []

    if (!sockets.length) {
      socket.on('data', (chunk: Buffer) => chunks.push(chunk))
      socket.once('end', () => data.resolve(Buffer.concat(chunks)))
    }

    sockets.push(socket)
    onConnection?.(socket)
  })

  t.after(() => {
    for (const socket of sockets) {
      socket.destroy()
    }

    return new Promise<void>(resolve => server.close(() => resolve()))
  })

  server.listen(0, '127.0.0.1')
  return promise
}

// Resets every peer as soon as it sends something
export function createResettingServer (t: TestContext): Promise<CollectingServer> {
  return createServer(t, socket => {
    socket.once('data', () => {
      socket.resetAndDestroy()
    })
  })
}

// A port nothing listens on
export async function getClosedPort (): Promise<number> {
  const server = createNetworkServer()
  server.listen(0, '127.0.0.1')
  await once(server, 'listening')

  const { port } = server.address() as AddressInfo
  await new Promise<void>(resolve => server.close(() => resolve()))

  return port
}

export async function createReceiver (
  t: TestContext,
  options: ReceiverOptions = {}
): Promise<{ receiver: Receiver; port: number; records: MessageRecord[] }> {
  const receiver = new Receiver(options)
  const records: MessageRecord[] = []

  receiver.on('record', (record: MessageRecord) => {
    records.push(record)
  })

  t.after(() => receiver.close())

  const port = await receiver.listen()
  return { receiver, port, records }
}

export function createCreationChannelVerifier<Instance> (filter: (data: CreationEvent<Instance>) => boolean) {
  let instance: Instance | null = null

  function creationSubscriber (candidate: CreationEvent<Instance>) {
    if (filter(candidate)) {
      instance = candidate.instance
    }
  }

  subscribe(instancesChannel.name, creationSubscriber as ChannelListener)

  return function get (): Instance | null {
    unsubscribe(instancesChannel.name, creationSubscriber as ChannelListener)
    return instance
  }
}

export type TracingLabel = 'start' | 'end' | 'asyncStart' | 'asyncEnd' | 'error'

export function createTracingChannelRecorder<DiagnosticEvent extends object> (
  channel: TracingChannelWithName<DiagnosticEvent>
) {
  const events: [TracingLabel, DiagnosticEvent][] = []

  const subscribers = {
    start: (context: DiagnosticEvent) => events.push(['start', context]),
    end: (context: DiagnosticEvent) => events.push(['end', context]),
    asyncStart: (context: DiagnosticEvent) => events.push(['asyncStart', context]),
    asyncEnd: (context: DiagnosticEvent) => events.push(['asyncEnd', context]),
    error: (context: DiagnosticEvent) => events.push(['error', context])
  }

  channel.subscribe(subscribers)

  return function stop (): [TracingLabel, DiagnosticEvent][] {
    channel.unsubscribe(subscribers)
    return events
  }
}

export function createOutputStreams () {
  const output = { stdout: '', stderr: '' }

  return {
    output,
    streams: {
      stdout: {
        write (chunk: string) {
          output.stdout += chunk
        }
      },
      stderr: {
        write (chunk: string) {
          output.stderr += chunk
        }
      }
    }
  }
}
