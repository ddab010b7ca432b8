import EventEmitter from 'node:events'
import { createServer, type Server, type Socket } from 'node:net'
import { notifyCreation } from '../diagnostic.ts'
import { logger, loggers } from '../logging.ts'
import { createDecoder } from '../protocol/decoders.ts'
import { allowedEncodings, Encodings, encodingErrorMessage, type EncodingValue } from '../protocol/encodings.ts'
import { isMessageRecord } from '../protocol/record.ts'
import { ajv, PromiseWithResolvers, validateOptions } from '../utils.ts'

export interface ReceiverOptions {
  encoding?: EncodingValue
}

export interface ConnectionTotals {
  received: number
  dropped: number
  bytes: number
}

export const receiverOptionsValidator = ajv.compile({
  type: 'object',
  properties: {
    encoding: {
      type: 'string',
      enumeration: {
        allowed: allowedEncodings,
        errorMessage: encodingErrorMessage
      }
    }
  },
  additionalProperties: false
})

/*
  Accepts any number of peers and decodes the records each one streams.
  Values that are not records are dropped and counted, nothing is ever written back.
*/
export class Receiver extends EventEmitter {
  #server: Server
  #encoding: EncodingValue
  #sockets: Set<Socket>
  #received: number
  #dropped: number

  constructor (options: ReceiverOptions = {}) {
    super()
    this.setMaxListeners(0)

    validateOptions(options, receiverOptionsValidator, '/options')

    this.#encoding = options.encoding ?? Encodings.MSGPACK
    this.#sockets = new Set()
    this.#received = 0
    this.#dropped = 0
    this.#server = createServer(this.#onConnection.bind(this))

    notifyCreation('receiver', this)
  }

  get encoding (): EncodingValue {
    return this.#encoding
  }

  get received (): number {
    return this.#received
  }

  get dropped (): number {
    return this.#dropped
  }

  get port (): number | undefined {
    const address = this.#server.address()
    return address && typeof address === 'object' ? address.port : undefined
  }

  listen (port: number = 0, host: string = '127.0.0.1'): Promise<number> {
    const { promise, resolve, reject } = PromiseWithResolvers<number>()

    const onError = (error: Error) => {
      reject(error)
    }

    this.#server.once('error', onError)
    this.#server.listen(port, host, () => {
      this.#server.removeListener('error', onError)

      const bound = this.port ?? port
      logger.info({ host, port: bound, encoding: this.#encoding }, 'Receiver listening.')
      resolve(bound)
    })

    return promise
  }

  close (): Promise<void> {
    const { promise, resolve, reject } = PromiseWithResolvers<void>()

    if (!this.#server.listening) {
      resolve()
      return promise
    }

    for (const socket of this.#sockets) {
      socket.destroy()
    }

    this.#server.close(error => {
      if (error) {
        reject(error)
        return
      }

      resolve()
    })

    return promise
  }

  #onConnection (socket: Socket): void {
    const totals: ConnectionTotals = { received: 0, dropped: 0, bytes: 0 }
    const decoder = createDecoder(this.#encoding)
    const peer = `${socket.remoteAddress}:${socket.remotePort}`

    this.#sockets.add(socket)
    loggers.receiver?.debug({ peer }, 'Connection accepted.')

    socket.on('data', (chunk: Buffer) => {
      totals.bytes += chunk.length
    })

    socket.on('error', error => {
      loggers.receiver?.debug({ peer, error }, 'Connection error.')
    })

    socket.once('close', () => {
      this.#sockets.delete(socket)
    })

    decoder.on('data', (value: unknown) => {
      if (isMessageRecord(value)) {
        totals.received++
        this.#received++
        this.emit('record', value)
        return
      }

      totals.dropped++
      this.#dropped++
      logger.warn({ peer, value }, 'Dropping value which is not a record.')
    })

    decoder.once('error', (error: Error) => {
      logger.error({ peer, error }, 'Cannot decode the connection data.')
      socket.destroy()

      if (this.listenerCount('error') > 0) {
        this.emit('error', error)
      }
    })

    decoder.once('end', () => {
      loggers.receiver?.debug({ peer, ...totals }, 'Connection ended.')
      this.emit('end', totals)
    })

    socket.pipe(decoder)
  }
}
