import EventEmitter from 'node:events'
import { createConnection, type Socket } from 'node:net'
import { type CallbackWithPromise, createPromisifiedCallback, kCallbackPromise } from '../callbacks.ts'
import {
  connectionsConnectsChannel,
  createDiagnosticContext,
  type DiagnosticContext,
  notifyCreation
} from '../diagnostic.ts'
import { ConnectionError, TimeoutError } from '../errors.ts'
import { loggers } from '../logging.ts'

export interface ConnectionOptions {
  connectTimeout?: number
}

export const ConnectionStatuses = {
  NONE: 'none',
  CONNECTING: 'connecting',
  CONNECTED: 'connected',
  CLOSED: 'closed',
  CLOSING: 'closing',
  ERROR: 'error'
} as const

export type ConnectionStatus = keyof typeof ConnectionStatuses
export type ConnectionStatusValue = (typeof ConnectionStatuses)[keyof typeof ConnectionStatuses]

export const defaultOptions: Required<ConnectionOptions> = {
  connectTimeout: 5000
}

let currentInstance = 0

export class Connection extends EventEmitter {
  #host: string | undefined
  #port: number | undefined
  #options: Required<ConnectionOptions>
  #status: ConnectionStatusValue
  #instanceId: number
  #socket: Socket | undefined
  #socketError: Error | undefined

  constructor (options: ConnectionOptions = {}) {
    super()
    this.setMaxListeners(0)

    this.#instanceId = currentInstance++
    this.#options = Object.assign({}, defaultOptions, options)
    this.#status = ConnectionStatuses.NONE

    notifyCreation('connection', this)
  }

  get host (): string | undefined {
    return this.#status === ConnectionStatuses.CONNECTED ? this.#host : undefined
  }

  get port (): number | undefined {
    return this.#status === ConnectionStatuses.CONNECTED ? this.#port : undefined
  }

  get instanceId (): number {
    return this.#instanceId
  }

  get status (): ConnectionStatusValue {
    return this.#status
  }

  get socket (): Socket | undefined {
    return this.#socket
  }

  connect (host: string, port: number, callback: CallbackWithPromise<void>): void
  connect (host: string, port: number): Promise<void>
  connect (host: string, port: number, callback?: CallbackWithPromise<void>): void | Promise<void> {
    if (!callback) {
      callback = createPromisifiedCallback()
    }

    const diagnosticContext = createDiagnosticContext({ connection: this, operation: 'connect', host, port })

    connectionsConnectsChannel.start.publish(diagnosticContext)

    try {
      if (this.#status === ConnectionStatuses.CONNECTED) {
        callback(null)
        return callback[kCallbackPromise]
      }

      this.ready(callback)

      if (this.#status === ConnectionStatuses.CONNECTING) {
        return callback[kCallbackPromise]
      }

      this.#status = ConnectionStatuses.CONNECTING
      this.emit('connecting')
      loggers.connection?.debug({ host, port }, 'Connecting.')

      this.#host = host
      this.#port = port

      const socket = createConnection({ host, port, timeout: this.#options.connectTimeout })
      this.#socket = socket
      socket.setNoDelay(true)

      const connectionTimeoutHandler = () => {
        socket.removeListener('error', connectionErrorHandler)
        socket.destroy()

        this.#onConnectionError(
          diagnosticContext,
          new TimeoutError(`Connection to ${host}:${port} timed out.`, { host, port })
        )
      }

      const connectionErrorHandler = (error: Error) => {
        socket.removeListener('timeout', connectionTimeoutHandler)

        this.#onConnectionError(
          diagnosticContext,
          new ConnectionError(`Connection to ${host}:${port} failed.`, { cause: error, host, port })
        )
      }

      socket.once('connect', () => {
        socket.removeListener('timeout', connectionTimeoutHandler)
        socket.removeListener('error', connectionErrorHandler)

        socket.on('error', this.#onError.bind(this))
        socket.on('close', this.#onClose.bind(this))

        socket.setTimeout(0)

        this.#status = ConnectionStatuses.CONNECTED
        loggers.connection?.debug({ host, port }, 'Connected.')

        connectionsConnectsChannel.asyncStart.publish(diagnosticContext)
        this.emit('connect')
        connectionsConnectsChannel.asyncEnd.publish(diagnosticContext)
      })

      socket.once('timeout', connectionTimeoutHandler)
      socket.once('error', connectionErrorHandler)
    } catch (error) {
      // Invalid arguments make createConnection throw synchronously
      this.#onConnectionError(
        diagnosticContext,
        new ConnectionError(`Connection to ${host}:${port} failed.`, { cause: error, host, port })
      )
    } finally {
      connectionsConnectsChannel.end.publish(diagnosticContext)
    }

    return callback[kCallbackPromise]
  }

  ready (callback: CallbackWithPromise<void>): void
  ready (): Promise<void>
  ready (callback?: CallbackWithPromise<void>): void | Promise<void> {
    if (!callback) {
      callback = createPromisifiedCallback()
    }

    const onConnect = () => {
      this.removeListener('error', onError)

      callback(null)
    }

    const onError = (error: Error) => {
      this.removeListener('connect', onConnect)

      callback(error)
    }

    this.once('connect', onConnect)
    this.once('error', onError)

    return callback[kCallbackPromise]
  }

  /*
    Resolves with the number of bytes the transport accepted, once they are handed to the operating system.
    A socket always takes the whole buffer, partial acceptance is left to other sinks.
  */
  write (buffer: Buffer, callback: CallbackWithPromise<number>): void
  write (buffer: Buffer): Promise<number>
  write (buffer: Buffer, callback?: CallbackWithPromise<number>): void | Promise<number> {
    if (!callback) {
      callback = createPromisifiedCallback()
    }

    const socket = this.#socket

    if (this.#status !== ConnectionStatuses.CONNECTED || !socket) {
      // A transport failure closes the socket before the next write comes in
      callback(new ConnectionError('Connection closed', this.#socketError ? { cause: this.#socketError } : {}))
      return callback[kCallbackPromise]
    }

    const accepted = buffer.length

    socket.write(buffer, error => {
      if (error) {
        callback(new ConnectionError('Cannot write to the connection.', { cause: error }))
        return
      }

      callback(null, accepted)
    })

    return callback[kCallbackPromise]
  }

  close (callback: CallbackWithPromise<void>): void
  close (): Promise<void>
  close (callback?: CallbackWithPromise<void>): void | Promise<void> {
    if (!callback) {
      callback = createPromisifiedCallback()
    }

    const socket = this.#socket

    if (
      !socket ||
      this.#status === ConnectionStatuses.CLOSED ||
      this.#status === ConnectionStatuses.ERROR ||
      this.#status === ConnectionStatuses.NONE
    ) {
      callback(null)
      return callback[kCallbackPromise]
    } else if (this.#status === ConnectionStatuses.CLOSING) {
      this.once('close', () => {
        callback(null)
      })

      return callback[kCallbackPromise]
    }

    // Ignore all disconnection errors
    socket.removeAllListeners('error')
    socket.once('error', error => {
      loggers.connection?.debug({ error }, 'Ignoring error while closing.')
    })

    this.once('close', () => {
      callback(null)
    })

    this.#status = ConnectionStatuses.CLOSING
    this.emit('closing')
    socket.end()

    return callback[kCallbackPromise]
  }

  #onConnectionError (diagnosticContext: DiagnosticContext, error: Error): void {
    this.#status = ConnectionStatuses.ERROR
    loggers.connection?.debug({ error }, 'Connection failed.')

    diagnosticContext.error = error
    connectionsConnectsChannel.error.publish(diagnosticContext)
    connectionsConnectsChannel.asyncStart.publish(diagnosticContext)
    this.emit('error', error)
    connectionsConnectsChannel.asyncEnd.publish(diagnosticContext)
  }

  #onClose (): void {
    this.#status = ConnectionStatuses.CLOSED
    this.emit('close')
  }

  #onError (error: Error): void {
    this.#socketError = error
    loggers.connection?.debug({ error }, 'Connection error.')

    // Failed writes are also reported through their own callbacks
    if (this.listenerCount('error') > 0) {
      this.emit('error', new ConnectionError('Connection error', { cause: error }))
    }
  }
}
