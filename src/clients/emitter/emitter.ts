import { createDiagnosticContext, emitterSendsChannel, notifyCreation } from '../../diagnostic.ts'
import { UserError, WriteError } from '../../errors.ts'
import { loggers } from '../../logging.ts'
import { type Counter, ensureMetric, type Gauge } from '../../metrics.ts'
import { Connection } from '../../network/connection.ts'
import { createEncoder, type Encoder } from '../../protocol/encodings.ts'
import { createRecord } from '../../protocol/record.ts'
import { validateOptions } from '../../utils.ts'
import { createEmitterOptionsValidator, defaultEmitterOptions, emitterOptionsValidator } from './options.ts'
import {
  type ByteSink,
  type CreateEmitterOptions,
  type EmitterOptions,
  type ResolvedEmitterOptions,
  type SendResult
} from './types.ts'

let currentInstance = 0

// Keeps offering the rest of the buffer until the sink took all of it
export async function writeFully (sink: ByteSink, buffer: Buffer): Promise<void> {
  let offset = 0

  while (offset < buffer.length) {
    const remaining = buffer.length - offset
    const accepted = await sink.write(offset === 0 ? buffer : buffer.subarray(offset))

    if (!Number.isInteger(accepted) || accepted <= 0 || accepted > remaining) {
      throw new WriteError(`Sink accepted ${accepted} of ${remaining} remaining bytes.`, { accepted, remaining })
    }

    offset += accepted
  }
}

export class Emitter {
  #instanceId: number
  #sink: ByteSink
  #options: ResolvedEmitterOptions
  #encode: Encoder
  #connection: Connection | undefined
  #metricsEmitters: Gauge | undefined
  #metricsSentMessages: Counter | undefined
  #metricsSentBytes: Counter | undefined

  static async create (host: string, port: number, options: CreateEmitterOptions = {}): Promise<Emitter> {
    validateOptions(options, createEmitterOptionsValidator, '/options')

    const { connectTimeout, ...emitterOptions } = options
    const connection = new Connection(connectTimeout === undefined ? {} : { connectTimeout })
    await connection.connect(host, port)

    const emitter = new Emitter(connection, emitterOptions)
    emitter.#connection = connection

    return emitter
  }

  constructor (sink: ByteSink, options: EmitterOptions = {}) {
    validateOptions(options, emitterOptionsValidator, '/options')

    this.#instanceId = currentInstance++
    this.#sink = sink
    this.#options = Object.assign({}, defaultEmitterOptions, options)
    this.#encode = createEncoder(this.#options.encoding)

    if (options.metrics) {
      this.#metricsEmitters = ensureMetric(options.metrics, 'Gauge', 'logflood_emitters', 'Number of active emitters')
      this.#metricsSentMessages = ensureMetric(
        options.metrics,
        'Counter',
        'logflood_sent_messages',
        'Number of messages written'
      )
      this.#metricsSentBytes = ensureMetric(options.metrics, 'Counter', 'logflood_sent_bytes', 'Number of bytes written')

      this.#metricsEmitters.inc()
    }

    notifyCreation('emitter', this)
  }

  get instanceId (): number {
    return this.#instanceId
  }

  get encoding (): ResolvedEmitterOptions['encoding'] {
    return this.#options.encoding
  }

  get source (): string {
    return this.#options.source
  }

  get connection (): Connection | undefined {
    return this.#connection
  }

  send (count: number = 1): Promise<SendResult> {
    const diagnosticContext = createDiagnosticContext({ emitter: this, operation: 'send', count })

    emitterSendsChannel.start.publish(diagnosticContext)
    const promise = this.#send(count)
    emitterSendsChannel.end.publish(diagnosticContext)

    return promise.then(
      result => {
        diagnosticContext.result = result
        emitterSendsChannel.asyncStart.publish(diagnosticContext)
        emitterSendsChannel.asyncEnd.publish(diagnosticContext)

        return result
      },
      (error: unknown) => {
        diagnosticContext.error = error
        emitterSendsChannel.error.publish(diagnosticContext)
        emitterSendsChannel.asyncStart.publish(diagnosticContext)
        emitterSendsChannel.asyncEnd.publish(diagnosticContext)

        throw error
      }
    )
  }

  async close (): Promise<void> {
    this.#metricsEmitters?.dec()
    this.#metricsEmitters = undefined

    await this.#connection?.close()
  }

  async #send (count: number): Promise<SendResult> {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new UserError('/count must be a non-negative integer.', { count })
    }

    const encode = this.#encode
    const source = this.#options.source
    const start = process.hrtime.bigint()
    let bytes = 0

    loggers.emitter?.debug({ count, encoding: this.#options.encoding }, 'Sending messages.')

    for (let i = 0; i < count; i++) {
      const buffer = encode(createRecord(i, source))

      try {
        await writeFully(this.#sink, buffer)
      } catch (error) {
        throw new WriteError(`Cannot write message ${i}.`, { cause: error, index: i, written: i })
      }

      bytes += buffer.length
      this.#metricsSentMessages?.inc()
      this.#metricsSentBytes?.inc(buffer.length)
    }

    const result = { messages: count, bytes, duration: Number(process.hrtime.bigint() - start) / 1e6 }
    loggers.emitter?.debug(result, 'Messages sent.')

    return result
  }
}
