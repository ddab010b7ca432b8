import { Unpackr } from 'msgpackr'
import { StringDecoder } from 'node:string_decoder'
import { Transform, type TransformCallback } from 'node:stream'
import { DecodeError } from '../errors.ts'
import { type EncodingValue, Encodings } from './encodings.ts'

/*
  Splits a stream of concatenated MessagePack values.
  A value cut across chunks is retried once the pending bytes have doubled, or when the stream ends.
*/
export class MsgpackDecoder extends Transform {
  #unpackr: Unpackr
  #chunks: Buffer[]
  #pendingLength: number
  #retryAt: number

  constructor () {
    super({ readableObjectMode: true })
    this.#unpackr = new Unpackr({ useRecords: false })
    this.#chunks = []
    this.#pendingLength = 0
    this.#retryAt = 0
  }

  get pendingBytes (): number {
    return this.#pendingLength
  }

  _transform (chunk: Buffer, _: BufferEncoding, callback: TransformCallback): void {
    this.#chunks.push(chunk)
    this.#pendingLength += chunk.length

    if (this.#pendingLength < this.#retryAt) {
      callback()
      return
    }

    callback(this.#decode())
  }

  _flush (callback: TransformCallback): void {
    const error = this.#pendingLength ? this.#decode() : null

    if (error) {
      callback(error)
      return
    }

    if (this.#pendingLength) {
      callback(new DecodeError(`Stream ended inside a MessagePack value (${this.#pendingLength} bytes left).`))
      return
    }

    callback()
  }

  #decode (): DecodeError | null {
    const buffer = this.#chunks.length === 1 ? this.#chunks[0] : Buffer.concat(this.#chunks, this.#pendingLength)
    let consumed = 0

    try {
      this.#unpackr.unpackMultiple(buffer, (value: unknown, _start?: number, end?: number) => {
        // nil would end the readable side
        if (value !== null) {
          this.push(value)
        }

        consumed = end ?? buffer.length
      })
    } catch (error) {
      if (!(error instanceof Error && 'incomplete' in error && error.incomplete === true)) {
        return new DecodeError('Cannot decode MessagePack data.', { cause: error, position: consumed })
      }
    }

    const rest = buffer.subarray(consumed)

    this.#chunks = rest.length ? [rest] : []
    this.#pendingLength = rest.length
    this.#retryAt = rest.length * 2

    return null
  }
}

export class JsonLinesDecoder extends Transform {
  #decoder: StringDecoder
  #pending: string

  constructor () {
    super({ readableObjectMode: true })
    this.#decoder = new StringDecoder('utf8')
    this.#pending = ''
  }

  _transform (chunk: Buffer, _: BufferEncoding, callback: TransformCallback): void {
    const lines = (this.#pending + this.#decoder.write(chunk)).split('\n')
    this.#pending = lines.pop() ?? ''

    callback(this.#pushLines(lines))
  }

  _flush (callback: TransformCallback): void {
    const rest = this.#pending + this.#decoder.end()
    this.#pending = ''

    callback(this.#pushLines([rest]))
  }

  #pushLines (lines: string[]): DecodeError | null {
    for (const line of lines) {
      if (!line.trim().length) {
        continue
      }

      let value: unknown

      try {
        value = JSON.parse(line)
      } catch (error) {
        return new DecodeError('Cannot decode JSON line.', { cause: error, line })
      }

      if (value !== null) {
        this.push(value)
      }
    }

    return null
  }
}

export function createDecoder (encoding: EncodingValue = Encodings.MSGPACK): Transform {
  return encoding === Encodings.JSON ? new JsonLinesDecoder() : new MsgpackDecoder()
}
