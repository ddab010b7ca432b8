import { Packr } from 'msgpackr'
import { enumErrorMessage } from '../utils.ts'
import { type MessageRecord } from './record.ts'

export const Encodings = {
  MSGPACK: 'msgpack',
  JSON: 'json'
} as const

export type Encoding = keyof typeof Encodings
export type EncodingValue = (typeof Encodings)[keyof typeof Encodings]

export const allowedEncodings = Object.values(Encodings)

export const encodingErrorMessage = enumErrorMessage(Encodings)

export type Encoder = (record: MessageRecord) => Buffer

export function isEncoding (value: unknown): value is EncodingValue {
  return typeof value === 'string' && Object.hasOwn(encoders, value)
}

// Plain maps with the smallest header that fits, never the msgpackr record extension
export function createMsgpackEncoder (): Encoder {
  const packr = new Packr({ useRecords: false, variableMapSize: true })

  return function encodeMsgpack (record: MessageRecord): Buffer {
    return packr.pack(record)
  }
}

export function createJsonEncoder (): Encoder {
  return function encodeJson (record: MessageRecord): Buffer {
    return Buffer.from(JSON.stringify(record) + '\n', 'utf8')
  }
}

export const encoders: Record<EncodingValue, () => Encoder> = {
  [Encodings.MSGPACK]: createMsgpackEncoder,
  [Encodings.JSON]: createJsonEncoder
}

// The choice happens once, the returned function has no encoding branch
export function createEncoder (encoding: EncodingValue = Encodings.MSGPACK): Encoder {
  return encoders[encoding]()
}
