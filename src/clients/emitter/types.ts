import { type Metrics } from '../../metrics.ts'
import { type ConnectionOptions } from '../../network/connection.ts'
import { type EncodingValue } from '../../protocol/encodings.ts'

// Anything that takes bytes, possibly fewer than offered
export interface ByteSink {
  write (buffer: Buffer): Promise<number>
}

export interface EmitterOptions {
  encoding?: EncodingValue
  source?: string
  metrics?: Metrics
}

export type ResolvedEmitterOptions = Required<Pick<EmitterOptions, 'encoding' | 'source'>>

export interface CreateEmitterOptions extends EmitterOptions, ConnectionOptions {}

export interface SendResult {
  messages: number
  bytes: number
  duration: number
}
