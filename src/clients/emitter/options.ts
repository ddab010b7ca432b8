import { allowedEncodings, Encodings, encodingErrorMessage } from '../../protocol/encodings.ts'
import { defaultSource } from '../../protocol/record.ts'
import { ajv } from '../../utils.ts'
import { type ResolvedEmitterOptions } from './types.ts'

export const emitterOptionsProperties = {
  encoding: {
    type: 'string',
    enumeration: {
      allowed: allowedEncodings,
      errorMessage: encodingErrorMessage
    }
  },
  source: { type: 'string', minLength: 1 },
  metrics: { type: 'object', additionalProperties: true }
}

export const emitterOptionsSchema = {
  type: 'object',
  properties: emitterOptionsProperties,
  additionalProperties: false
}

export const createEmitterOptionsSchema = {
  type: 'object',
  properties: {
    ...emitterOptionsProperties,
    connectTimeout: { type: 'number', minimum: 0 }
  },
  additionalProperties: false
}

export const emitterOptionsValidator = ajv.compile(emitterOptionsSchema)
export const createEmitterOptionsValidator = ajv.compile(createEmitterOptionsSchema)

export const defaultEmitterOptions: ResolvedEmitterOptions = {
  encoding: Encodings.MSGPACK,
  source: defaultSource
}
