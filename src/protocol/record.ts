import { ajv } from '../utils.ts'

export const RECORD_ID = 42
export const MESSAGE_PREFIX = 'le message - '
export const defaultSource = 'app/echo'

export interface MessageRecordParent {
  readonly child: string
}

/*
  MessageRecord => id source parent message
    id => INT (always 42)
    source => STRING
    parent => MAP
      child => STRING
    message => STRING ("le message - " + index)
*/
export interface MessageRecord {
  readonly id: number
  readonly source: string
  readonly parent: MessageRecordParent
  readonly message: string
}

export const messageRecordKeys = ['id', 'source', 'parent', 'message'] as const

export const messageRecordSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    source: { type: 'string', minLength: 1 },
    parent: {
      type: 'object',
      properties: { child: { type: 'string' } },
      required: ['child'],
      additionalProperties: false
    },
    message: { type: 'string' }
  },
  required: [...messageRecordKeys],
  additionalProperties: false
}

export const messageRecordValidator = ajv.compile<MessageRecord>(messageRecordSchema)

export function createRecord (index: number, source: string = defaultSource): MessageRecord {
  // Key order is the wire order
  return {
    id: RECORD_ID,
    source,
    parent: { child: 'item' },
    message: MESSAGE_PREFIX + index
  }
}

export function isMessageRecord (value: unknown): value is MessageRecord {
  return messageRecordValidator(value)
}
