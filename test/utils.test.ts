import { strictEqual, throws } from 'node:assert'
import test from 'node:test'
import {
  ajv,
  enumErrorMessage,
  Encodings,
  formatValidationErrors,
  niceJoin,
  PromiseWithResolvers,
  UserError,
  validateOptions
} from '../src/index.ts'

test('niceJoin', () => {
  strictEqual(niceJoin([]), '')
  strictEqual(niceJoin(['a']), 'a')
  strictEqual(niceJoin(['a', 'b']), 'a and b')
  strictEqual(niceJoin(['a', 'b', 'c']), 'a, b and c')
  strictEqual(niceJoin(['a', 'b', 'c'], ' or '), 'a, b or c')
  strictEqual(niceJoin(['a', 'b', 'c'], ' or ', '; '), 'a; b or c')
})

test('enumErrorMessage', () => {
  strictEqual(enumErrorMessage(Encodings), 'should be one of msgpack or json')
  strictEqual(enumErrorMessage({ A: 1, B: 2, C: 3 }), 'should be one of 1, 2 or 3')
})

test('ajv enumeration keyword', () => {
  const validate = ajv.compile({
    type: 'object',
    properties: {
      plain: { type: 'string', enumeration: { allowed: ['a', 'b'] } },
      custom: { type: 'string', enumeration: { allowed: ['c'], errorMessage: 'must be c' } }
    }
  })

  strictEqual(validate({ plain: 'a', custom: 'c' }), true)
  strictEqual(validate({ plain: 'x' }), false)
  strictEqual(formatValidationErrors(validate, '/target'), '/target/plain should be one of a or b.')
  strictEqual(validate({ custom: 'x' }), false)
  strictEqual(formatValidationErrors(validate, '/target'), '/target/custom must be c.')
})

test('validateOptions', () => {
  const validate = ajv.compile({
    type: 'object',
    properties: { value: { type: 'integer' } },
    additionalProperties: false
  })

  validateOptions({ value: 1 }, validate, '/options')

  throws(
    () => validateOptions({ other: 1 }, validate, '/options'),
    (error: unknown) =>
      error instanceof UserError && error.message === '/options must NOT have additional properties.'
  )
})

test('PromiseWithResolvers', async () => {
  const resolved = PromiseWithResolvers<number>()
  resolved.resolve(42)
  strictEqual(await resolved.promise, 42)

  const rejected = PromiseWithResolvers<number>()
  rejected.reject(new Error('test'))
  await rejected.promise.then(
    () => {
      throw new Error('Expected a rejection.')
    },
    (error: Error) => {
      strictEqual(error.message, 'test')
    }
  )
})
