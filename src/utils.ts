import { type ValidateFunction } from 'ajv'
import { Ajv2020 } from 'ajv/dist/2020.js'
import { UserError } from './errors.ts'

export interface EnumerationDefinition<T> {
  allowed: T[]
  errorMessage?: string
}

export type KeywordSchema<T> = { schema: T }

export interface PromiseWithResolvers<T> {
  promise: Promise<T>
  resolve: (value: T | PromiseLike<T>) => void
  reject: (reason?: unknown) => void
}

export const ajv = new Ajv2020({ allErrors: true, coerceTypes: false, strict: true })

ajv.addKeyword({
  keyword: 'enumeration', // This mimics the enum keyword but defines a custom error message
  validate (property: EnumerationDefinition<string | number>, current: string | number) {
    return property.allowed.includes(current)
  },
  error: {
    message ({ schema }: KeywordSchema<EnumerationDefinition<string>>): string {
      return schema.errorMessage ?? `should be one of ${niceJoin(schema.allowed, ' or ')}`
    }
  }
})

// Promise.withResolvers is not available on Node.js 20
export function PromiseWithResolvers<T> (): PromiseWithResolvers<T> {
  let resolve: PromiseWithResolvers<T>['resolve'] = () => {}
  let reject: PromiseWithResolvers<T>['reject'] = () => {}

  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}

export function niceJoin (array: string[], lastSeparator: string = ' and ', separator: string = ', '): string {
  switch (array.length) {
    case 0:
      return ''
    case 1:
      return array[0]
    case 2:
      return array.join(lastSeparator)
    default:
      return array.slice(0, -1).join(separator) + lastSeparator + array[array.length - 1]
  }
}

export function enumErrorMessage (type: Record<string, unknown>): string {
  return `should be one of ${niceJoin(
    Object.values(type).map(v => String(v)),
    ' or '
  )}`
}

export function formatValidationErrors (validator: ValidateFunction, targetName: string): string {
  return ajv.errorsText(validator.errors, { dataVar: '$dataVar$' }).replaceAll('$dataVar$', targetName) + '.'
}

export function validateOptions (target: unknown, validator: ValidateFunction, targetName: string): void {
  if (!validator(target)) {
    throw new UserError(formatValidationErrors(validator, targetName))
  }
}
