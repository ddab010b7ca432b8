const kGenericError = Symbol('logflood.genericError')

export const ERROR_PREFIX = 'LOGFLOOD_'

export const errorCodes = [
  'LOGFLOOD_ARGUMENT_PARSE',
  'LOGFLOOD_CONNECTION',
  'LOGFLOOD_DECODE',
  'LOGFLOOD_TIMEOUT',
  'LOGFLOOD_USAGE',
  'LOGFLOOD_USER',
  'LOGFLOOD_WRITE'
] as const

export type ErrorCode = (typeof errorCodes)[number]

export type ErrorProperties = { cause?: unknown } & Record<string, unknown>

export class GenericError extends Error {
  code: ErrorCode;
  [index: string]: unknown
  [kGenericError]: true

  static isGenericError (error: unknown): error is GenericError {
    return error instanceof Error && (error as GenericError)[kGenericError] === true
  }

  constructor (code: ErrorCode, message: string, { cause, ...rest }: ErrorProperties = {}) {
    super(message, cause ? { cause } : {})
    this.code = code
    this[kGenericError] = true

    Reflect.defineProperty(this, 'message', { enumerable: true })
    Reflect.defineProperty(this, 'code', { enumerable: true })

    if ('stack' in this) {
      Reflect.defineProperty(this, 'stack', { enumerable: true })
    }

    for (const [key, value] of Object.entries(rest)) {
      Reflect.defineProperty(this, key, { value, enumerable: true })
    }

    Reflect.defineProperty(this, kGenericError, { value: true, enumerable: false })
  }

  findBy<ErrorType extends GenericError = GenericError> (property: string, value: unknown): ErrorType | null {
    if (this[property] === value) {
      return this as unknown as ErrorType
    }

    if (GenericError.isGenericError(this.cause)) {
      return this.cause.findBy<ErrorType>(property, value)
    }

    return null
  }
}

export class ArgumentParseError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_ARGUMENT_PARSE'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(ArgumentParseError.code, message, properties)
  }
}

export class ConnectionError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_CONNECTION'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(ConnectionError.code, message, properties)
  }
}

export class DecodeError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_DECODE'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(DecodeError.code, message, properties)
  }
}

export class TimeoutError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_TIMEOUT'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(TimeoutError.code, message, properties)
  }
}

export class UsageError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_USAGE'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(UsageError.code, message, properties)
  }
}

export class UserError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_USER'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(UserError.code, message, properties)
  }
}

export class WriteError extends GenericError {
  static code: ErrorCode = 'LOGFLOOD_WRITE'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(WriteError.code, message, properties)
  }
}
