import { readFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { Emitter } from './clients/emitter/emitter.ts'
import {
  ArgumentParseError,
  ConnectionError,
  type ErrorCode,
  GenericError,
  UsageError
} from './errors.ts'
import { loggers } from './logging.ts'
import { Encodings, encodingErrorMessage, type EncodingValue, isEncoding } from './protocol/encodings.ts'
import { defaultSource } from './protocol/record.ts'

export const usage =
  'Usage: logflood HOST PORT [COUNT] [--encoding msgpack|json] [--source NAME] [--connect-timeout MS]'

export const defaultServicesFile = '/etc/services'

export const exitCodes: Record<ErrorCode, number> = {
  LOGFLOOD_USAGE: 1,
  LOGFLOOD_DECODE: 1,
  LOGFLOOD_ARGUMENT_PARSE: 2,
  LOGFLOOD_USER: 2,
  LOGFLOOD_CONNECTION: 3,
  LOGFLOOD_TIMEOUT: 3,
  LOGFLOOD_WRITE: 4
}

export interface CommandLine {
  host: string
  // Either a numeric port or a service name still to be resolved
  port: number | string
  count: number
  encoding: EncodingValue
  source: string
  connectTimeout?: number
  help: boolean
}

export interface OutputStreams {
  stdout: { write (chunk: string): unknown }
  stderr: { write (chunk: string): unknown }
}

export interface MainOptions {
  servicesFile?: string
}

const decimalPattern = /^\d+$/

export function parseNonNegativeInteger (name: string, value: string, maximum: number = Number.MAX_SAFE_INTEGER): number {
  const parsed = decimalPattern.test(value) ? Number.parseInt(value, 10) : Number.NaN

  if (!Number.isSafeInteger(parsed) || parsed > maximum) {
    throw new ArgumentParseError(`${name} must be a non-negative integer not greater than ${maximum}, got "${value}".`, {
      argument: name,
      value
    })
  }

  return parsed
}

export function parseCount (value: string | undefined): number {
  return value === undefined ? 1 : parseNonNegativeInteger('COUNT', value)
}

export function parsePort (value: string): number | string {
  if (decimalPattern.test(value)) {
    return parseNonNegativeInteger('PORT', value, 65535)
  }

  if (!/^[A-Za-z][\w.+-]*$/.test(value)) {
    throw new ArgumentParseError(`PORT must be a port number or a service name, got "${value}".`, {
      argument: 'PORT',
      value
    })
  }

  return value
}

function parseRawArguments (args: string[]) {
  return parseArgs({
    args,
    options: {
      encoding: { type: 'string', short: 'e' },
      source: { type: 'string', short: 's' },
      'connect-timeout': { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    },
    allowPositionals: true,
    strict: true
  })
}

export function parseCommandLine (args: string[]): CommandLine {
  let parsed: ReturnType<typeof parseRawArguments>

  try {
    parsed = parseRawArguments(args)
  } catch (error) {
    if (args.length < 2) {
      throw new UsageError('Missing HOST and PORT.', { cause: error })
    }

    throw new ArgumentParseError(error instanceof Error ? error.message : String(error), { cause: error })
  }

  const { values, positionals } = parsed

  if (values.help === true) {
    return {
      host: '',
      port: 0,
      count: 0,
      encoding: Encodings.MSGPACK,
      source: defaultSource,
      help: true
    }
  }

  if (positionals.length < 2) {
    throw new UsageError('Missing HOST and PORT.')
  } else if (positionals.length > 3) {
    throw new UsageError(`Unexpected arguments: ${positionals.slice(3).join(' ')}.`)
  }

  const [host, port, count] = positionals
  const encoding = values.encoding ?? Encodings.MSGPACK
  const source = values.source ?? defaultSource

  if (!isEncoding(encoding)) {
    throw new ArgumentParseError(`--encoding ${encodingErrorMessage}, got "${encoding}".`, {
      argument: 'encoding',
      value: encoding
    })
  }

  if (!source.length) {
    throw new ArgumentParseError('--source must not be empty.', { argument: 'source', value: source })
  }

  const connectTimeout = values['connect-timeout']

  return {
    host,
    port: parsePort(port),
    count: parseCount(count),
    encoding,
    source,
    connectTimeout:
      connectTimeout === undefined ? undefined : parseNonNegativeInteger('--connect-timeout', connectTimeout),
    help: false
  }
}

/*
  /etc/services format, one entry per line:
    name  port/protocol  [aliases ...]  [# comment]
*/
export async function resolveService (name: string, servicesFile: string = defaultServicesFile): Promise<number> {
  let contents: string

  try {
    contents = await readFile(servicesFile, 'utf8')
  } catch (error) {
    throw new ConnectionError(`Cannot resolve service "${name}".`, { cause: error, service: name })
  }

  for (const line of contents.split('\n')) {
    const [service, portAndProtocol, ...aliases] = line.replace(/#.*$/, '').trim().split(/\s+/)

    if (!portAndProtocol) {
      continue
    }

    const [port, protocol] = portAndProtocol.split('/')

    if (protocol === 'tcp' && (service === name || aliases.includes(name)) && decimalPattern.test(port)) {
      return Number.parseInt(port, 10)
    }
  }

  throw new ConnectionError(`Cannot resolve service "${name}".`, { service: name })
}

export function causesOf (error: Error): Error[] {
  const causes: Error[] = []
  let current = error.cause

  while (current instanceof Error && current !== error && !causes.includes(current)) {
    causes.push(current)
    current = current.cause
  }

  return causes
}

export function reportError (error: unknown, streams: OutputStreams): number {
  if (!GenericError.isGenericError(error)) {
    throw error
  }

  if (error.code === UsageError.code) {
    streams.stderr.write(usage + '\n')
  } else {
    streams.stderr.write(`Error: ${error.message}\n`)

    for (const cause of causesOf(error)) {
      streams.stderr.write(`  Caused by: ${cause.message}\n`)
    }
  }

  loggers.cli?.debug({ error }, 'Terminating.')
  return exitCodes[error.code]
}

export async function main (
  args: string[],
  streams: OutputStreams = process,
  options: MainOptions = {}
): Promise<number> {
  let commandLine: CommandLine

  try {
    commandLine = parseCommandLine(args)
  } catch (error) {
    return reportError(error, streams)
  }

  if (commandLine.help) {
    streams.stdout.write(usage + '\n')
    return 0
  }

  const { host, count, encoding, source, connectTimeout } = commandLine
  let emitter: Emitter | undefined

  try {
    const port =
      typeof commandLine.port === 'number'
        ? commandLine.port
        : await resolveService(commandLine.port, options.servicesFile)

    emitter = await Emitter.create(host, port, {
      encoding,
      source,
      ...(connectTimeout === undefined ? {} : { connectTimeout })
    })

    const result = await emitter.send(count)
    loggers.cli?.debug({ host, port, ...result }, 'Completed.')

    return 0
  } catch (error) {
    return reportError(error, streams)
  } finally {
    await emitter?.close()
  }
}
