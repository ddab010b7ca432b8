import { type Logger, pino } from 'pino'

export function setDebugLoggers (debug: string | undefined): void {
  enabledDebugLoggers = (debug ?? '')
    .split(',')
    .map(x => {
      x = x.trim()
      return x.length ? new RegExp(`^${x.replaceAll('*', '.*')}$`) : null
    })
    .filter((x): x is RegExp => x !== null)

  loggers = {
    cli: createDebugLogger('logflood:cli'),
    connection: createDebugLogger('logflood:connection'),
    emitter: createDebugLogger('logflood:emitter'),
    receiver: createDebugLogger('logflood:receiver')
  }
}

export function setLogger (level: string | undefined): void {
  logger = pino({
    level: level ?? 'info',
    transport: {
      target: 'pino-pretty',
      options: { destination: 2 }
    }
  })
}

export function createDebugLogger (name: string | undefined): Logger | null {
  name ??= ''

  if (!enabledDebugLoggers.some(r => r.test(name))) {
    return null
  }

  return logger.child({ name })
}

// These two methods are defined via functions to ensure testability
export let logger: Logger
export let enabledDebugLoggers: RegExp[]
export let loggers: Record<'cli' | 'connection' | 'emitter' | 'receiver', Logger | null>

setLogger(process.env.LOG_LEVEL)
setDebugLoggers(process.env.NODE_DEBUG ?? '')
