#!/usr/bin/env -S node --import tsx
import { once } from 'node:events'
import { parseArgs } from 'node:util'
import { parseNonNegativeInteger } from '../src/cli.ts'
import { GenericError } from '../src/errors.ts'
import { logger } from '../src/logging.ts'
import { type EncodingValue, isEncoding } from '../src/protocol/encodings.ts'
import { type ConnectionTotals, Receiver } from '../src/network/receiver.ts'

const usage = 'Usage: logflood-receive PORT [HOST] [--encoding msgpack|json]'

async function run (port: string, host: string | undefined, encoding: EncodingValue): Promise<void> {
  const receiver = new Receiver({ encoding })

  receiver.on('end', (totals: ConnectionTotals) => {
    logger.info({ ...totals, totalReceived: receiver.received, totalDropped: receiver.dropped }, 'Peer finished.')
  })

  await receiver.listen(parseNonNegativeInteger('PORT', port, 65535), host)
  await Promise.race([once(process, 'SIGINT'), once(process, 'SIGTERM')])
  await receiver.close()
}

const { values, positionals } = parseArgs({
  options: {
    encoding: { type: 'string', short: 'e' }
  },
  allowPositionals: true,
  strict: true
})

const encoding = values.encoding ?? 'msgpack'

if (positionals.length < 1 || positionals.length > 2 || !isEncoding(encoding)) {
  process.stderr.write(usage + '\n')
  process.exitCode = 1
} else {
  try {
    await run(positionals[0], positionals[1], encoding)
  } catch (error) {
    if (!GenericError.isGenericError(error)) {
      throw error
    }

    process.stderr.write(`Error: ${error.message}\n`)
    process.exitCode = 2
  }
}
