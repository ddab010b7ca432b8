// General
export * from './callbacks.ts'
export * from './diagnostic.ts'
export * from './errors.ts'
export * from './logging.ts'
export * from './metrics.ts'
export * from './utils.ts'

// Wire format
export * from './protocol/decoders.ts'
export * from './protocol/encodings.ts'
export * from './protocol/record.ts'

// Networking
export * from './network/connection.ts'
export * from './network/receiver.ts'

// Clients
export * from './clients/emitter/index.ts'

// Command line
export * from './cli.ts'
