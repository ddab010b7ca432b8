export * from './emitter.ts'
export * from './options.ts'
export * from './types.ts'
