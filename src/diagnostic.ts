import { channel, type TracingChannel, tracingChannel } from 'node:diagnostics_channel'
import { type Emitter } from './clients/emitter/emitter.ts'
import { type Connection } from './network/connection.ts'

export type InstanceKind = 'connection' | 'emitter' | 'receiver'

export interface CreationEvent<Instance> {
  type: InstanceKind
  instance: Instance
}

export type ConnectionDiagnosticEvent<Attributes = Record<string, unknown>> = { connection: Connection } & Attributes

export type EmitterDiagnosticEvent<Attributes = Record<string, unknown>> = { emitter: Emitter } & Attributes

export type TracingChannelWithName<EventType extends object> = TracingChannel<string, EventType> & { name: string }

export type DiagnosticContext<BaseContext = {}> = BaseContext & {
  operationId: bigint
  result?: unknown
  error?: unknown
}

export const channelsNamespace = 'logflood' as const

let operationId = 0n

export function createDiagnosticContext<BaseContext = {}> (context: BaseContext): DiagnosticContext<BaseContext> {
  return { operationId: operationId++, ...context }
}

export function notifyCreation<Instance> (type: InstanceKind, instance: Instance): void {
  instancesChannel.publish({ type, instance } satisfies CreationEvent<Instance>)
}

export function createTracingChannel<DiagnosticEvent extends object> (
  name: string
): TracingChannelWithName<DiagnosticEvent> {
  name = `${channelsNamespace}:${name}`
  return Object.assign(tracingChannel<string, DiagnosticEvent>(name), { name })
}

// Generic channel for objects creation
export const instancesChannel = channel(`${channelsNamespace}:instances`)

export const connectionsConnectsChannel = createTracingChannel<ConnectionDiagnosticEvent>('connections:connects')
export const emitterSendsChannel = createTracingChannel<EmitterDiagnosticEvent>('emitter:sends')
