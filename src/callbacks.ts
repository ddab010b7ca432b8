import { PromiseWithResolvers } from './utils.ts'

export type Callback<ReturnType> = (error: Error | null, payload?: ReturnType) => void

export const kCallbackPromise = Symbol('logflood.callbackPromise')

export type CallbackWithPromise<ReturnType> = Callback<ReturnType> & { [kCallbackPromise]?: Promise<ReturnType> }

export function createPromisifiedCallback<ReturnType> (): CallbackWithPromise<ReturnType> {
  const { promise, resolve, reject } = PromiseWithResolvers<ReturnType>()

  function callback (error: Error | null, payload?: ReturnType): void {
    if (error) {
      reject(error)
    } else {
      resolve(payload as ReturnType)
    }
  }

  callback[kCallbackPromise] = promise

  return callback
}
