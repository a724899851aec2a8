import * as _ from 'radash'

export type SafePromise<T, E extends Error | string = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

export function isSafeError<T, E extends Error | string>(
  res: Safe<T, E>,
): res is SafeError<E> {
  return res[0] !== undefined
}

/**
 * Returns the value of a successful result or throws its error.
 */
export function unwrapSafe<T, E extends Error>(res: Safe<T, E>): T {
  if (isSafeError(res)) throw res[0]
  return res[1]
}

export async function safeTry<T>(
  promise: () => Promise<T>,
): SafePromise<Awaited<T>> {
  return _.try(promise)()
}

export function safeSyncTry<T>(callBack: () => T) {
  return _.try(callBack)()
}
