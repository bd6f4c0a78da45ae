import type { TLetterError } from './errors.ts'

export type THttpMethod = 'GET' | 'POST'

export type TRequestOptions = {
  body?: unknown
}

/** Outcome of every fallible call. Failures carry exactly one classified error. */
export type TResult<T> = { ok: true; value: T } | { ok: false; error: TLetterError }

export function ok<T>(value: T): TResult<T> {
  return { ok: true, value }
}

export function err<T = never>(error: TLetterError): TResult<T> {
  return { ok: false, error }
}

export type TTokenProvider = {
  /** Resolves the bearer credential, or a local error naming where it was looked for. */
  getToken(): Promise<TResult<string>>
}
