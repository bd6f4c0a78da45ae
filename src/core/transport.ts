import { localError, networkError, serverError, type TLetterError } from './errors.ts'
import { logger } from './logger.ts'
import { DEFAULT_TIMEOUT_IN_MILLISECONDS, USER_AGENT } from './sdk-info.ts'
import { err, ok, type THttpMethod, type TRequestOptions, type TResult } from './types.ts'
import type { TApiResult, TJsonValue } from '../types/api.ts'
import { normalizeBaseUrl, resolveFetch, validateBaseUrl } from './utils.ts'

const MAX_RAW_DETAIL_LENGTH = 200

export type TTransportOptions = {
  baseUrl: string
  apiKey: string
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch | undefined
}

/**
 * Single-attempt JSON transport. Every outcome is returned as a result:
 * success bodies verbatim, failures classified as local, network or server errors.
 */
export class Transport {
  private baseUrl: string
  private apiKey: string
  private timeoutInMilliseconds: number
  private userAgent: string = USER_AGENT
  private fetchImplementation: typeof fetch

  constructor(options: TTransportOptions) {
    this.baseUrl = validateBaseUrl(normalizeBaseUrl(options.baseUrl))
    this.apiKey = options.apiKey
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  async request(
    httpMethod: THttpMethod,
    path: string,
    requestOptions: TRequestOptions = {},
  ): Promise<TResult<TApiResult>> {
    const url: string = this.baseUrl + path
    const timeoutInMilliseconds: number = this.timeoutInMilliseconds

    // Header values must be ByteStrings; a key that is not one never reaches the network.
    let headers: Headers
    try {
      headers = new Headers({
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
        'User-Agent': this.userAgent,
      })
    } catch (caughtError) {
      return err(localError('Invalid API key', { detail: describeCause(caughtError) }))
    }

    const timeoutController: AbortController = new AbortController()
    const timeoutId: NodeJS.Timeout = setTimeout(
      () => timeoutController.abort(),
      timeoutInMilliseconds,
    )
    const timedOut = (): TLetterError =>
      networkError(`Request timed out after ${formatDuration(timeoutInMilliseconds)}`)

    logger.debug(`${httpMethod} ${path}`)

    try {
      let httpResponse: Response
      try {
        httpResponse = await this.fetchImplementation(url, {
          method: httpMethod,
          headers,
          body: requestOptions.body === undefined ? undefined : JSON.stringify(requestOptions.body),
          signal: timeoutController.signal,
        })
      } catch (caughtError) {
        if (timeoutController.signal.aborted) return err(timedOut())
        return err(networkError('Could not reach the API', describeCause(caughtError)))
      }

      let responseText: string
      try {
        responseText = await httpResponse.text()
      } catch (caughtError) {
        if (timeoutController.signal.aborted) return err(timedOut())
        return err(networkError('Could not read the API response', describeCause(caughtError)))
      }

      logger.debug(`${httpMethod} ${path} -> ${httpResponse.status}`)

      if (!httpResponse.ok) {
        return err(classifyErrorResponse(httpResponse, responseText))
      }

      if (responseText.trim() === '') return ok({})

      try {
        const parsedJson: TJsonValue = JSON.parse(responseText)
        return ok(parsedJson)
      } catch (caughtError) {
        return err(
          serverError('Invalid JSON in API response', httpResponse.status, {
            detail: describeCause(caughtError),
          }),
        )
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function classifyErrorResponse(httpResponse: Response, responseText: string): TLetterError {
  const status: number = httpResponse.status
  const body: Record<string, unknown> | undefined = parseJsonObject(responseText)

  if (!body) {
    return serverError(`HTTP ${status} with non-JSON response`, status, {
      detail: httpResponse.statusText || responseText.trim().slice(0, MAX_RAW_DETAIL_LENGTH),
    })
  }

  return serverError(readString(body.error) ?? `HTTP ${status}`, status, {
    code: readString(body.code),
    detail: readDetail(body.detail),
    field: readString(body.field),
  })
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return undefined
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined
  return { ...parsed }
}

function readString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function readDetail(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined
  return readString(value) ?? JSON.stringify(value)
}

// fetch wraps socket failures in `TypeError: fetch failed`; the cause names the real problem.
function describeCause(caughtError: unknown): string | undefined {
  if (caughtError instanceof Error) {
    if (caughtError.cause instanceof Error) return caughtError.cause.message
    return caughtError.message
  }
  if (caughtError === undefined || caughtError === null) return undefined
  return String(caughtError)
}

function formatDuration(milliseconds: number): string {
  if (milliseconds % 1000 === 0) {
    const seconds = milliseconds / 1000
    return `${seconds} ${seconds === 1 ? 'second' : 'seconds'}`
  }
  return `${milliseconds}ms`
}
