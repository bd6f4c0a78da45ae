export type TErrorOrigin = 'local' | 'network' | 'server'

/** Filesystem, configuration or input failure detected before any network call. */
export type TLocalError = {
  origin: 'local'
  message: string
  code?: string
  detail?: string
  field?: string
}

/** The API could not be reached, or the exchange did not complete in time. */
export type TNetworkError = {
  origin: 'network'
  message: string
  detail?: string
}

/** The API answered with a non-success status (or an unusable success body). */
export type TServerError = {
  origin: 'server'
  message: string
  httpStatus: number
  code?: string
  detail?: string
  field?: string
}

export type TLetterError = TLocalError | TNetworkError | TServerError

type TErrorFields = { code?: string; detail?: string; field?: string }

export function localError(message: string, fields?: TErrorFields): TLocalError {
  return { origin: 'local', message, ...presentFields(fields) }
}

export function networkError(message: string, detail?: string): TNetworkError {
  return detail ? { origin: 'network', message, detail } : { origin: 'network', message }
}

export function serverError(
  message: string,
  httpStatus: number,
  fields?: TErrorFields,
): TServerError {
  return { origin: 'server', message, httpStatus, ...presentFields(fields) }
}

// Empty strings count as absent.
function presentFields(fields: TErrorFields | undefined): TErrorFields {
  const present: TErrorFields = {}
  if (fields?.code) present.code = fields.code
  if (fields?.detail) present.detail = fields.detail
  if (fields?.field) present.field = fields.field
  return present
}

/**
 * Renders an error as the multi-line block written to stderr:
 *
 *   [server] invalid zip
 *     http_status: 422
 *     field: zip
 */
export function formatError(error: TLetterError): string {
  const lines: string[] = [`[${error.origin}] ${error.message}`]

  switch (error.origin) {
    case 'local':
      if (error.code) lines.push(`  code: ${error.code}`)
      if (error.detail) lines.push(`  detail: ${error.detail}`)
      if (error.field) lines.push(`  field: ${error.field}`)
      break
    case 'network':
      if (error.detail) lines.push(`  detail: ${error.detail}`)
      break
    case 'server':
      if (error.code) lines.push(`  code: ${error.code}`)
      lines.push(`  http_status: ${error.httpStatus}`)
      if (error.detail) lines.push(`  detail: ${error.detail}`)
      if (error.field) lines.push(`  field: ${error.field}`)
      break
    default:
      return assertNever(error)
  }

  return lines.join('\n')
}

function assertNever(value: never): never {
  throw new Error(`Unhandled error origin: ${JSON.stringify(value)}`)
}

/** Indicates invalid client options detected at construction time. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
