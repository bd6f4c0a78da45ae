import { ConfigurationError } from './errors.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '')
}

/** Returns the URL unchanged when it is an absolute http(s) URL, or throws ConfigurationError. */
export function validateBaseUrl(url: string): string {
  const problem = describeBaseUrlProblem(url)
  if (problem) throw new ConfigurationError(`baseUrl ${problem}`)
  return url
}

export function describeBaseUrlProblem(url: string): string | undefined {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return `is not a valid URL: ${url}`
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    return `must use http or https: ${url}`
  }
  return undefined
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? globalThis.fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    const value = options[key]
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}
