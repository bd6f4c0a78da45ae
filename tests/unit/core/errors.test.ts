import { describe, expect, it } from 'vitest'
import {
  formatError,
  localError,
  networkError,
  serverError,
} from '../../../src/core/errors.ts'

describe('error constructors', () => {
  it('omits empty optional fields', () => {
    expect(localError('No API key found', { code: '', detail: undefined, field: '' })).toEqual({
      origin: 'local',
      message: 'No API key found',
    })
    expect(networkError('Could not reach the API', '')).toEqual({
      origin: 'network',
      message: 'Could not reach the API',
    })
  })

  it('always carries the status on server errors', () => {
    expect(serverError('HTTP 500', 500)).toEqual({
      origin: 'server',
      message: 'HTTP 500',
      httpStatus: 500,
    })
  })
})

describe('formatError', () => {
  it('renders only the header line when nothing else is present', () => {
    expect(formatError(localError('File not found: /tmp/missing.pdf'))).toBe(
      '[local] File not found: /tmp/missing.pdf',
    )
  })

  it('renders server fields in code, http_status, detail, field order', () => {
    const error = serverError('invalid zip', 422, {
      field: 'zip',
      detail: 'must be 5 digits',
      code: 'validation_failed',
    })

    expect(formatError(error)).toBe(
      [
        '[server] invalid zip',
        '  code: validation_failed',
        '  http_status: 422',
        '  detail: must be 5 digits',
        '  field: zip',
      ].join('\n'),
    )
  })

  it('renders network errors without an http_status line', () => {
    expect(formatError(networkError('Could not reach the API', 'connect ECONNREFUSED'))).toBe(
      '[network] Could not reach the API\n  detail: connect ECONNREFUSED',
    )
  })

  it('renders local detail and field', () => {
    expect(
      formatError(localError('Missing required option --zip', { field: 'zip' })),
    ).toBe('[local] Missing required option --zip\n  field: zip')
    expect(
      formatError(localError('Cannot read file: /srv/a.pdf', { detail: 'EIO: i/o error' })),
    ).toBe('[local] Cannot read file: /srv/a.pdf\n  detail: EIO: i/o error')
  })
})
