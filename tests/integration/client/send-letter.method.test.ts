import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { AgenticLetters } from '../../../src/client/agentic-letters.ts'
import { TEST_CONFIG } from '../../helpers/constants.ts'
import {
  makeLetter,
  makeLetterRequest,
  makeScratchDir,
  type TScratchDir,
} from '../../helpers/factories.ts'
import { createFetchMock, sentBody, type TFetchMock } from '../../helpers/mocks/fetch.mock.ts'

describe('AgenticLetters.sendLetter', () => {
  let fetchMock: TFetchMock
  let scratch: TScratchDir
  let client: AgenticLetters

  beforeEach(async () => {
    fetchMock = createFetchMock()
    scratch = await makeScratchDir()
    client = new AgenticLetters({
      apiKey: TEST_CONFIG.apiKey,
      baseUrl: TEST_CONFIG.baseUrl,
      fetchImplementation: fetchMock.fetch,
    })
  })

  afterEach(async () => {
    await scratch.cleanup()
  })

  it('POSTs the letter and returns the created letter verbatim', async () => {
    const pdfPath = await scratch.write('letter.pdf', Buffer.from([0x25, 0x50, 0x44, 0x46, 0xff]))
    const created = makeLetter({ status: 'queued', label: 'q3-report' })
    fetchMock.pushJson(created, { status: 201 })
    const request = makeLetterRequest({ pdfPath, label: 'q3-report', type: 'registered' })

    const result = await client.sendLetter(request)

    expect(result).toEqual({ ok: true, value: created })
    expect(fetchMock.calls).toHaveLength(1)
    expect(fetchMock.calls[0]?.url).toBe('https://api.test.com/api/letters')
    expect(fetchMock.calls[0]?.init?.method).toBe('POST')
    expect(sentBody(fetchMock.calls[0])).toEqual({
      pdf: 'JVBERv8=',
      recipient: {
        name: request.name,
        street: request.street,
        zip: request.zip,
        city: request.city,
        country: 'DE',
      },
      type: 'registered',
      label: 'q3-report',
    })
  })

  it('never sends a label key when no label is given', async () => {
    const pdfPath = await scratch.write('letter.pdf', '%PDF')
    fetchMock.pushJson(makeLetter(), { status: 201 })

    await client.sendLetter(makeLetterRequest({ pdfPath }))

    expect(sentBody(fetchMock.calls[0])).not.toHaveProperty('label')
  })

  it('makes no network call when the document is missing', async () => {
    const pdfPath = `${scratch.path}/nowhere.pdf`

    const result = await client.sendLetter(makeLetterRequest({ pdfPath }))

    expect(result).toEqual({
      ok: false,
      error: { origin: 'local', message: `File not found: ${pdfPath}` },
    })
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('makes no network call when the path is a directory', async () => {
    const result = await client.sendLetter(makeLetterRequest({ pdfPath: scratch.path }))

    expect(result).toEqual({
      ok: false,
      error: { origin: 'local', message: `Not a file: ${scratch.path}` },
    })
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('surfaces a validation rejection as a server error', async () => {
    const pdfPath = await scratch.write('letter.pdf', '%PDF')
    fetchMock.pushJson({ error: 'invalid zip', field: 'zip' }, { status: 422 })

    const result = await client.sendLetter(makeLetterRequest({ pdfPath, zip: '1' }))

    expect(result).toEqual({
      ok: false,
      error: { origin: 'server', message: 'invalid zip', httpStatus: 422, field: 'zip' },
    })
  })
})
