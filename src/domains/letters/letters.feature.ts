import { readFile, stat } from 'fs/promises'
import { localError, type TLocalError } from '../../core/errors.ts'
import { err, ok, type TResult } from '../../core/types.ts'
import type { TApiResult, TSendLetterPayload } from '../../types/api.ts'
import type { TLettersApi } from './letters.api.ts'
import {
  DEFAULT_COUNTRY,
  DEFAULT_LETTER_TYPE,
  type TDocumentReader,
  type TLetterRequest,
} from './types.ts'

const defaultDocumentReader: TDocumentReader = { stat, readFile }

export type TLettersFeatureOptions = {
  api: TLettersApi
  documentReader?: TDocumentReader
}

/**
 * Turns a letter request into the POST /letters payload. The document is checked and read
 * before anything touches the network; a failure there never reaches the API.
 */
export class LettersFeature {
  private api: TLettersApi
  private documentReader: TDocumentReader

  constructor(options: TLettersFeatureOptions) {
    this.api = options.api
    this.documentReader = options.documentReader ?? defaultDocumentReader
  }

  public async sendLetter(request: TLetterRequest): Promise<TResult<TApiResult>> {
    const document = await this.loadDocument(request.pdfPath)
    if (!document.ok) return document

    return await this.api.createLetter(buildLetterPayload(request, document.value))
  }

  public async loadDocument(path: string): Promise<TResult<Buffer>> {
    let stats: { isFile(): boolean }
    try {
      stats = await this.documentReader.stat(path)
    } catch (caughtError) {
      return err(classifyFileError(path, caughtError))
    }

    if (!stats.isFile()) return err(localError(`Not a file: ${path}`))

    try {
      return ok(await this.documentReader.readFile(path))
    } catch (caughtError) {
      return err(classifyFileError(path, caughtError))
    }
  }
}

export function buildLetterPayload(
  request: TLetterRequest,
  documentBytes: Buffer,
): TSendLetterPayload {
  const payload: TSendLetterPayload = {
    pdf: documentBytes.toString('base64'),
    recipient: {
      name: request.name,
      street: request.street,
      zip: request.zip,
      city: request.city,
      country: request.country ?? DEFAULT_COUNTRY,
    },
    type: request.type ?? DEFAULT_LETTER_TYPE,
  }
  if (request.label) payload.label = request.label
  return payload
}

// Permission problems on a parent directory and on the file itself are reported the same way.
function classifyFileError(path: string, caughtError: unknown): TLocalError {
  switch (errorCode(caughtError)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return localError(`File not found: ${path}`)
    case 'EACCES':
    case 'EPERM':
      return localError(`Permission denied: ${path}`)
    default:
      return localError(`Cannot read file: ${path}`, {
        detail: caughtError instanceof Error ? caughtError.message : String(caughtError),
      })
  }
}

function errorCode(caughtError: unknown): string | undefined {
  if (
    caughtError instanceof Error &&
    'code' in caughtError &&
    typeof caughtError.code === 'string'
  ) {
    return caughtError.code
  }
  return undefined
}
