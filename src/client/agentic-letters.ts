import { DEFAULT_API_BASE } from '../core/sdk-info.ts'
import { Transport } from '../core/transport.ts'
import type { TResult } from '../core/types.ts'
import { validateRequiredStrings } from '../core/utils.ts'
import { CreditsApi } from '../domains/credits/credits.api.ts'
import { LettersApi } from '../domains/letters/letters.api.ts'
import { LettersFeature } from '../domains/letters/letters.feature.ts'
import type { TDocumentReader, TLetterRequest } from '../domains/letters/types.ts'
import type { TApiResult } from '../types/api.ts'

export type TAgenticLettersOptions = {
  /** Bearer credential for the API. */
  apiKey: string
  /** API base URL. Defaults to https://agentic-letters.com/api */
  baseUrl?: string
  /** Per-request timeout. Defaults to 60 seconds. */
  timeoutInMilliseconds?: number
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
  /** Optional filesystem access for testing */
  documentReader?: TDocumentReader
}

/**
 * Public surface for the AgenticLetters API.
 * Each call makes at most one request and resolves to a result; nothing throws for
 * local, network or server failures.
 */
export class AgenticLetters {
  private lettersApi: LettersApi
  private lettersFeature: LettersFeature
  private creditsApi: CreditsApi

  constructor(options: TAgenticLettersOptions) {
    const baseUrl: string = options.baseUrl ?? DEFAULT_API_BASE
    validateRequiredStrings({ apiKey: options.apiKey, baseUrl }, ['apiKey', 'baseUrl'])

    const transport = new Transport({
      baseUrl,
      apiKey: options.apiKey,
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      fetchImplementation: options.fetchImplementation,
    })

    this.lettersApi = new LettersApi({ transport })
    this.lettersFeature = new LettersFeature({
      api: this.lettersApi,
      documentReader: options.documentReader,
    })
    this.creditsApi = new CreditsApi({ transport })
  }

  /** Reads and encodes the document, then submits the letter. */
  public async sendLetter(request: TLetterRequest): Promise<TResult<TApiResult>> {
    return await this.lettersFeature.sendLetter(request)
  }

  /** Returns the current status of one letter. */
  public async getLetter(letterId: string): Promise<TResult<TApiResult>> {
    return await this.lettersApi.getLetter(letterId)
  }

  public async listLetters(): Promise<TResult<TApiResult>> {
    return await this.lettersApi.listLetters()
  }

  /** Returns the remaining credit balance. */
  public async getCredits(): Promise<TResult<TApiResult>> {
    return await this.creditsApi.getCredits()
  }
}
