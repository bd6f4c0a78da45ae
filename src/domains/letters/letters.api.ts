import { Transport } from '../../core/transport.ts'
import type { TResult } from '../../core/types.ts'
import type { TApiResult, TSendLetterPayload } from '../../types/api.ts'

export type TLettersApiOptions = {
  transport: Transport
}

/** Thin HTTP client over the letters endpoints. No validation or extra logic. */
export interface TLettersApi {
  createLetter(payload: TSendLetterPayload): Promise<TResult<TApiResult>>
  getLetter(letterId: string): Promise<TResult<TApiResult>>
  listLetters(): Promise<TResult<TApiResult>>
}

export class LettersApi implements TLettersApi {
  private transport: Transport

  constructor(options: TLettersApiOptions) {
    this.transport = options.transport
  }

  public async createLetter(payload: TSendLetterPayload): Promise<TResult<TApiResult>> {
    return await this.transport.request('POST', '/letters', { body: payload })
  }

  public async getLetter(letterId: string): Promise<TResult<TApiResult>> {
    return await this.transport.request('GET', `/letters/${encodeURIComponent(letterId)}`)
  }

  public async listLetters(): Promise<TResult<TApiResult>> {
    return await this.transport.request('GET', '/letters')
  }
}
