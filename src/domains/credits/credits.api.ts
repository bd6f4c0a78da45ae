import { Transport } from '../../core/transport.ts'
import type { TResult } from '../../core/types.ts'
import type { TApiResult } from '../../types/api.ts'

export type TCreditsApiOptions = {
  transport: Transport
}

export interface TCreditsApi {
  getCredits(): Promise<TResult<TApiResult>>
}

export class CreditsApi implements TCreditsApi {
  private transport: Transport

  constructor(options: TCreditsApiOptions) {
    this.transport = options.transport
  }

  public async getCredits(): Promise<TResult<TApiResult>> {
    return await this.transport.request('GET', '/credits')
  }
}
