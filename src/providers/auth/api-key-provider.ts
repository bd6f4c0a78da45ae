import { parse } from 'dotenv'
import { readFile } from 'fs/promises'
import { homedir } from 'os'
import { join } from 'path'
import { localError } from '../../core/errors.ts'
import { logger } from '../../core/logger.ts'
import { err, ok, type TResult, type TTokenProvider } from '../../core/types.ts'

export const API_KEY_ENV_VAR = 'AGENTIC_LETTERS_API_KEY'
export const DEFAULT_SECRETS_FILE = join(homedir(), '.openclaw', 'secrets', 'agentic_letters.env')
export const SIGNUP_URL = 'https://agentic-letters.com/buy'

export type TApiKeyProviderOptions = {
  env?: NodeJS.ProcessEnv
  secretsFilePath?: string
}

/**
 * Looks up the API key in the environment first, then in the per-user secrets file
 * (dotenv syntax, value optionally quoted).
 */
export class ApiKeyProvider implements TTokenProvider {
  private env: NodeJS.ProcessEnv
  private secretsFilePath: string

  constructor(options?: TApiKeyProviderOptions) {
    this.env = options?.env ?? process.env
    this.secretsFilePath = options?.secretsFilePath ?? DEFAULT_SECRETS_FILE
  }

  async getToken(): Promise<TResult<string>> {
    const fromEnvironment = this.env[API_KEY_ENV_VAR]?.trim()
    if (fromEnvironment) return ok(fromEnvironment)

    const fromSecretsFile = await this.readSecretsFile()
    if (fromSecretsFile) return ok(fromSecretsFile)

    return err(
      localError('No API key found', {
        detail: `Set ${API_KEY_ENV_VAR} in environment or in ${this.secretsFilePath}. Get a key at ${SIGNUP_URL}`,
      }),
    )
  }

  private async readSecretsFile(): Promise<string | undefined> {
    let contents: string
    try {
      contents = await readFile(this.secretsFilePath, 'utf8')
    } catch (caughtError) {
      if (!isMissingFile(caughtError)) {
        logger.warn(`Ignoring unreadable secrets file ${this.secretsFilePath}:`, caughtError)
      }
      return undefined
    }

    const value = parse(contents)[API_KEY_ENV_VAR]?.trim()
    return value || undefined
  }
}

function isMissingFile(caughtError: unknown): boolean {
  return (
    caughtError instanceof Error &&
    'code' in caughtError &&
    (caughtError.code === 'ENOENT' || caughtError.code === 'ENOTDIR')
  )
}
