import { AgenticLetters } from '../client/agentic-letters.ts'
import { formatError, type TLetterError } from '../core/errors.ts'
import type { TResult, TTokenProvider } from '../core/types.ts'
import { ApiKeyProvider } from '../providers/auth/api-key-provider.ts'
import type { TApiResult } from '../types/api.ts'
import { parseCommand, USAGE, type TCommand } from './args.ts'
import { loadCliConfig } from './config.ts'

export type TCliIo = {
  stdout(text: string): void
  stderr(text: string): void
}

export type TRunOptions = {
  env?: NodeJS.ProcessEnv
  io?: TCliIo
  tokenProvider?: TTokenProvider
  fetchImplementation?: typeof fetch
}

const processIo: TCliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}

/**
 * Runs one command end to end and returns the process exit status.
 * This is the only place a failure turns into a non-zero exit.
 */
export async function run(argv: string[], options: TRunOptions = {}): Promise<number> {
  const env: NodeJS.ProcessEnv = options.env ?? process.env
  const io: TCliIo = options.io ?? processIo

  const parsed = parseCommand(argv)
  if (!parsed.ok) return fail(io, parsed.error)

  const command: TCommand = parsed.value
  if (command.name === 'help') {
    if (command.requested) {
      io.stdout(`${USAGE}\n`)
      return 0
    }
    io.stderr(`${USAGE}\n`)
    return 1
  }

  const config = loadCliConfig(env)
  if (!config.ok) return fail(io, config.error)

  const tokenProvider: TTokenProvider = options.tokenProvider ?? new ApiKeyProvider({ env })
  const token = await tokenProvider.getToken()
  if (!token.ok) return fail(io, token.error)

  const client = new AgenticLetters({
    apiKey: token.value,
    baseUrl: config.value.apiBase,
    fetchImplementation: options.fetchImplementation,
  })

  const result = await execute(client, command)
  if (!result.ok) return fail(io, result.error)

  io.stdout(`${JSON.stringify(result.value, null, 2)}\n`)
  return 0
}

async function execute(
  client: AgenticLetters,
  command: Exclude<TCommand, { name: 'help' }>,
): Promise<TResult<TApiResult>> {
  switch (command.name) {
    case 'send':
      return await client.sendLetter(command.request)
    case 'status':
      return await client.getLetter(command.letterId)
    case 'list':
      return await client.listLetters()
    case 'credits':
      return await client.getCredits()
  }
}

function fail(io: TCliIo, error: TLetterError): number {
  io.stderr(`${formatError(error)}\n`)
  return 1
}
