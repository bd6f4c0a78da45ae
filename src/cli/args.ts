import { parseArgs } from 'util'
import { localError } from '../core/errors.ts'
import { err, ok, type TResult } from '../core/types.ts'
import { DEFAULT_COUNTRY, DEFAULT_LETTER_TYPE, type TLetterRequest } from '../domains/letters/types.ts'

export const USAGE = `Usage: agentic-letters <command> [options]

Send physical letters via the AgenticLetters API.

Commands:
  send      Send a letter
              --pdf <path>       Path to the PDF file (required)
              --name <name>      Recipient full name (required)
              --street <street>  Recipient street and number (required)
              --zip <zip>        Recipient postal code (required)
              --city <city>      Recipient city (required)
              --country <code>   Recipient country code (default: ${DEFAULT_COUNTRY})
              --type <type>      Letter type (default: ${DEFAULT_LETTER_TYPE})
              --label <label>    Optional label for your reference
  status    Check letter status: status <id>
  list      List all letters
  credits   Check remaining credits

Environment:
  AGENTIC_LETTERS_API_KEY   API key (otherwise read from ~/.openclaw/secrets/agentic_letters.env)
  AGENTIC_LETTERS_API_BASE  Override the API base URL
  AGENTIC_LETTERS_DEBUG     Set to 1 to log requests to stderr`

export type TCommand =
  | { name: 'send'; request: TLetterRequest }
  | { name: 'status'; letterId: string }
  | { name: 'list' }
  | { name: 'credits' }
  // requested is false when no command was given at all
  | { name: 'help'; requested: boolean }

const SEND_OPTIONS = {
  pdf: { type: 'string' },
  name: { type: 'string' },
  street: { type: 'string' },
  zip: { type: 'string' },
  city: { type: 'string' },
  country: { type: 'string' },
  type: { type: 'string' },
  label: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const

const HELP_OPTION = {
  help: { type: 'boolean', short: 'h' },
} as const

export function parseCommand(argv: string[]): TResult<TCommand> {
  const [commandName, ...rest] = argv

  switch (commandName) {
    case undefined:
      return ok({ name: 'help', requested: false })
    case '--help':
    case '-h':
    case 'help':
      return ok({ name: 'help', requested: true })
    case 'send':
      return parseSend(rest)
    case 'status':
      return parseStatus(rest)
    case 'list':
    case 'credits':
      return parseBare(commandName, rest)
    default:
      return err(
        localError(`Unknown command: ${commandName}`, {
          detail: 'Expected one of: send, status, list, credits',
        }),
      )
  }
}

function parseSend(args: string[]): TResult<TCommand> {
  let values: ReturnType<typeof parseSendArgs>['values']
  try {
    values = parseSendArgs(args).values
  } catch (caughtError) {
    return err(invalidArguments(caughtError))
  }

  if (values.help) return ok({ name: 'help', requested: true })

  const { pdf, name, street, zip, city } = values
  if (pdf === undefined) return missingOption('pdf')
  if (name === undefined) return missingOption('name')
  if (street === undefined) return missingOption('street')
  if (zip === undefined) return missingOption('zip')
  if (city === undefined) return missingOption('city')

  return ok({
    name: 'send',
    request: {
      pdfPath: pdf,
      name,
      street,
      zip,
      city,
      country: values.country,
      type: values.type,
      label: values.label,
    },
  })
}

function parseStatus(args: string[]): TResult<TCommand> {
  let parsed: ReturnType<typeof parseHelpOnlyArgs>
  try {
    parsed = parseHelpOnlyArgs(args)
  } catch (caughtError) {
    return err(invalidArguments(caughtError))
  }

  if (parsed.values.help) return ok({ name: 'help', requested: true })

  const [letterId, ...extra] = parsed.positionals
  if (letterId === undefined) {
    return err(localError('Missing required argument <id>', { field: 'id' }))
  }
  if (extra.length > 0) {
    return err(localError(`Unexpected argument: ${extra.join(' ')}`))
  }
  return ok({ name: 'status', letterId })
}

function parseBare(commandName: 'list' | 'credits', args: string[]): TResult<TCommand> {
  let parsed: ReturnType<typeof parseHelpOnlyArgs>
  try {
    parsed = parseHelpOnlyArgs(args)
  } catch (caughtError) {
    return err(invalidArguments(caughtError))
  }

  if (parsed.values.help) return ok({ name: 'help', requested: true })
  if (parsed.positionals.length > 0) {
    return err(localError(`Unexpected argument: ${parsed.positionals.join(' ')}`))
  }
  return ok({ name: commandName })
}

function parseSendArgs(args: string[]) {
  return parseArgs({ args, options: SEND_OPTIONS, strict: true, allowPositionals: false })
}

function parseHelpOnlyArgs(args: string[]) {
  return parseArgs({ args, options: HELP_OPTION, strict: true, allowPositionals: true })
}

function missingOption(option: string): TResult<TCommand> {
  return err(localError(`Missing required option --${option}`, { field: option }))
}

function invalidArguments(caughtError: unknown) {
  return localError('Invalid arguments', {
    detail: caughtError instanceof Error ? caughtError.message : String(caughtError),
  })
}
