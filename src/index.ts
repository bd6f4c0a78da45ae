// Main client
export { AgenticLetters } from './client/agentic-letters.ts'
export type { TAgenticLettersOptions } from './client/agentic-letters.ts'

// Providers - Authentication
export {
  ApiKeyProvider,
  API_KEY_ENV_VAR,
  DEFAULT_SECRETS_FILE,
} from './providers/auth/api-key-provider.ts'
export type { TApiKeyProviderOptions } from './providers/auth/api-key-provider.ts'

// Errors
export {
  ConfigurationError,
  formatError,
  localError,
  networkError,
  serverError,
} from './core/errors.ts'
export type {
  TErrorOrigin,
  TLetterError,
  TLocalError,
  TNetworkError,
  TServerError,
} from './core/errors.ts'

// Results
export { ok, err } from './core/types.ts'
export type { TResult, TTokenProvider } from './core/types.ts'

// CLI
export { run } from './cli/run.ts'
export type { TCliIo, TRunOptions } from './cli/run.ts'

// Types
export { DEFAULT_API_BASE, USER_AGENT } from './core/sdk-info.ts'
export { DEFAULT_COUNTRY, DEFAULT_LETTER_TYPE } from './domains/letters/types.ts'
export type { TDocumentReader, TLetterRequest } from './domains/letters/types.ts'
export type { TApiResult, TJsonValue, TRecipient, TSendLetterPayload } from './types/api.ts'
