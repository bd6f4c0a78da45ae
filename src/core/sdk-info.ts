import pkg from '../../package.json'

export const CLIENT_NAME = 'agentic-letters-skill'
export const CLIENT_VERSION = pkg.version
export const USER_AGENT = `${CLIENT_NAME}/${CLIENT_VERSION}`

export const DEFAULT_API_BASE = 'https://agentic-letters.com/api'
export const DEFAULT_TIMEOUT_IN_MILLISECONDS = 60_000
