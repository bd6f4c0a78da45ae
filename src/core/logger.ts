const PREFIX = '[agentic-letters]'

function isDebugEnabled(): boolean {
  const flag = process.env.AGENTIC_LETTERS_DEBUG?.toLowerCase()
  return flag === '1' || flag === 'true'
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (!isDebugEnabled()) return
    console.error(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(PREFIX, message, ...args)
  },
}
