import { localError } from '../core/errors.ts'
import { DEFAULT_API_BASE } from '../core/sdk-info.ts'
import { err, ok, type TResult } from '../core/types.ts'
import { describeBaseUrlProblem } from '../core/utils.ts'

export const API_BASE_ENV_VAR = 'AGENTIC_LETTERS_API_BASE'

export type TCliConfig = {
  apiBase: string
}

export function loadCliConfig(env: NodeJS.ProcessEnv): TResult<TCliConfig> {
  const apiBase: string = env[API_BASE_ENV_VAR]?.trim() || DEFAULT_API_BASE

  const problem = describeBaseUrlProblem(apiBase)
  if (problem) {
    return err(localError(`Invalid ${API_BASE_ENV_VAR}`, { detail: `${API_BASE_ENV_VAR} ${problem}` }))
  }

  return ok({ apiBase })
}
