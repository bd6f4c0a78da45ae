#!/usr/bin/env node
import { logger } from '../core/logger.ts'
import { run } from './run.ts'

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((caughtError: unknown) => {
    logger.error('Unexpected failure', caughtError)
    process.exitCode = 1
  })
