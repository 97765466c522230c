import type { Configuration } from '@shared/types'
import { isLogLevel, log } from '@shared/logger'
import dotenv from 'dotenv'
import { DEFAULT_REMOTE } from '../shared/constants'

export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  if (env === process.env) {
    dotenv.config({ quiet: true })
  }

  const requestedLevel = env.RESTACK_LOG_LEVEL?.toLowerCase()
  let logLevel: Configuration['logLevel'] = 'info'
  if (requestedLevel) {
    if (isLogLevel(requestedLevel)) {
      logLevel = requestedLevel
    } else {
      log.warn(`Ignoring unknown RESTACK_LOG_LEVEL '${requestedLevel}'`)
    }
  }

  return {
    repoPath: env.RESTACK_REPO_PATH || process.cwd(),
    logLevel,
    remote: env.RESTACK_REMOTE || DEFAULT_REMOTE
  }
}
