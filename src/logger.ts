import pino from "pino"
import type { Logger } from "pino"

import { ConfigError } from "./config.ts"
import type { Config } from "./config.ts"

export type { Logger }

function openDestination(logFile: string | undefined) {
  try {
    return pino.destination({ dest: logFile ?? 2, sync: true })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Cannot open log file ${logFile}: ${reason}`)
  }
}

/**
 * Logs go to stderr, or to `LOG_FILE`, so they never interleave with the
 * game screen on stdout. A log file that cannot be opened is a `ConfigError`.
 */
export function createLogger(
  config: Pick<Config, "logLevel" | "logFile">,
): Logger {
  return pino(
    { name: "arcade", level: config.logLevel },
    openDestination(config.logFile),
  )
}
