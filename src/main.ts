import { startArcade } from "./arcade.ts"
import { ConfigError, loadConfig } from "./config.ts"
import type { Config } from "./config.ts"
import { GAMES } from "./games.ts"
import { createLogger } from "./logger.ts"
import type { Logger } from "./logger.ts"
import { seededRandom } from "./random.ts"
import { NodeTerminal } from "./terminal.ts"

let config: Config
let logger: Logger
try {
  config = loadConfig()
  logger = createLogger(config)
} catch (error) {
  if (!(error instanceof ConfigError)) throw error
  console.error(`Invalid configuration: ${error.message}`)
  process.exit(1)
}

const terminal = new NodeTerminal()
const random =
  config.seed === undefined ? Math.random : seededRandom(config.seed)

logger.debug({ config }, "Starting arcade")

try {
  process.exitCode = await startArcade(
    { terminal, logger, random, config },
    GAMES,
  )
} catch (error) {
  logger.fatal({ error }, "Arcade crashed")
  console.error(error instanceof Error ? error.message : String(error))
  process.exitCode = 1
} finally {
  terminal.close()
}
