import type { Config } from "./config.ts"
import type { Logger } from "./logger.ts"
import type { Random } from "./random.ts"
import type { Terminal } from "./terminal.ts"

export type GameContext = {
  terminal: Terminal
  logger: Logger
  random: Random
  config: Config
}

/** One menu entry. Games share nothing but the context they are run with. */
export interface Game {
  slug: string
  title: string
  run(ctx: GameContext): Promise<void>
}
