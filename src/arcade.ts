import { findGame, launch, runMenu } from "./menu.ts"
import { RED, paint } from "./style.ts"
import { TerminalClosedError } from "./terminal.ts"
import type { Game, GameContext } from "./types.ts"

/**
 * Runs the game named in the config, or the menu when none is. Resolves with
 * the process exit code.
 */
export async function startArcade(ctx: GameContext, games: readonly Game[]) {
  const { config, logger, terminal } = ctx

  try {
    if (config.game === undefined) {
      await runMenu(ctx, games)
      return 0
    }

    const game = findGame(games, config.game)
    if (!game) {
      const known = games.map((g) => g.slug).join(", ")
      terminal.print(
        paint(`Unknown game "${config.game}". Choose one of: ${known}`, RED),
      )
      return 1
    }
    return (await launch(ctx, game)) ? 0 : 1
  } catch (error) {
    if (error instanceof TerminalClosedError) {
      logger.info("Input closed")
      terminal.print("")
      return 0
    }
    throw error
  }
}
