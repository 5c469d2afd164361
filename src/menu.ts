import { BOLD, CYAN, GREEN, YELLOW, paint } from "./style.ts"
import { TerminalClosedError, waitForEnter } from "./terminal.ts"
import type { Game, GameContext } from "./types.ts"

const LOGO = [
  "╔════════════════════════════════════════╗",
  "║                                        ║",
  "║    T E R M I N A L   A R C A D E       ║",
  "║                                        ║",
  "╚════════════════════════════════════════╝",
]

export function findGame(games: readonly Game[], slug: string) {
  return games.find((game) => game.slug === slug)
}

/**
 * Runs `game`, reporting a failure instead of letting it end the arcade.
 * Closed input is not a failure and still propagates.
 */
export async function launch(ctx: GameContext, game: Game) {
  const logger = ctx.logger.child({ game: game.slug })
  logger.info("Launching game")

  try {
    await game.run(ctx)
    logger.info("Game finished")
    return true
  } catch (error) {
    if (error instanceof TerminalClosedError) throw error

    logger.error({ error }, "Game crashed")
    ctx.terminal.print(
      paint(`Error launching ${game.title}:`, YELLOW),
      error instanceof Error
        ? `${error.name}: ${error.message}`
        : String(error),
    )
    await waitForEnter(ctx.terminal)
    return false
  }
}

function drawMenu(ctx: GameContext, games: readonly Game[]) {
  const { terminal } = ctx
  terminal.clear()
  terminal.print(paint(LOGO.join("\n"), GREEN, BOLD), "")
  terminal.print(
    ...games.map((game, i) =>
      paint(`   ${i + 1}. ${game.title}`, i % 2 === 0 ? CYAN : GREEN),
    ),
    "   0. Exit",
    "",
  )
}

/** The menu holds no game logic: it maps a number to a game and runs it. */
export async function runMenu(ctx: GameContext, games: readonly Game[]) {
  for (;;) {
    drawMenu(ctx, games)
    const prompt = paint(`Select a game (0-${games.length}): `, BOLD)
    const choice = (await ctx.terminal.question(prompt)).trim()

    if (!/^\d+$/.test(choice)) continue

    const idx = Number(choice)
    if (idx === 0) {
      ctx.terminal.clear()
      ctx.terminal.print(paint("See you next time!", YELLOW, BOLD))
      return
    }

    const game = games[idx - 1]
    if (game) await launch(ctx, game)
  }
}
