import { BOLD, CYAN, GREEN, RED, RESET, YELLOW, paint } from "../style.ts"
import { waitForEnter } from "../terminal.ts"
import type { Key } from "../terminal.ts"
import type { Game } from "../types.ts"
import { COLS, ROWS, isDirection, newSnake, step, turn } from "./game.ts"
import type { Direction, SnakeState } from "./game.ts"

export const FRAME_MS = 90

const BANNER = paint(
  [
    "╔════════════════════════════════════════╗",
    `║         ${CYAN}★  S N A K E  ★${GREEN}          ║`,
    "╚════════════════════════════════════════╝",
  ].join("\n"),
  GREEN,
  BOLD,
)

export function renderSnake(state: SnakeState) {
  const grid = Array.from({ length: ROWS }, () => Array<string>(COLS).fill(" "))
  if (state.food) {
    const row = grid[state.food.row]
    if (row) row[state.food.col] = paint("◆", RED)
  }
  state.body.forEach(({ row, col }, i) => {
    const cells = grid[row]
    if (!cells) return
    const head = i === state.body.length - 1
    cells[col] = head ? paint("■", YELLOW, BOLD) : paint("■", GREEN)
  })

  const edge = "═".repeat(COLS)
  return [
    paint(`╔${edge}╗`, GREEN),
    ...grid.map(
      (cells) => `${GREEN}║${RESET}${cells.join("")}${GREEN}║${RESET}`,
    ),
    paint(`╚${edge}╝`, GREEN),
    paint(`Score: ${state.score}`, CYAN),
  ].join("\n")
}

type Input = { quit: boolean; direction: Direction | undefined }

function readKey(input: Input, key: Key) {
  if (
    key.name === "escape" ||
    key.sequence === "\u001b" ||
    (key.ctrl && key.name === "c")
  ) {
    input.quit = true
  } else if (isDirection(key.name)) {
    input.direction = key.name
  }
}

export const snake: Game = {
  slug: "snake",
  title: "Snake",
  async run(ctx) {
    const { terminal, random } = ctx
    const logger = ctx.logger.child({ game: "snake" })

    let state = newSnake(random)
    const input: Input = { quit: false, direction: undefined }
    const release = terminal.captureKeys((key) => readKey(input, key))

    try {
      for (;;) {
        terminal.clear()
        terminal.print(
          BANNER,
          renderSnake(state),
          paint("← ↑ ↓ →  steer   Esc  quit", YELLOW),
        )
        await terminal.pause(FRAME_MS)

        if (input.quit) break
        if (input.direction) {
          state = turn(state, input.direction)
          input.direction = undefined
        }
        state = step(state, random)
        if (state.over) break
      }
    } finally {
      release()
    }

    logger.info({ score: state.score, quit: input.quit }, "Snake finished")
    if (input.quit) return

    terminal.clear()
    terminal.print(
      BANNER,
      "",
      paint(`GAME OVER!  Score: ${state.score}`, YELLOW, BOLD),
    )
    await waitForEnter(terminal, "Press Enter to return to menu...")
  },
}
