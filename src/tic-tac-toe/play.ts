import type { Logger } from "../logger.ts"
import { BOLD, CYAN, GREEN, YELLOW, center, paint } from "../style.ts"
import { isEscape, waitForEnter } from "../terminal.ts"
import type { Terminal } from "../terminal.ts"
import type { Game, GameContext } from "../types.ts"
import { selectMove } from "./ai.ts"
import {
  InvalidMoveError,
  moveAt,
  newGame,
  playMove,
} from "./game.ts"
import type { Board, GameState, Mark, Move, TerminalResult } from "./game.ts"

const AI_DELAY_MS = 500
const ROUND_END_MS = 1000
const INVALID_CHOICE_MS = 1000

type Mode = "ai" | "pass-and-play"

type Seat = { name: string; ai: boolean }

type Session = {
  seats: Record<Mark, Seat>
  score: Record<Mark, number>
  showNumbers: boolean
  noise: number
}

export function renderBoard(board: Board, showNumbers = false) {
  return [0, 1, 2]
    .map(
      (row) =>
        ` ${[0, 1, 2]
          .map((col) => {
            const i = row * 3 + col
            return board[i] || (showNumbers ? String(i) : " ")
          })
          .join(" | ")} `,
    )
    .join("\n---+---+---\n")
}

/** Accepts a board index `0`-`8` or a `row col` pair. */
export function parseMove(input: string): Move {
  const parts = input.trim().split(/\s+/)
  if (parts.length > 2 || parts[0] === "") {
    throw new InvalidMoveError("Enter a cell 0-8, or as: row col (0..2)")
  }
  if (!parts.every((p) => /^-?\d+$/.test(p))) {
    throw new InvalidMoveError("Invalid numbers")
  }

  const [first, second] = parts.map(Number)
  if (first === undefined) throw new InvalidMoveError("Invalid numbers")
  if (second === undefined) {
    if (first < 0 || first > 8) throw new InvalidMoveError("Out of bounds")
    return first
  }
  return moveAt(first, second)
}

function resultBanner(result: TerminalResult, seats: Record<Mark, Seat>) {
  switch (result) {
    case "x_wins":
      return `${seats.X.name} wins!`

    case "o_wins":
      return `${seats.O.name} wins!`

    case "draw":
      return "It's a tie!"
  }
}

function render(terminal: Terminal, board: Board, session: Session) {
  const { seats, score } = session
  const width = terminal.columns

  terminal.clear()
  terminal.print(
    center(`${seats.X.name} (X) vs ${seats.O.name} (O)`, width).trimEnd(),
    `Score: ${seats.X.name} ${score.X} - ${score.O} ${seats.O.name}`.padStart(
      width,
    ),
    "",
    renderBoard(board, session.showNumbers),
    "",
    paint("Type 'esc' to return to menu at any time.", CYAN),
  )
}

/** Prompts until a legal move is entered; `undefined` means the player left. */
async function humanTurn(
  terminal: Terminal,
  state: GameState,
  player: Mark,
  seat: Seat,
) {
  for (;;) {
    const input = await terminal.question(
      `${seat.name} (${player}), enter your move (0-8 or row col): `,
    )
    if (isEscape(input)) return undefined

    try {
      return playMove(state, parseMove(input))
    } catch (error) {
      if (!(error instanceof InvalidMoveError)) throw error
      terminal.print(paint(error.message, YELLOW))
    }
  }
}

/**
 * Plays one game from an empty board to a terminal result. Returns `quit`
 * when a human typed `esc`.
 */
async function playRound(
  ctx: GameContext,
  session: Session,
  logger: Logger,
): Promise<TerminalResult | "quit"> {
  const { terminal, random } = ctx
  let state = newGame()
  render(terminal, state.board, session)

  for (;;) {
    const phase = state.phase
    if (phase.status === "terminal") {
      const banner = resultBanner(phase.result, session.seats)
      terminal.print(paint(banner, BOLD, GREEN))
      logger.info({ result: phase.result }, "Round finished")
      return phase.result
    }

    const seat = session.seats[phase.player]
    if (seat.ai) {
      await terminal.pause(AI_DELAY_MS)
      const move = selectMove(state.board, phase.player, session.noise, random)
      logger.debug({ player: phase.player, move }, "AI move")
      state = playMove(state, move)
    } else {
      const next = await humanTurn(terminal, state, phase.player, seat)
      if (!next) return "quit"
      state = next
    }

    render(terminal, state.board, session)
  }
}

async function askName(terminal: Terminal, prompt: string, fallback: string) {
  const name = (await terminal.question(prompt)).trim()
  if (isEscape(name)) return undefined
  return name || fallback
}

async function askNumberedGrid(terminal: Terminal) {
  for (;;) {
    const answer = (await terminal.question("Numbered grid? (y/n): "))
      .trim()
      .toLowerCase()
    if (isEscape(answer)) return undefined
    if (answer === "y" || answer === "n") return answer === "y"
  }
}

async function askRounds(terminal: Terminal, name: string) {
  for (;;) {
    const reply = await terminal.question(`${name}, how many rounds? `)
    const answer = reply.trim()
    if (isEscape(answer)) return undefined
    if (/^\d+$/.test(answer) && Number(answer) > 0) return Number(answer)
  }
}

async function playSession(ctx: GameContext, mode: Mode) {
  const { terminal, config } = ctx
  const logger = ctx.logger.child({ game: "tic-tac-toe", mode })

  terminal.clear()
  let seats: Record<Mark, Seat>
  if (mode === "ai") {
    const name = await askName(terminal, "Enter your name: ", "Player 1")
    if (name === undefined) return
    seats = { X: { name, ai: false }, O: { name: "AI", ai: true } }
  } else {
    const first = await askName(terminal, "Player 1 name: ", "Player 1")
    if (first === undefined) return
    const second = await askName(terminal, "Player 2 name: ", "Player 2")
    if (second === undefined) return
    seats = { X: { name: first, ai: false }, O: { name: second, ai: false } }
  }

  const showNumbers = await askNumberedGrid(terminal)
  if (showNumbers === undefined) return
  const rounds = await askRounds(terminal, seats.X.name)
  if (rounds === undefined) return

  const session: Session = {
    seats,
    score: { X: 0, O: 0 },
    showNumbers,
    noise: config.noise,
  }
  logger.info({ rounds, noise: session.noise }, "Session started")

  for (let round = 1; round <= rounds; round++) {
    const result = await playRound(ctx, session, logger)
    if (result === "quit") {
      logger.info({ round }, "Session abandoned")
      return
    }
    if (result === "x_wins") session.score.X++
    if (result === "o_wins") session.score.O++
    await terminal.pause(ROUND_END_MS)
  }

  const { X, O } = session.score
  const verdict =
    X > O ? `${seats.X.name} wins!` : X < O ? `${seats.O.name} wins!` : "Draw!"
  terminal.clear()
  terminal.print(
    `Final: ${seats.X.name} ${X} - ${O} ${seats.O.name}`,
    paint(verdict, BOLD, GREEN),
  )
  await waitForEnter(terminal, "Enter to menu...")
}

async function chooseMode(terminal: Terminal): Promise<Mode | undefined> {
  for (;;) {
    terminal.clear()
    terminal.print(
      "=".repeat(50),
      center(paint(" TIC-TAC-TOE TERMINAL EDITION ", BOLD), 50).trimEnd(),
      "=".repeat(50),
      "1. Single Player",
      "2. Pass & Play",
      "3. Back to menu",
      "esc to menu.",
    )

    const choice = (await terminal.question("Choice: ")).trim()
    if (choice === "1") return "ai"
    if (choice === "2") return "pass-and-play"
    if (choice === "3" || isEscape(choice)) return undefined
    await terminal.pause(INVALID_CHOICE_MS)
  }
}

export const ticTacToe: Game = {
  slug: "tic-tac-toe",
  title: "Tic-Tac-Toe",
  async run(ctx) {
    if (ctx.config.mode) {
      await playSession(ctx, ctx.config.mode)
      return
    }

    for (;;) {
      const mode = await chooseMode(ctx.terminal)
      if (!mode) return
      await playSession(ctx, mode)
    }
  },
}
