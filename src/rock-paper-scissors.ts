import { pick } from "./random.ts"
import { BOLD, CYAN, GREEN, MAGENTA, RED, YELLOW, paint } from "./style.ts"
import { isEscape, waitForEnter } from "./terminal.ts"
import type { Terminal } from "./terminal.ts"
import type { Game } from "./types.ts"

export const ROUNDS = 5
const COUNTDOWN_MS = 1000
const REVEAL_MS = 1000

export type Choice = "rock" | "paper" | "scissors"
export type RoundWinner = "user" | "computer" | "tie"

export const CHOICES: readonly Choice[] = ["rock", "paper", "scissors"]

const BEATS: Record<Choice, Choice> = {
  rock: "scissors",
  scissors: "paper",
  paper: "rock",
}

const TITLE = [
  "╔══════════════════════════════════════════════════════════╗",
  "║  R  O  C  K     P  A  P  E  R    S  C  I  S  S  O  R  S  ║",
  "╚══════════════════════════════════════════════════════════╝",
].join("\n")

const ART: Record<Choice, string> = {
  rock: [
    "    _______",
    "---'   ____)",
    "      (_____)",
    "      (_____)",
    "      (____)",
    "---.__(___)",
  ].join("\n"),
  paper: [
    "     _______",
    "---'    ____)____",
    "           ______)",
    "          _______)",
    "         _______)",
    "---.__________)",
  ].join("\n"),
  scissors: [
    "    _______",
    "---'   ____)____",
    "          ______)",
    "       __________)",
    "      (____)",
    "---.__(___)",
  ].join("\n"),
}

export function decideWinner(user: Choice, computer: Choice): RoundWinner {
  if (user === computer) return "tie"
  return BEATS[user] === computer ? "user" : "computer"
}

export function parseChoice(input: string): Choice | undefined {
  switch (input.trim().toLowerCase()) {
    case "r":
    case "rock":
      return "rock"

    case "p":
    case "paper":
      return "paper"

    case "s":
    case "scissors":
      return "scissors"

    default:
      return undefined
  }
}

function header(
  terminal: Terminal,
  name: string,
  user: number,
  computer: number,
) {
  terminal.clear()
  terminal.print(
    paint(TITLE, GREEN, BOLD),
    paint(`${name}: ${user}   AI: ${computer}`, MAGENTA, BOLD),
    "",
  )
}

export const rockPaperScissors: Game = {
  slug: "rock-paper-scissors",
  title: "Rock Paper Scissors",
  async run(ctx) {
    const { terminal, random } = ctx
    const logger = ctx.logger.child({ game: "rock-paper-scissors" })

    header(terminal, "…", 0, 0)
    const entered = (
      await terminal.question(paint("Enter your name: ", MAGENTA, BOLD))
    ).trim()
    if (isEscape(entered)) return
    const name = entered || "Player"

    const needed = Math.floor(ROUNDS / 2) + 1
    let user = 0
    let computer = 0

    for (let round = 1; round <= ROUNDS; round++) {
      header(terminal, name, user, computer)
      terminal.print(paint(`Round ${round} of ${ROUNDS}`, YELLOW, BOLD))

      let choice: Choice | undefined
      while (!choice) {
        const input = await terminal.question(
          paint(
            `${name}, choose Rock (r), Paper (p) or Scissors (s): `,
            MAGENTA,
          ),
        )
        if (isEscape(input)) return
        choice = parseChoice(input)
      }

      for (const n of [3, 2, 1]) {
        terminal.print(paint(`${n}...`, YELLOW, BOLD))
        await terminal.pause(COUNTDOWN_MS)
      }

      const comp = pick(random, CHOICES)
      header(terminal, name, user, computer)
      terminal.print(
        paint(`${name} chose: ${choice.toUpperCase()}`, CYAN, BOLD),
        paint(ART[choice], CYAN),
        "",
        paint("VERSUS", YELLOW, BOLD),
        "",
        paint(`Computer chose: ${comp.toUpperCase()}`, MAGENTA, BOLD),
        paint(ART[comp], MAGENTA),
        "",
      )
      await terminal.pause(REVEAL_MS)

      const winner = decideWinner(choice, comp)
      logger.debug({ round, choice, comp, winner }, "Round played")
      if (winner === "user") {
        user++
        terminal.print(paint("You win this round!", GREEN, BOLD))
      } else if (winner === "computer") {
        computer++
        terminal.print(paint("Computer wins this round!", RED, BOLD))
      } else {
        terminal.print(paint("It's a tie!", YELLOW, BOLD))
      }
      terminal.print(
        paint(`Score — ${name}: ${user}   AI: ${computer}`, MAGENTA, BOLD),
      )
      await terminal.question("Press Enter to continue…")

      if (user === needed || computer === needed) break
    }

    logger.info({ user, computer }, "Match finished")
    header(terminal, name, user, computer)
    if (user > computer) {
      terminal.print(paint("CONGRATULATIONS! You won the match!", GREEN, BOLD))
    } else if (computer > user) {
      terminal.print(paint("SORRY! The computer won the match.", RED, BOLD))
    } else {
      terminal.print(paint("IT'S A DRAW!", YELLOW, BOLD))
    }
    terminal.print(
      paint(`Final Score — ${name}: ${user}   AI: ${computer}`, MAGENTA, BOLD),
    )
    await waitForEnter(terminal)
  },
}
