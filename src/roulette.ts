import { randomInt } from "./random.ts"
import type { Random } from "./random.ts"
import { BOLD, CYAN, GREEN, RED, YELLOW, paint } from "./style.ts"
import { isEscape, waitForEnter } from "./terminal.ts"
import type { Terminal } from "./terminal.ts"
import type { Game } from "./types.ts"

export const MIN_BET = 10
export const PAYOUT = 35
export const POCKETS = 37
const SPIN_MS = 1000

export type Colour = "green" | "red" | "black"
export type Bet = { amount: number; number: number }

export function colourOf(pocket: number): Colour {
  if (pocket === 0) return "green"
  return pocket % 2 === 1 ? "red" : "black"
}

/** Balance change for `bet` when the ball lands on `pocket`. */
export function settleSpin(bet: Bet, pocket: number) {
  return bet.number === pocket ? bet.amount * PAYOUT : -bet.amount
}

export function spin(random: Random) {
  return randomInt(random, 0, POCKETS - 1)
}

function parseWhole(input: string) {
  const trimmed = input.trim()
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : undefined
}

const COLOUR_CODES: Record<Colour, string> = {
  green: GREEN,
  red: RED,
  black: BOLD,
}

/**
 * Asks until `check` accepts a whole number. `check` returns an error to show,
 * or nothing when the value is fine. Resolves undefined on `esc`.
 */
async function askWhole(
  terminal: Terminal,
  prompt: string,
  check: (n: number) => string | undefined,
) {
  for (;;) {
    const raw = await terminal.question(prompt)
    if (isEscape(raw)) return undefined
    const n = parseWhole(raw)
    const error = n === undefined ? "Please enter a valid number." : check(n)
    if (n !== undefined && error === undefined) return n
    terminal.print(paint(error ?? "", YELLOW))
  }
}

async function goodbye(terminal: Terminal) {
  terminal.print(paint("Thanks for playing!", CYAN, BOLD))
  await waitForEnter(terminal)
}

export const roulette: Game = {
  slug: "roulette",
  title: "Roulette",
  async run(ctx) {
    const { terminal, random } = ctx
    const logger = ctx.logger.child({ game: "roulette" })

    terminal.clear()
    terminal.print(paint("🎰 Welcome to Terminal Roulette!", GREEN, BOLD))

    const start = await askWhole(
      terminal,
      "How many coins would you like to start with? ",
      (n) => {
        if (n >= MIN_BET) return undefined
        return `Please start with at least ${MIN_BET} coins.`
      },
    )
    if (start === undefined) return

    let balance = start
    for (;;) {
      while (balance < MIN_BET) {
        terminal.print("", `You have only ${balance} coins.`)
        const buy = (
          await terminal.question("Would you like to buy more coins? (y/n): ")
        )
          .trim()
          .toLowerCase()
        if (buy !== "y") return goodbye(terminal)

        const add = parseWhole(
          await terminal.question(
            "How many coins would you like to purchase? ",
          ),
        )
        if (add === undefined) {
          terminal.print(paint("Please enter a valid number.", YELLOW))
        } else if (add <= 0) {
          terminal.print(paint("Invalid amount.", YELLOW))
        } else {
          balance += add
          terminal.print(`New balance: ${balance} coins.`)
        }
      }

      const available = balance
      const amount = await askWhole(
        terminal,
        `\nEnter your bet amount (min ${MIN_BET} coins): `,
        (n) => {
          if (n < MIN_BET) return `The minimum bet is ${MIN_BET} coins.`
          if (n > available) return "You don't have enough coins for that bet."
          return undefined
        },
      )
      if (amount === undefined) return

      const number = await askWhole(terminal, "Bet on a number (0–36): ", (n) =>
        n >= 0 && n < POCKETS ? undefined : "Choose a number between 0 and 36.",
      )
      if (number === undefined) return

      terminal.print(paint("Spinning...", CYAN))
      await terminal.pause(SPIN_MS)
      const pocket = spin(random)
      const colour = colourOf(pocket)
      const delta = settleSpin({ amount, number }, pocket)
      balance += delta
      logger.info({ amount, number, pocket, balance }, "Wheel spun")

      const result =
        delta > 0
          ? paint(
              `You won! Number: ${pocket}, Winnings: ${delta} coins.`,
              GREEN,
            )
          : paint(`You lost. Number: ${pocket}. You lost ${amount} coins.`, RED)
      terminal.print(
        paint(`Last Result: ${pocket} (${colour})`, COLOUR_CODES[colour], BOLD),
        result,
        "",
        `Your balance: ${balance} coins`,
      )

      for (;;) {
        const again = (await terminal.question("\nPlay again? (y/n): "))
          .trim()
          .toLowerCase()
        if (again === "y") break
        if (again === "n" || isEscape(again)) return goodbye(terminal)
        terminal.print("Please enter 'y' or 'n'.")
      }
    }
  },
}
