import { randomInt } from "./random.ts"
import type { Random } from "./random.ts"
import { BOLD, CYAN, GREEN, MAGENTA, RED, YELLOW, paint } from "./style.ts"
import { isEscape, waitForEnter } from "./terminal.ts"
import type { Terminal } from "./terminal.ts"
import type { Game } from "./types.ts"

export const CODE_LENGTH = 4

const BANNER = [
  "╔════════════════════════════════════════╗",
  "║                                        ║",
  "║      M  A  S  T  E  R  M  I  N  D      ║",
  "║                                        ║",
  "╚════════════════════════════════════════╝",
].join("\n")

export type DigitRange = { min: number; max: number }

export function generateCode(
  random: Random,
  range: DigitRange,
  length = CODE_LENGTH,
) {
  return Array.from({ length }, () =>
    String(randomInt(random, range.min, range.max)),
  )
}

/**
 * Exact: right digit in the right place. Partial: right digit elsewhere,
 * each unmatched secret digit counted at most once.
 */
export function gradeGuess(
  secret: readonly string[],
  guess: readonly string[],
) {
  let exact = 0
  const restSecret: string[] = []
  const restGuess: string[] = []

  secret.forEach((s, i) => {
    if (s === guess[i]) exact++
    else {
      restSecret.push(s)
      restGuess.push(guess[i] ?? "")
    }
  })

  let partial = 0
  for (const g of restGuess) {
    const at = restSecret.indexOf(g)
    if (at !== -1) {
      partial++
      restSecret.splice(at, 1)
    }
  }

  return { exact, partial }
}

/** Returns the digits, or `undefined` if `raw` is not a valid guess. */
export function parseGuess(
  raw: string,
  range: DigitRange,
  length = CODE_LENGTH,
) {
  const digits = [...raw.trim()]
  if (digits.length !== length) return undefined
  if (!digits.every((d) => /^\d$/.test(d))) return undefined
  const inRange = (d: string) =>
    Number(d) >= range.min && Number(d) <= range.max
  if (!digits.every(inRange)) return undefined
  return digits
}

function printHeader(
  terminal: Terminal,
  player: string,
  attempt: number,
  max: number,
) {
  terminal.clear()
  terminal.print(
    paint(BANNER, GREEN, BOLD),
    `${paint(player, MAGENTA)}   ${paint("Round:", CYAN)} ${attempt}/${max}`,
    "",
  )
}

async function choose<T>(
  terminal: Terminal,
  title: string,
  options: readonly [string, T][],
): Promise<T | undefined> {
  terminal.clear()
  terminal.print(
    paint(BANNER, GREEN, BOLD),
    paint(title, CYAN),
    ...options.map(([label], i) => `  ${i + 1}) ${label}`),
  )
  for (;;) {
    const choice = (
      await terminal.question(paint(`Enter 1 or ${options.length}: `, MAGENTA))
    ).trim()
    if (isEscape(choice)) return undefined
    const option = options[Number(choice) - 1]
    if (/^\d+$/.test(choice) && option) return option[1]
    terminal.print(
      paint(`Invalid choice. Please enter 1 or ${options.length}.`, RED),
    )
  }
}

export const mastermind: Game = {
  slug: "mastermind",
  title: "Mastermind",
  async run(ctx) {
    const { terminal, random } = ctx
    const logger = ctx.logger.child({ game: "mastermind" })

    terminal.clear()
    terminal.print(paint(BANNER, GREEN, BOLD))
    const name = (
      await terminal.question(paint("Enter your name: ", MAGENTA))
    ).trim()
    if (isEscape(name)) return
    const player = name || "Player"

    const range = await choose<DigitRange>(terminal, "Select digit range:", [
      ["1–6", { min: 1, max: 6 }],
      ["0–9", { min: 0, max: 9 }],
    ])
    if (!range) return
    const maxTries = await choose(terminal, "Select difficulty:", [
      ["Easy   (10 attempts)", 10],
      ["Hard   (6 attempts)", 6],
    ])
    if (!maxTries) return

    const span = `${range.min}–${range.max}`
    printHeader(terminal, player, 0, maxTries)
    terminal.print(
      paint(`I've chosen a ${CODE_LENGTH}-digit code, digits ${span}.`, YELLOW),
      paint(`You have ${maxTries} attempts to crack it!`, YELLOW),
    )
    await terminal.question("\nPress ENTER to begin…")

    const secret = generateCode(random, range)
    logger.info({ range, maxTries }, "Code generated")

    for (let attempt = 1; attempt <= maxTries; attempt++) {
      printHeader(terminal, player, attempt, maxTries)

      let guess: string[] | undefined
      while (!guess) {
        const raw = await terminal.question(
          paint(
            `Attempt ${attempt}/${maxTries}, ` +
              `enter ${CODE_LENGTH} digits (${span}): `,
            CYAN,
          ),
        )
        if (isEscape(raw)) return
        guess = parseGuess(raw, range)
        if (!guess) {
          const { min, max } = range
          const need = `${CODE_LENGTH} digits between ${min} and ${max}`
          terminal.print(paint(`Invalid: need ${need}.`, RED))
        }
      }

      const { exact, partial } = gradeGuess(secret, guess)
      if (exact === CODE_LENGTH) {
        logger.info({ attempt }, "Code cracked")
        printHeader(terminal, player, attempt, maxTries)
        const tries = attempt === 1 ? "try" : "tries"
        const code = secret.join("")
        terminal.print(
          paint(`Cracked in ${attempt} ${tries}! Code was ${code}.`, GREEN),
        )
        await waitForEnter(terminal)
        return
      }

      const exactLabel = "Exact matches   (correct digit & position):"
      const partialLabel = "Partial matches (correct digit, wrong position):"
      terminal.print(
        `${paint(exactLabel, GREEN)} ${exact}`,
        `${paint(partialLabel, YELLOW)} ${partial}`,
      )
      await terminal.question("\nPress ENTER for next round…")
    }

    logger.info("Out of attempts")
    printHeader(terminal, player, maxTries, maxTries)
    terminal.print(
      paint(`Out of attempts! The code was ${secret.join("")}.`, RED),
    )
    await waitForEnter(terminal)
  },
}
