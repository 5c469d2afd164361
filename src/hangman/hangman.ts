import { pick } from "../random.ts"
import { BOLD, CYAN, GREEN, RED, YELLOW, paint } from "../style.ts"
import { isEscape } from "../terminal.ts"
import type { Terminal } from "../terminal.ts"
import type { Game } from "../types.ts"
import { loadWordList } from "./words.ts"
import type { Language } from "./words.ts"

export const MAX_TRIES = 6
export const HINT_COST = 3

const BANNER = [
  "╔═══════════════════════════════════════╗",
  "║          H  A  N  G  M  A  N          ║",
  "╚═══════════════════════════════════════╝",
]

// Indexed by wrong tries so far.
const GALLOWS = [
  "",
  "  O  ",
  "  O  \n  |  ",
  "  O  \n /|  ",
  "  O  \n /|\\",
  "  O  \n /|\\\n /   ",
  "  O  \n /|\\\n / \\",
]

export type HangmanState = {
  word: string
  hint: string
  guessed: ReadonlySet<string>
  tries: number
  hintUsed: boolean
}

export function newRound(word: string, hint: string): HangmanState {
  return { word, hint, guessed: new Set(), tries: 0, hintUsed: false }
}

export function outcome(state: HangmanState) {
  if ([...state.word].every((c) => state.guessed.has(c))) return "won"
  if (state.tries >= MAX_TRIES) return "lost"
  return "playing"
}

export function maskWord(word: string, guessed: ReadonlySet<string>) {
  return [...word].map((c) => (guessed.has(c) ? c : "_")).join(" ")
}

/** Single letters only; anything else, or a repeat, leaves the state as is. */
export function guess(state: HangmanState, input: string): HangmanState {
  const letter = input.trim().toUpperCase()
  if (!/^[A-Z]$/.test(letter) || state.guessed.has(letter)) return state

  return {
    ...state,
    guessed: new Set([...state.guessed, letter]),
    tries: state.word.includes(letter) ? state.tries : state.tries + 1,
  }
}

export function canTakeHint(state: HangmanState) {
  return !state.hintUsed && state.tries <= MAX_TRIES - HINT_COST
}

export function takeHint(state: HangmanState): HangmanState {
  if (!canTakeHint(state)) return state
  return { ...state, hintUsed: true, tries: state.tries + HINT_COST }
}

function printStatus(terminal: Terminal, state: HangmanState) {
  terminal.clear()
  terminal.print(
    BANNER.join("\n"),
    "",
    paint(GALLOWS[Math.min(state.tries, MAX_TRIES)] ?? "", RED),
    "",
    maskWord(state.word, state.guessed),
    "",
    paint(`Guessed: ${[...state.guessed].sort().join(", ")}`, YELLOW),
    paint(`Tries left: ${MAX_TRIES - state.tries}`, CYAN),
    "",
  )
  if (state.hintUsed) terminal.print(paint(`Hint: ${state.hint}`, CYAN))
  terminal.print(
    paint(
      `(Press 0 to get a hint - costs ${HINT_COST} tries. esc to quit to menu)`,
      CYAN,
    ),
  )
}

async function chooseLanguage(
  terminal: Terminal,
): Promise<Language | undefined> {
  terminal.clear()
  terminal.print(
    BANNER.join("\n"),
    "",
    paint("Choose a language / Choisissez une langue:", BOLD),
    "1. English",
    "2. Français",
  )
  for (;;) {
    const choice = (await terminal.question("> ")).trim()
    if (isEscape(choice)) return undefined
    if (choice === "1") return "EN"
    if (choice === "2") return "FR"
  }
}

async function playAgain(terminal: Terminal) {
  terminal.print("", "Play again? (y/n) / Rejouer ? (o/n)")
  for (;;) {
    const again = (await terminal.question("> ")).trim().toLowerCase()
    if (again === "y" || again === "o") return true
    if (again === "n" || isEscape(again)) return false
  }
}

export const hangman: Game = {
  slug: "hangman",
  title: "Hangman",
  async run(ctx) {
    const { terminal, random } = ctx
    const logger = ctx.logger.child({ game: "hangman" })

    for (;;) {
      const language = await chooseLanguage(terminal)
      if (!language) return

      const words = await loadWordList(language)
      const word = pick(random, Object.keys(words))
      let state = newRound(word, words[word] ?? "")
      logger.debug({ language, length: word.length }, "Word selected")

      while (outcome(state) === "playing") {
        printStatus(terminal, state)
        const input = await terminal.question("> ")
        if (isEscape(input)) return
        state = input.trim() === "0" ? takeHint(state) : guess(state, input)
      }

      printStatus(terminal, state)
      const won = outcome(state) === "won"
      logger.info(
        { won, tries: state.tries, hintUsed: state.hintUsed },
        "Round finished",
      )

      terminal.print("")
      if (won) {
        terminal.print(
          paint(language === "EN" ? "You win!" : "Gagné !", GREEN, BOLD),
        )
      } else {
        terminal.print(
          paint(language === "EN" ? "You lose!" : "Perdu !", RED, BOLD),
          `The word was: ${paint(state.word, CYAN)}`,
        )
      }

      if (!(await playAgain(terminal))) return
    }
  },
}
