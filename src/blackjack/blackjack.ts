import { BOLD, CYAN, GREEN, MAGENTA, RED, YELLOW, paint } from "../style.ts"
import { isEscape, waitForEnter } from "../terminal.ts"
import type { Terminal } from "../terminal.ts"
import type { Game } from "../types.ts"
import {
  handValue,
  isBust,
  isSoft17,
  renderHand,
  shuffledShoe,
} from "./cards.ts"
import type { Card, Hand } from "./cards.ts"
import {
  ACTION_NAMES,
  playableAction,
  shouldHit,
  strategyAction,
} from "./strategy.ts"

export const MAX_AI_PLAYERS = 5

/**
 * `us`: hole card dealt up front, dealer hits soft 17.
 * `eu`: no hole card until the players are done, dealer stands on soft 17.
 */
export type Variant = "us" | "eu"
export type Outcome = "win" | "lose" | "push"

export function parseVariant(input: string): Variant | undefined {
  const v = input.trim().toLowerCase()
  if (v === "us" || v === "american") return "us"
  if (v === "eu" || v === "european") return "eu"
  return undefined
}

export function dealerShouldHit(hand: Hand, variant: Variant) {
  const { total } = handValue(hand)
  return total < 17 || (variant === "us" && isSoft17(hand))
}

export function settle(player: Hand, dealer: Hand): Outcome {
  const p = handValue(player).total
  const d = handValue(dealer).total
  if (p > 21) return "lose"
  if (d > 21 || p > d) return "win"
  return p === d ? "push" : "lose"
}

/** Amount returned to the player for a settled bet. */
export function payout(outcome: Outcome, bet: number) {
  return outcome === "win" ? bet * 2 : outcome === "push" ? bet : 0
}

class Shoe {
  #cards: Card[]

  constructor(cards: Card[]) {
    this.#cards = cards
  }

  draw(): Card {
    const card = this.#cards.pop()
    if (!card) throw new Error("Shoe is empty")
    return card
  }
}

type Seat = { name: string; human: boolean; hand: Card[] }

async function askNumber(
  terminal: Terminal,
  prompt: string,
  valid: (n: number) => boolean,
  error: string,
) {
  for (;;) {
    const raw = (await terminal.question(prompt)).trim()
    if (isEscape(raw)) return undefined
    const n = Number(raw)
    if (raw !== "" && Number.isFinite(n) && valid(n)) return n
    terminal.print(paint(error, RED))
  }
}

const money = (n: number) => `$${n.toFixed(2)}`

export const blackjack: Game = {
  slug: "blackjack",
  title: "Blackjack",
  async run(ctx) {
    const { terminal, random } = ctx
    const logger = ctx.logger.child({ game: "blackjack" })

    terminal.clear()
    terminal.print(
      paint("=".repeat(60), GREEN, BOLD),
      paint(
        "♠♥ ♣♦   TERMINAL CASINO BLACKJACK   ♠♥ ♣♦".padStart(47),
        YELLOW,
        BOLD,
      ),
      paint("=".repeat(60), GREEN, BOLD),
    )

    let variant: Variant | undefined
    while (!variant) {
      const raw = await terminal.question(
        "Choose variant [American(us)/European(eu)]: ",
      )
      if (isEscape(raw)) return
      variant = parseVariant(raw)
    }

    const cash = await askNumber(
      terminal,
      "Enter your starting cash: ",
      (n) => n > 0,
      "Enter a positive amount.",
    )
    if (cash === undefined) return
    let balance = cash

    const aiCount = await askNumber(
      terminal,
      `Number of AI players (0-${MAX_AI_PLAYERS}): `,
      (n) => Number.isInteger(n) && n >= 0 && n <= MAX_AI_PLAYERS,
      `Enter a whole number from 0 to ${MAX_AI_PLAYERS}.`,
    )
    if (aiCount === undefined) return

    const seat = await askNumber(
      terminal,
      `Choose your seat (1 to ${aiCount + 1}): `,
      (n) => Number.isInteger(n) && n >= 1 && n <= aiCount + 1,
      `Enter a seat from 1 to ${aiCount + 1}.`,
    )
    if (seat === undefined) return

    logger.info({ variant, balance, aiCount, seat }, "Table opened")

    while (balance > 0) {
      terminal.clear()
      terminal.print(paint(`Current Balance: ${money(balance)}`, CYAN))
      const available = balance
      const bet = await askNumber(
        terminal,
        "Enter your bet amount: ",
        (n) => n > 0 && n <= available,
        "Invalid bet. Must be >0 and ≤ balance.",
      )
      if (bet === undefined) return
      balance -= bet

      const shoe = new Shoe(shuffledShoe(random))
      const seats: Seat[] = []
      for (let i = 0, ai = 0; i <= aiCount; i++) {
        const human = i === seat - 1
        const name = human ? "You" : `AI Player ${++ai}`
        seats.push({ name, human, hand: [] })
      }
      for (const s of seats) s.hand.push(shoe.draw(), shoe.draw())
      const dealer =
        variant === "us" ? [shoe.draw(), shoe.draw()] : [shoe.draw()]
      const upcard = dealer[0]
      if (!upcard) throw new Error("Dealer has no upcard")

      terminal.clear()
      terminal.print(paint("Initial deal:", MAGENTA))
      for (const s of seats) {
        terminal.print(paint(`${s.name}:`, CYAN), renderHand(s.hand))
      }
      terminal.print(paint("Dealer upcard:", CYAN), renderHand([upcard]))
      await terminal.question("Press Enter to continue...")

      for (const s of seats) {
        if (s.human) {
          const left = await humanTurn(terminal, s.hand, dealer, shoe)
          if (left) return
          continue
        }

        terminal.print("", `${s.name} is playing...`)
        while (shouldHit(playableAction(s.hand, upcard))) {
          s.hand.push(shoe.draw())
          terminal.print(`${s.name} hits: new total ${handValue(s.hand).total}`)
          if (isBust(s.hand)) break
        }
        terminal.print(
          paint(`${s.name} hand:`, CYAN),
          renderHand(s.hand),
          isBust(s.hand)
            ? `${s.name} busts!`
            : `${s.name} stands at ${handValue(s.hand).total}`,
        )
      }

      if (seats.some((s) => !isBust(s.hand))) {
        if (variant === "eu") dealer.push(shoe.draw())
        while (dealerShouldHit(dealer, variant)) dealer.push(shoe.draw())
        terminal.print("", "Dealer's final hand:", renderHand(dealer))
      }

      for (const s of seats) {
        const outcome = settle(s.hand, dealer)
        if (s.human) {
          balance += payout(outcome, bet)
          logger.info({ outcome, bet, balance }, "Hand settled")
          terminal.print(
            outcome === "win"
              ? paint("You win!", GREEN)
              : outcome === "push"
                ? paint("Push.", YELLOW)
                : paint("Dealer wins.", RED),
          )
        } else {
          terminal.print(`${s.name}: ${outcome}`)
        }
      }
      terminal.print(paint(`New Balance: ${money(balance)}`, CYAN))

      if (balance <= 0) {
        terminal.print(paint("You're out of cash!", RED))
        break
      }
      const again = (await terminal.question("Play again? (y/n): "))
        .trim()
        .toLowerCase()
      if (again !== "y") break
    }

    terminal.print(
      paint("Thank you for playing at the Terminal Casino!", MAGENTA, BOLD),
    )
    await waitForEnter(terminal)
  },
}

/** Returns true when the player typed `esc` to leave the table. */
async function humanTurn(
  terminal: Terminal,
  hand: Card[],
  dealer: Hand,
  shoe: Shoe,
) {
  const upcard = dealer[0]
  if (!upcard) throw new Error("Dealer has no upcard")
  const hidden = new Set(dealer.map((_, i) => i).filter((i) => i > 0))

  for (;;) {
    terminal.print(
      "",
      "Dealer's hand:",
      renderHand(dealer, hidden),
      "",
      "Your hand:",
      renderHand(hand),
      `Your total: ${handValue(hand).total}, ` +
        `Dealer upcard: ${handValue([upcard]).total}`,
      `Suggested: ${ACTION_NAMES[strategyAction(hand, upcard)]}`,
    )

    const action = (await terminal.question("Choose action ([h]it, [s]tand): "))
      .trim()
      .toLowerCase()
    if (isEscape(action)) return true

    if (action === "h") {
      hand.push(shoe.draw())
      if (isBust(hand)) {
        terminal.print(renderHand(hand), "", paint("You busted!", RED))
        return false
      }
    } else if (action === "s") {
      return false
    } else {
      terminal.print("Invalid input, please enter 'h' or 's'.")
    }
  }
}
