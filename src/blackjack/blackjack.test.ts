import { describe, expect, it } from "vitest"

import { sequenceRandom } from "../random.ts"
import { ScriptedTerminal, scriptedContext } from "../scripted-terminal.ts"
import {
  blackjack,
  dealerShouldHit,
  parseVariant,
  payout,
  settle,
} from "./blackjack.ts"
import type { Card, Rank } from "./cards.ts"

const hand = (...ranks: Rank[]): Card[] =>
  ranks.map((rank) => ({ rank, suit: "♣" }))

describe("settle", () => {
  it("compares totals", () => {
    expect(settle(hand("10", "10"), hand("10", "6", "8"))).toBe("win")
    expect(settle(hand("10", "8"), hand("9", "9"))).toBe("push")
    expect(settle(hand("10", "7"), hand("10", "9"))).toBe("lose")
  })

  it("loses a busted hand even when the dealer busts", () => {
    expect(settle(hand("10", "6", "9"), hand("10", "6", "8"))).toBe("lose")
  })
})

describe("payout", () => {
  it("pays double on a win and refunds a push", () => {
    expect(payout("win", 25)).toBe(50)
    expect(payout("push", 25)).toBe(25)
    expect(payout("lose", 25)).toBe(0)
  })
})

describe("dealerShouldHit", () => {
  it("hits soft 17 only in the American game", () => {
    expect(dealerShouldHit(hand("A", "6"), "us")).toBe(true)
    expect(dealerShouldHit(hand("A", "6"), "eu")).toBe(false)
    expect(dealerShouldHit(hand("10", "6"), "eu")).toBe(true)
    expect(dealerShouldHit(hand("10", "7"), "us")).toBe(false)
  })
})

describe("parseVariant", () => {
  it("takes short and long names", () => {
    expect(parseVariant(" US ")).toBe("us")
    expect(parseVariant("european")).toBe("eu")
    expect(parseVariant("uk")).toBeUndefined()
  })
})

// A zero random source rotates the shoe by one, so cards come off the top as
// A♠ K♣ Q♣ J♣ 10♣ 9♣ ...
const rotated = () => sequenceRandom([0])

describe("blackjack.run", () => {
  it("pays a winning stand in the American game", async () => {
    const answers = ["us", "100", "0", "1", "10", "", "s", "n", ""]
    const terminal = new ScriptedTerminal(answers)
    await blackjack.run(scriptedContext(terminal, { random: rotated() }))

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.lines).toContain("Suggested: Stand")
    expect(terminal.lines).toContain("You win!")
    expect(terminal.lines).toContain("New Balance: $110.00")
    expect(terminal.lines).toContain(
      "Thank you for playing at the Terminal Casino!",
    )
  })

  it("takes the bet when the player busts", async () => {
    const answers = ["eu", "100", "0", "1", "10", "", "h", "h", "n", ""]
    const terminal = new ScriptedTerminal(answers)
    await blackjack.run(scriptedContext(terminal, { random: rotated() }))

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.lines).toContain("You busted!")
    expect(terminal.lines).toContain("Dealer wins.")
    expect(terminal.lines).toContain("New Balance: $90.00")
    expect(terminal.lines).not.toContain("Dealer's final hand:")
  })

  it("plays AI seats before the human", async () => {
    const answers = ["us", "100", "1", "2", "10", "", "s", "n", ""]
    const terminal = new ScriptedTerminal(answers)
    await blackjack.run(scriptedContext(terminal, { random: rotated() }))

    const lines = terminal.lines
    expect(lines.indexOf("AI Player 1 stands at 21")).toBeLessThan(
      lines.indexOf("Your total: 20, Dealer upcard: 10"),
    )
    expect(lines).toContain("AI Player 1: win")
    expect(lines).toContain("New Balance: $110.00")
  })

  it("ends the session when the cash runs out", async () => {
    const answers = ["eu", "50", "0", "1", "80", "50", "", "h", "h", ""]
    const terminal = new ScriptedTerminal(answers)
    await blackjack.run(scriptedContext(terminal, { random: rotated() }))

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.lines).toContain("Invalid bet. Must be >0 and ≤ balance.")
    expect(terminal.lines).toContain("New Balance: $0.00")
    expect(terminal.lines).toContain("You're out of cash!")
    expect(terminal.prompts).not.toContain("Play again? (y/n):")
  })

  it("rejects an out-of-range seat", async () => {
    const terminal = new ScriptedTerminal(["us", "100", "2", "4", "esc"])
    await blackjack.run(scriptedContext(terminal))

    expect(terminal.lines).toContain("Enter a seat from 1 to 3.")
    expect(terminal.prompts).not.toContain("Enter your bet amount:")
  })
})
