import { describe, expect, it } from "vitest"

import {
  generateCode,
  gradeGuess,
  mastermind,
  parseGuess,
} from "./mastermind.ts"
import { sequenceRandom } from "./random.ts"
import { ScriptedTerminal, scriptedContext } from "./scripted-terminal.ts"

const digits = (code: string) => [...code]

describe("gradeGuess", () => {
  it.each([
    ["1234", "1234", 4, 0],
    ["1234", "4321", 0, 4],
    ["1122", "2211", 0, 4],
    ["1123", "1111", 2, 0],
    ["1223", "2222", 2, 0],
    ["1562", "5126", 0, 4],
    ["6541", "1236", 0, 2],
  ])("secret %s, guess %s", (secret, guess, exact, partial) => {
    const grade = gradeGuess(digits(secret), digits(guess))
    expect(grade).toEqual({ exact, partial })
  })
})

describe("parseGuess", () => {
  const range = { min: 1, max: 6 }

  it("accepts four digits inside the range", () => {
    expect(parseGuess(" 1264 ", range)).toEqual(["1", "2", "6", "4"])
  })

  it.each(["123", "12345", "12a4", "1237", "0123"])("rejects %j", (raw) => {
    expect(parseGuess(raw, range)).toBeUndefined()
  })

  it("allows zero in the wide range", () => {
    expect(parseGuess("0123", { min: 0, max: 9 })).toEqual(["0", "1", "2", "3"])
  })
})

describe("generateCode", () => {
  it("draws each digit from the range", () => {
    const random = sequenceRandom([0, 0.5, 0.99, 0.2])
    const code = generateCode(random, { min: 1, max: 6 })
    expect(code).toEqual(["1", "4", "6", "2"])
  })
})

// Every code digit comes out as the range minimum.
const allOnes = () => sequenceRandom([0])

describe("mastermind.run", () => {
  it("reports a crack on the second attempt", async () => {
    const terminal = new ScriptedTerminal([
      "Ada",
      "1",
      "2",
      "",
      "12",
      "2222",
      "",
      "1111",
      "",
    ])
    await mastermind.run(scriptedContext(terminal, { random: allOnes() }))

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.lines).toContain("Invalid: need 4 digits between 1 and 6.")
    expect(terminal.lines).toContain(
      "Exact matches   (correct digit & position): 0",
    )
    expect(terminal.lines).toContain("Cracked in 2 tries! Code was 1111.")
  })

  it("reveals the code when attempts run out", async () => {
    const guesses = Array.from({ length: 6 }, () => ["1111", ""]).flat()
    const terminal = new ScriptedTerminal(["", "1", "2", "", ...guesses, ""])
    await mastermind.run(
      scriptedContext(terminal, { random: sequenceRandom([0.99]) }),
    )

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.lines).toContain("Player   Round: 6/6")
    expect(terminal.lines).toContain("Out of attempts! The code was 6666.")
  })

  it("re-asks an invalid menu choice", async () => {
    const terminal = new ScriptedTerminal(["Ada", "3", "esc"])
    await mastermind.run(scriptedContext(terminal))

    expect(terminal.lines).toContain("Invalid choice. Please enter 1 or 2.")
  })
})
