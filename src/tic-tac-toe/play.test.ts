import { describe, expect, it } from "vitest"

import { ScriptedTerminal, scriptedContext } from "../scripted-terminal.ts"
import { TerminalClosedError } from "../terminal.ts"
import { InvalidMoveError } from "./game.ts"
import type { Board, Cell } from "./game.ts"
import { parseMove, renderBoard, ticTacToe } from "./play.ts"

const board = (cells: string): Board =>
  [...cells].map((c): Cell => (c === "X" || c === "O" ? c : ""))

describe("parseMove", () => {
  it("accepts a single index", () => {
    expect(parseMove("4")).toBe(4)
    expect(parseMove("  8 ")).toBe(8)
  })

  it("accepts a row and column pair", () => {
    expect(parseMove("1 2")).toBe(5)
    expect(parseMove("2   0")).toBe(6)
  })

  it.each([
    ["", "Enter a cell 0-8, or as: row col (0..2)"],
    ["1 2 3", "Enter a cell 0-8, or as: row col (0..2)"],
    ["a", "Invalid numbers"],
    ["1 b", "Invalid numbers"],
    ["9", "Out of bounds"],
    ["3 0", "Out of bounds"],
  ])("rejects %j", (input, message) => {
    expect(() => parseMove(input)).toThrow(InvalidMoveError)
    expect(() => parseMove(input)).toThrow(message)
  })
})

describe("renderBoard", () => {
  it("draws a 3x3 grid with separators", () => {
    expect(renderBoard(board("X...O...."))).toBe(
      [
        " X |   |   ",
        "---+---+---",
        "   | O |   ",
        "---+---+---",
        "   |   |   ",
      ].join("\n"),
    )
  })

  it("numbers the empty cells on request", () => {
    expect(renderBoard(board("X...O...."), true)).toBe(
      [
        " X | 1 | 2 ",
        "---+---+---",
        " 3 | O | 5 ",
        "---+---+---",
        " 6 | 7 | 8 ",
      ].join("\n"),
    )
  })
})

describe("ticTacToe.run", () => {
  it("plays a pass-and-play round to a win", async () => {
    const terminal = new ScriptedTerminal([
      "Alice",
      "Bob",
      "n",
      "1",
      "0",
      "3",
      "1",
      "4",
      "2",
      "",
    ])
    await ticTacToe.run(
      scriptedContext(terminal, { config: { mode: "pass-and-play" } }),
    )

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.lines).toContain("Alice wins!")
    expect(terminal.lines).toContain("Final: Alice 1 - 0 Bob")
    expect(terminal.prompts.at(-1)).toBe("Enter to menu...")
  })

  it("re-prompts the same player after invalid input", async () => {
    const terminal = new ScriptedTerminal([
      "Alice",
      "Bob",
      "y",
      "1",
      "4",
      "4",
      "x",
      "0",
      "esc",
    ])
    await ticTacToe.run(
      scriptedContext(terminal, { config: { mode: "pass-and-play" } }),
    )

    expect(terminal.prompts.slice(4)).toEqual([
      "Alice (X), enter your move (0-8 or row col):",
      "Bob (O), enter your move (0-8 or row col):",
      "Bob (O), enter your move (0-8 or row col):",
      "Bob (O), enter your move (0-8 or row col):",
      "Alice (X), enter your move (0-8 or row col):",
    ])
    expect(terminal.lines).toContain("Cell already occupied")
    expect(terminal.lines).toContain("Invalid numbers")
    expect(terminal.lines).toContain(" O | 1 | 2 ")
  })

  it("holds a draw against the optimal AI", async () => {
    const terminal = new ScriptedTerminal([
      "Alice",
      "n",
      "1",
      "0",
      "8",
      "7",
      "2",
      "3",
      "",
    ])
    await ticTacToe.run(
      scriptedContext(terminal, { config: { mode: "ai", noise: 0 } }),
    )

    expect(terminal.lines).toContain("It's a tie!")
    expect(terminal.lines).toContain("Final: Alice 0 - 0 AI")
    expect(terminal.lines).toContain("Draw!")
    expect(terminal.pauses).toEqual([500, 500, 500, 500, 1000])
  })

  it("counts wins across rounds", async () => {
    const terminal = new ScriptedTerminal([
      "",
      "",
      "n",
      "2",
      ...["0", "3", "1", "4", "2"],
      ...["3", "0", "4", "1", "8", "2"],
      "",
    ])
    await ticTacToe.run(
      scriptedContext(terminal, { config: { mode: "pass-and-play" } }),
    )

    expect(terminal.lines).toContain("Final: Player 1 1 - 1 Player 2")
    expect(terminal.lines.at(-1)).toBe("Draw!")
  })

  it("returns from the mode menu on 3 after an invalid choice", async () => {
    const terminal = new ScriptedTerminal(["9", "3"])
    await ticTacToe.run(scriptedContext(terminal))

    expect(terminal.prompts).toEqual(["Choice:", "Choice:"])
    expect(terminal.pauses).toEqual([1000])
  })

  it("leaves the session when a player types esc", async () => {
    const terminal = new ScriptedTerminal(["1", "Alice", "n", "1", "esc", "3"])
    await ticTacToe.run(scriptedContext(terminal))

    expect(terminal.remainingAnswers).toBe(0)
    expect(terminal.prompts.at(-1)).toBe("Choice:")
  })

  it("propagates closed input", async () => {
    const terminal = new ScriptedTerminal(["1"])
    await expect(ticTacToe.run(scriptedContext(terminal))).rejects.toThrow(
      TerminalClosedError,
    )
  })
})
