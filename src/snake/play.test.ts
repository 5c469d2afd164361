import { describe, expect, it } from "vitest"

import { sequenceRandom } from "../random.ts"
import { ScriptedTerminal, scriptedContext } from "../scripted-terminal.ts"
import { plain } from "../style.ts"
import { newSnake } from "./game.ts"
import { FRAME_MS, renderSnake, snake } from "./play.ts"

// Food always lands in the top-left corner, away from the snake's path.
const corner = () => sequenceRandom([0])

describe("renderSnake", () => {
  it("draws the board inside a frame with the score below", () => {
    const lines = plain(renderSnake(newSnake(() => 0))).split("\n")
    expect(lines).toHaveLength(23)
    expect(lines[0]).toBe(`╔${"═".repeat(40)}╗`)
    expect(lines[1]).toBe(`║◆${" ".repeat(39)}║`)
    expect(lines[11]).toBe(`║${" ".repeat(19)}■■${" ".repeat(19)}║`)
    expect(lines[22]).toBe("Score: 0")
  })
})

describe("snake.run", () => {
  it("runs into the right wall without input", async () => {
    const terminal = new ScriptedTerminal([""])
    await snake.run(scriptedContext(terminal, { random: corner() }))

    expect(terminal.pauses).toEqual(Array(20).fill(FRAME_MS))
    expect(terminal.lines).toContain("GAME OVER!  Score: 0")
    expect(terminal.prompts).toEqual(["Press Enter to return to menu..."])
  })

  it("steers with the arrow keys", async () => {
    const terminal = new ScriptedTerminal([""], [{ name: "up" }])
    await snake.run(scriptedContext(terminal, { random: corner() }))

    expect(terminal.pauses).toHaveLength(11)
  })

  it("ignores a reversal", async () => {
    const terminal = new ScriptedTerminal([""], [{ name: "left" }])
    await snake.run(scriptedContext(terminal, { random: corner() }))

    expect(terminal.pauses).toHaveLength(20)
  })

  it("quits on escape without a game over screen", async () => {
    const keys = [{ name: "down" }, { name: "escape" }]
    const terminal = new ScriptedTerminal([], keys)
    await snake.run(scriptedContext(terminal, { random: corner() }))

    expect(terminal.pauses).toEqual([FRAME_MS, FRAME_MS])
    expect(terminal.lines).not.toContain("GAME OVER!  Score: 0")
  })

  it("quits on Ctrl+C", async () => {
    const terminal = new ScriptedTerminal([], [{ name: "c", ctrl: true }])
    await snake.run(scriptedContext(terminal, { random: corner() }))

    expect(terminal.pauses).toEqual([FRAME_MS])
  })
})
