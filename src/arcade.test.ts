import { describe, expect, it, vi } from "vitest"

import { startArcade } from "./arcade.ts"
import { ScriptedTerminal, scriptedContext } from "./scripted-terminal.ts"
import type { Game } from "./types.ts"

const game = (run: Game["run"] = async () => {}) => ({
  slug: "alpha",
  title: "Alpha",
  run: vi.fn(run),
})

describe("startArcade", () => {
  it("launches a game named in the config", async () => {
    const alpha = game()
    const terminal = new ScriptedTerminal()
    const code = await startArcade(
      scriptedContext(terminal, { config: { game: "alpha" } }),
      [alpha],
    )

    expect(code).toBe(0)
    expect(alpha.run).toHaveBeenCalledTimes(1)
  })

  it("rejects an unknown game", async () => {
    const terminal = new ScriptedTerminal()
    const code = await startArcade(
      scriptedContext(terminal, { config: { game: "nope" } }),
      [game()],
    )

    expect(code).toBe(1)
    expect(terminal.lines).toEqual([
      'Unknown game "nope". Choose one of: alpha',
    ])
  })

  it("fails when the game crashes", async () => {
    const terminal = new ScriptedTerminal([""])
    const code = await startArcade(
      scriptedContext(terminal, { config: { game: "alpha" } }),
      [
        game(async () => {
          throw new Error("boom")
        }),
      ],
    )

    expect(code).toBe(1)
  })

  it("exits cleanly when input closes in the menu", async () => {
    const terminal = new ScriptedTerminal()
    await expect(
      startArcade(scriptedContext(terminal), [game()]),
    ).resolves.toBe(0)
  })
})
