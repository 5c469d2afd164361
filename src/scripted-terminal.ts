import pino from "pino"

import type { Config } from "./config.ts"
import { seededRandom } from "./random.ts"
import type { Random } from "./random.ts"
import { plain } from "./style.ts"
import { TerminalClosedError } from "./terminal.ts"
import type { Key, Terminal } from "./terminal.ts"
import type { GameContext } from "./types.ts"

/**
 * In-process terminal for tests. Answers are consumed in order; running out
 * behaves like closed input. While keys are captured, each `pause` delivers
 * the next scripted key.
 */
export class ScriptedTerminal implements Terminal {
  readonly columns = 80
  readonly prompts: string[] = []
  readonly lines: string[] = []
  readonly pauses: number[] = []
  clears = 0

  #answers: string[]
  #keys: Key[]
  #onKey: ((key: Key) => void) | undefined

  constructor(answers: readonly string[] = [], keys: readonly Key[] = []) {
    this.#answers = [...answers]
    this.#keys = [...keys]
  }

  async question(prompt: string) {
    this.prompts.push(plain(prompt).trim())
    const answer = this.#answers.shift()
    if (answer === undefined) throw new TerminalClosedError()
    return answer
  }

  print(...lines: string[]) {
    for (const line of lines.join("\n").split("\n")) {
      this.lines.push(plain(line))
    }
  }

  clear() {
    this.clears++
  }

  async pause(ms: number) {
    this.pauses.push(ms)
    const key = this.#keys.shift()
    if (key && this.#onKey) this.#onKey(key)
  }

  captureKeys(onKey: (key: Key) => void) {
    this.#onKey = onKey
    return () => {
      this.#onKey = undefined
    }
  }

  get remainingAnswers() {
    return this.#answers.length
  }

  /** Everything printed so far, one string. */
  get output() {
    return this.lines.join("\n")
  }
}

export function scriptedContext(
  terminal: ScriptedTerminal,
  overrides: { config?: Partial<Config>; random?: Random } = {},
): GameContext {
  return {
    terminal,
    logger: pino({ level: "silent" }),
    random: overrides.random ?? seededRandom(1),
    config: { noise: 0, logLevel: "silent", ...overrides.config },
  }
}
