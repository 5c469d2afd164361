import readline from "node:readline"
import { createInterface } from "node:readline/promises"
import type { Interface } from "node:readline/promises"
import { setTimeout as sleep } from "node:timers/promises"

export class TerminalClosedError extends Error {
  override name = "TerminalClosedError"

  constructor() {
    super("Terminal input closed")
  }
}

export type Key = {
  name?: string
  sequence?: string
  ctrl?: boolean
}

export interface Terminal {
  /** Resolves with the entered line, without the trailing newline. */
  question(prompt: string): Promise<string>
  print(...lines: string[]): void
  clear(): void
  pause(ms: number): Promise<void>
  /**
   * Switches to raw key input until the returned function is called. Line
   * questions must not be asked while keys are captured.
   */
  captureKeys(onKey: (key: Key) => void): () => void
  readonly columns: number
}

/** `esc` typed as a word, or a bare escape character, leaves a game. */
export function isEscape(input: string) {
  const trimmed = input.trim().toLowerCase()
  return trimmed === "esc" || trimmed === "\u001b"
}

export async function waitForEnter(
  terminal: Terminal,
  prompt = "Press Enter to return to the main menu...",
) {
  await terminal.question(`\n${prompt}`)
}

export class NodeTerminal implements Terminal {
  #rl: Interface | undefined
  #closed = false

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout,
  ) {}

  get columns() {
    return this.output.columns || 80
  }

  async question(prompt: string) {
    if (this.#closed) throw new TerminalClosedError()

    const rl = this.#interface()
    const controller = new AbortController()
    const onClose = () => controller.abort()
    rl.once("close", onClose)

    try {
      return await rl.question(prompt, { signal: controller.signal })
    } catch (error) {
      if (controller.signal.aborted) throw new TerminalClosedError()
      throw error
    } finally {
      rl.off("close", onClose)
    }
  }

  print(...lines: string[]) {
    this.output.write(lines.join("\n") + "\n")
  }

  clear() {
    if (this.output.isTTY) console.clear()
  }

  async pause(ms: number) {
    await sleep(ms)
  }

  captureKeys(onKey: (key: Key) => void) {
    // readline owns stdin while open; hand it over for raw keys.
    const rl = this.#rl
    this.#rl = undefined
    rl?.close()

    readline.emitKeypressEvents(this.input)
    const raw = this.input.isTTY
    if (raw) this.input.setRawMode(true)
    this.input.resume()

    const listener = (_: string | undefined, key: Key | undefined) => {
      onKey(key ?? {})
    }
    this.input.on("keypress", listener)

    return () => {
      this.input.off("keypress", listener)
      if (raw) this.input.setRawMode(false)
      this.input.pause()
    }
  }

  close() {
    this.#closed = true
    this.#rl?.close()
  }

  #interface() {
    if (!this.#rl) {
      const rl = createInterface({ input: this.input, output: this.output })
      rl.on("SIGINT", () => rl.close())
      rl.once("close", () => {
        // Closed by end of input or Ctrl+C, not handed over to captureKeys.
        if (this.#rl === rl) {
          this.#rl = undefined
          this.#closed = true
        }
      })
      this.#rl = rl
    }
    return this.#rl
  }
}
