export const RESET = "\u001b[0m"
export const BOLD = "\u001b[1m"
export const RED = "\u001b[31m"
export const GREEN = "\u001b[32m"
export const YELLOW = "\u001b[33m"
export const MAGENTA = "\u001b[35m"
export const CYAN = "\u001b[36m"

export function paint(text: string, ...codes: string[]) {
  return `${codes.join("")}${text}${RESET}`
}

/** Strips ANSI colour codes, e.g. to measure or assert on visible text. */
export function plain(text: string) {
  return text.replace(/\u001b\[[0-9;]*m/g, "")
}

export function center(text: string, width: number) {
  const visible = plain(text).length
  if (visible >= width) return text
  const left = Math.floor((width - visible) / 2)
  return " ".repeat(left) + text + " ".repeat(width - visible - left)
}
