import { pick } from "../random.ts"
import type { Random } from "../random.ts"

export const ROWS = 20
export const COLS = 40

export type Point = { row: number; col: number }
export type Direction = "up" | "down" | "left" | "right"

export type SnakeState = {
  /** Tail first, head last. */
  body: readonly Point[]
  direction: Direction
  food: Point | undefined
  score: number
  over: boolean
}

const DELTAS: Record<Direction, Point> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
}

const OPPOSITE: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
}

export function isDirection(name: string | undefined): name is Direction {
  return name === "up" || name === "down" || name === "left" || name === "right"
}

const same = (a: Point, b: Point) => a.row === b.row && a.col === b.col

export function inBounds({ row, col }: Point) {
  return row >= 0 && row < ROWS && col >= 0 && col < COLS
}

/** A random cell the snake does not cover, or undefined when none is left. */
export function spawnFood(body: readonly Point[], random: Random) {
  const free: Point[] = []
  for (let row = 0; row < ROWS; row++) {
    for (let col = 0; col < COLS; col++) {
      const cell = { row, col }
      if (!body.some((p) => same(p, cell))) free.push(cell)
    }
  }
  return free.length > 0 ? pick(random, free) : undefined
}

export function newSnake(random: Random): SnakeState {
  const row = Math.floor(ROWS / 2)
  const col = Math.floor(COLS / 2)
  const body = [
    { row, col: col - 1 },
    { row, col },
  ]
  return {
    body,
    direction: "right",
    food: spawnFood(body, random),
    score: 0,
    over: false,
  }
}

/** Turning straight back onto the body is ignored. */
export function turn(state: SnakeState, direction: Direction): SnakeState {
  if (state.over || OPPOSITE[state.direction] === direction) return state
  return { ...state, direction }
}

export function step(state: SnakeState, random: Random): SnakeState {
  if (state.over) return state

  const head = state.body[state.body.length - 1]
  if (!head) throw new Error("Snake has no body")

  const delta = DELTAS[state.direction]
  const next = { row: head.row + delta.row, col: head.col + delta.col }
  // The tail cell still counts: it only moves after this check.
  if (!inBounds(next) || state.body.some((p) => same(p, next))) {
    return { ...state, over: true }
  }

  if (state.food && same(next, state.food)) {
    const body = [...state.body, next]
    const food = spawnFood(body, random)
    return {
      ...state,
      body,
      food,
      score: state.score + 1,
      over: food === undefined,
    }
  }

  return { ...state, body: [...state.body.slice(1), next] }
}
