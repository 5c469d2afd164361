import { describe, expect, it } from "vitest"

import {
  pick,
  randomInt,
  seededRandom,
  sequenceRandom,
  shuffle,
} from "./random.ts"

describe("seededRandom", () => {
  it("repeats for the same seed", () => {
    const a = seededRandom(7)
    const b = seededRandom(7)
    const first = [a(), a(), a()]
    expect([b(), b(), b()]).toEqual(first)
    for (const n of first) {
      expect(n).toBeGreaterThanOrEqual(0)
      expect(n).toBeLessThan(1)
    }
  })
})

describe("sequenceRandom", () => {
  it("cycles through its values", () => {
    const random = sequenceRandom([0.1, 0.2])
    expect([random(), random(), random()]).toEqual([0.1, 0.2, 0.1])
  })

  it("needs at least one value", () => {
    expect(() => sequenceRandom([])).toThrow(RangeError)
  })
})

describe("randomInt", () => {
  it("includes both bounds", () => {
    expect(randomInt(() => 0, 3, 6)).toBe(3)
    expect(randomInt(() => 0.999, 3, 6)).toBe(6)
  })
})

describe("pick", () => {
  it("indexes by the random value", () => {
    expect(pick(() => 0.5, ["a", "b", "c", "d"])).toBe("c")
    expect(() => pick(() => 0, [])).toThrow(RangeError)
  })
})

describe("shuffle", () => {
  it("returns a permutation without touching the input", () => {
    const items = [1, 2, 3, 4]
    expect(shuffle(() => 0, items)).toEqual([2, 3, 4, 1])
    expect(items).toEqual([1, 2, 3, 4])
  })
})
