/** A source of uniform numbers in `[0, 1)`, shaped like `Math.random`. */
export type Random = () => number

/**
 * Seeded generator (mulberry32). The same seed always yields the same
 * sequence.
 */
export function seededRandom(seed: number): Random {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Replays `values` in order, cycling when exhausted. */
export function sequenceRandom(values: readonly number[]): Random {
  if (values.length === 0) throw new RangeError("Sequence must not be empty")
  let i = 0
  return () => {
    const value = values[i % values.length] ?? 0
    i++
    return value
  }
}

/** Uniform integer in `[min, max]`. */
export function randomInt(random: Random, min: number, max: number) {
  return min + Math.floor(random() * (max - min + 1))
}

export function pick<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError("Cannot pick from an empty list")
  const item = items[Math.floor(random() * items.length)]
  if (item === undefined) throw new RangeError("Random source out of range")
  return item
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(random: Random, items: readonly T[]): T[] {
  const out = [...items]
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    ;[out[i], out[j]] = [out[j], out[i]]
  }
  return out
}
