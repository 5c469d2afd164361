import { handValue } from "./cards.ts"
import type { Card, Hand, Rank } from "./cards.ts"

/** H hit, S stand, Dh double else hit, Ds double else stand, P split. */
export type Action = "H" | "S" | "Dh" | "Ds" | "P"
export type Play = Exclude<Action, "P">

type Upcard = "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | "T" | "A"
type Row<A extends Action = Action> = Record<Upcard, A>

function row<A extends Action>(rule: (up: Upcard) => A): Row<A> {
  return {
    "2": rule("2"),
    "3": rule("3"),
    "4": rule("4"),
    "5": rule("5"),
    "6": rule("6"),
    "7": rule("7"),
    "8": rule("8"),
    "9": rule("9"),
    T: rule("T"),
    A: rule("A"),
  }
}

/** `hit` against the listed upcards, `otherwise` against the rest. */
const on = <A extends Action>(ups: string, hit: A, otherwise: A) =>
  row((up) => (ups.split(",").includes(up) ? hit : otherwise))

const HARD: Record<number, Row<Play>> = {
  9: on("3,4,5,6", "Dh", "H"),
  10: on("T,A", "H", "Dh"),
  11: row(() => "Dh"),
  12: on("4,5,6", "S", "H"),
  13: on("2,3,4,5,6", "S", "H"),
  14: on("2,3,4,5,6", "S", "H"),
  15: on("2,3,4,5,6", "S", "H"),
  16: on("2,3,4,5,6", "S", "H"),
}

const SOFT: Record<number, Row<Play>> = {
  13: on("5,6", "Dh", "H"),
  14: on("4,5,6", "Dh", "H"),
  15: on("4,5,6", "Dh", "H"),
  16: on("4,5,6", "Dh", "H"),
  17: row<Play>((up) =>
    "3456".includes(up) ? "Dh" : "278".includes(up) ? "S" : "H",
  ),
  18: row<Play>((up) =>
    "3456".includes(up) ? "Ds" : "278".includes(up) ? "S" : "H",
  ),
}

const PAIRS: Record<Upcard, Row> = {
  A: row(() => "P"),
  T: row(() => "S"),
  "9": on("2,3,4,5,6,8,9", "P", "S"),
  "8": row(() => "P"),
  "7": on("2,3,4,5,6,7", "P", "H"),
  "6": on("2,3,4,5,6", "P", "H"),
  "5": on("2,3,4,5,6,7,8,9", "Dh", "H"),
  "4": on("5,6", "P", "H"),
  "3": on("2,3,4,5,6,7", "P", "H"),
  "2": on("2,3,4,5,6,7", "P", "H"),
}

/** Ten-valued ranks share one column. */
export function upcardOf(rank: Rank): Upcard {
  if (rank === "10" || rank === "J" || rank === "Q" || rank === "K") return "T"
  return rank
}

function totalsAction(hand: Hand, up: Upcard): Play {
  const { total, soft } = handValue(hand)
  if (total >= 19) return "S"
  if (soft) return SOFT[total]?.[up] ?? (total >= 17 ? "S" : "H")
  if (total >= 17) return "S"
  return HARD[total]?.[up] ?? "H"
}

/** Basic-strategy action for `hand` against the dealer's `upcard`. */
export function strategyAction(hand: Hand, upcard: Card): Action {
  const up = upcardOf(upcard.rank)
  const [first, second] = hand
  if (hand.length === 2 && first && second) {
    const rank = upcardOf(first.rank)
    if (rank === upcardOf(second.rank)) return PAIRS[rank][up]
  }
  return totalsAction(hand, up)
}

/**
 * Action once splitting is off the table: a pair marked `P` is played on its
 * total instead.
 */
export function playableAction(hand: Hand, upcard: Card): Play {
  const action = strategyAction(hand, upcard)
  return action === "P" ? totalsAction(hand, upcardOf(upcard.rank)) : action
}

export function shouldHit(action: Play) {
  return action === "H" || action === "Dh"
}

export const ACTION_NAMES: Record<Action, string> = {
  H: "Hit",
  S: "Stand",
  Dh: "Double, else hit",
  Ds: "Double, else stand",
  P: "Split",
}
