import { shuffle } from "../random.ts"
import type { Random } from "../random.ts"

export const SUITS = ["♠", "♥", "♦", "♣"] as const
export const RANKS = [
  "A",
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
  "10",
  "J",
  "Q",
  "K",
] as const
export const SHOE_DECKS = 6

export type Suit = (typeof SUITS)[number]
export type Rank = (typeof RANKS)[number]
export type Card = { rank: Rank; suit: Suit }
export type Hand = readonly Card[]

const CARD_WIDTH = 9

/** Ordered decks: deck by deck, suit by suit, A through K. */
export function orderedShoe(decks = SHOE_DECKS): Card[] {
  const cards: Card[] = []
  for (let d = 0; d < decks; d++) {
    for (const suit of SUITS) {
      for (const rank of RANKS) cards.push({ rank, suit })
    }
  }
  return cards
}

export function shuffledShoe(random: Random, decks = SHOE_DECKS) {
  return shuffle(random, orderedShoe(decks))
}

export function cardPoints(rank: Rank) {
  if (rank === "A") return 11
  if (rank === "J" || rank === "Q" || rank === "K") return 10
  return Number(rank)
}

/**
 * Best total of `hand`: aces count 11, dropping to 1 one at a time while the
 * total is over 21. `soft` means an ace is still counted as 11.
 */
export function handValue(hand: Hand) {
  let total = 0
  let aces = 0
  for (const { rank } of hand) {
    total += cardPoints(rank)
    if (rank === "A") aces++
  }
  while (total > 21 && aces > 0) {
    total -= 10
    aces--
  }
  return { total, soft: aces > 0 }
}

export function isBust(hand: Hand) {
  return handValue(hand).total > 21
}

export function isSoft17(hand: Hand) {
  const { total, soft } = handValue(hand)
  return total === 17 && soft
}

function cardArt({ rank, suit }: Card) {
  const inner = CARD_WIDTH - 2
  const pad = " ".repeat((inner - 1) / 2)
  return [
    `┌${"─".repeat(inner)}┐`,
    `│${rank.padEnd(inner)}│`,
    `│${pad}${suit}${pad}│`,
    `│${rank.padStart(inner)}│`,
    `└${"─".repeat(inner)}┘`,
  ]
}

const CARD_BACK = [
  `┌${"─".repeat(CARD_WIDTH - 2)}┐`,
  ...Array<string>(3).fill(`│${"░".repeat(CARD_WIDTH - 2)}│`),
  `└${"─".repeat(CARD_WIDTH - 2)}┘`,
]

/** Cards side by side; `hidden` indexes are drawn face down. */
export function renderHand(
  hand: Hand,
  hidden: ReadonlySet<number> = new Set(),
) {
  const arts = hand.map((card, i) =>
    hidden.has(i) ? CARD_BACK : cardArt(card),
  )
  return CARD_BACK.map((_, row) => arts.map((art) => art[row]).join(" ")).join(
    "\n",
  )
}
