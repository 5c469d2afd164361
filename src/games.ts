import { blackjack } from "./blackjack/blackjack.ts"
import { hangman } from "./hangman/hangman.ts"
import { mastermind } from "./mastermind.ts"
import { rockPaperScissors } from "./rock-paper-scissors.ts"
import { roulette } from "./roulette.ts"
import { snake } from "./snake/play.ts"
import { ticTacToe } from "./tic-tac-toe/play.ts"
import type { Game } from "./types.ts"

/** Menu order. */
export const GAMES: readonly Game[] = [
  ticTacToe,
  snake,
  hangman,
  rockPaperScissors,
  mastermind,
  blackjack,
  roulette,
]
