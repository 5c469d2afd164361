import type { Random } from "../random.ts"
import {
  NoLegalMoveError,
  applyMove,
  legalMoves,
  opponent,
  winner,
} from "./game.ts"
import type { Board, Mark, Move } from "./game.ts"

// Position values for one search, keyed by board and side to move.
type Memo = Map<string, number>

function key(board: Board, toMove: Mark) {
  return board.map((c) => c || "-").join("") + toMove
}

/**
 * Minimax value of `board` for `toMove`: positive wins, zero draws, negative
 * losses. Wins score higher the more cells are left empty, so a faster win
 * beats a slower one and a slower loss beats a faster one.
 */
function score(board: Board, toMove: Mark, memo: Memo): number {
  const k = key(board, toMove)
  const cached = memo.get(k)
  if (cached !== undefined) return cached

  const moves = legalMoves(board)
  const won = winner(board)
  let value: number

  if (won) {
    value = (won === toMove ? 1 : -1) * (1 + moves.length)
  } else if (moves.length === 0) {
    value = 0
  } else {
    value = -Infinity
    for (const move of moves) {
      const next = applyMove(board, move, toMove)
      value = Math.max(value, -score(next, opponent(toMove), memo))
    }
  }

  memo.set(k, value)
  return value
}

/** Best move for `player`; ties go to the lowest index. */
export function optimalMove(board: Board, player: Mark): Move {
  const moves = legalMoves(board)
  if (moves.length === 0 || winner(board)) {
    throw new NoLegalMoveError("No legal move: the game is already over")
  }

  const memo: Memo = new Map()
  let best = moves[0] ?? 0
  let bestScore = -Infinity
  for (const move of moves) {
    const s = -score(applyMove(board, move, player), opponent(player), memo)
    if (s > bestScore) {
      bestScore = s
      best = move
    }
  }
  return best
}

/**
 * Picks `player`'s move. Each call is an independent trial: with probability
 * `noise` the move is uniform among legal moves, otherwise it is optimal.
 */
export function selectMove(
  board: Board,
  player: Mark,
  noise: number,
  random: Random,
): Move {
  if (!(noise >= 0 && noise <= 1)) {
    throw new RangeError(
      `Noise probability must be within [0, 1], got ${noise}`,
    )
  }

  const moves = legalMoves(board)
  if (moves.length === 0 || winner(board)) {
    throw new NoLegalMoveError("No legal move: the game is already over")
  }

  if (noise > 0 && random() < noise) {
    const move = moves[Math.floor(random() * moves.length)]
    if (move !== undefined) return move
  }

  return optimalMove(board, player)
}
