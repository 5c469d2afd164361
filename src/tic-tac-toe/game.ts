export type Mark = "X" | "O"
export type Cell = "" | Mark
/** Nine cells, row-major: index = row * 3 + col. */
export type Board = readonly Cell[]
export type Move = number

export type GameResult = "in_progress" | "x_wins" | "o_wins" | "draw"
export type TerminalResult = Exclude<GameResult, "in_progress">

export type GameState = {
  board: Board
  phase:
    | { status: "awaiting_move"; player: Mark }
    | { status: "terminal"; result: TerminalResult }
}

export class InvalidMoveError extends Error {
  override name = "InvalidMoveError"
}

export class NoLegalMoveError extends Error {
  override name = "NoLegalMoveError"
}

const LINES = [
  // Rows
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],

  // Columns
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],

  // Diagonals
  [0, 4, 8],
  [2, 4, 6],
] as const

export function emptyBoard(): Board {
  return Array<Cell>(9).fill("")
}

export function opponent(mark: Mark): Mark {
  return ({ X: "O", O: "X" } as const)[mark]
}

export function legalMoves(board: Board): Move[] {
  const moves: Move[] = []
  board.forEach((cell, i) => {
    if (cell === "") moves.push(i)
  })
  return moves
}

export function winner(board: Board): Mark | undefined {
  for (const [a, b, c] of LINES) {
    const first = board[a]
    if (first && first === board[b] && first === board[c]) return first
  }
  return undefined
}

export function evaluate(board: Board): GameResult {
  const mark = winner(board)
  if (mark) return mark === "X" ? "x_wins" : "o_wins"
  if (board.every((c) => c !== "")) return "draw"
  return "in_progress"
}

function validateMove(board: Board, move: Move) {
  if (!Number.isInteger(move) || move < 0 || move > 8) return "Out of bounds"
  if (board[move] !== "") return "Cell already occupied"
  return undefined
}

/** Returns a new board; `board` is left untouched. */
export function applyMove(board: Board, move: Move, player: Mark): Board {
  const err = validateMove(board, move)
  if (err) {
    throw new InvalidMoveError(err)
  }

  return board.with(move, player)
}

export function newGame(): GameState {
  return {
    board: emptyBoard(),
    phase: { status: "awaiting_move", player: "X" },
  }
}

export function playMove(state: GameState, move: Move): GameState {
  if (state.phase.status !== "awaiting_move") {
    throw new InvalidMoveError("Game is over")
  }

  const player = state.phase.player
  const board = applyMove(state.board, move, player)
  const result = evaluate(board)

  return {
    board,
    phase:
      result === "in_progress"
        ? { status: "awaiting_move", player: opponent(player) }
        : { status: "terminal", result },
  }
}

/** Converts a `row col` pair (each 0-2) to a board index. */
export function moveAt(row: number, col: number): Move {
  if (!Number.isInteger(row) || !Number.isInteger(col)) {
    throw new InvalidMoveError("Invalid numbers")
  }
  if (row < 0 || row > 2 || col < 0 || col > 2) {
    throw new InvalidMoveError("Out of bounds")
  }
  return row * 3 + col
}
