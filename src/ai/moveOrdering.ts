/**
 * Move Ordering
 *
 * Sorts candidate columns by the static evaluation one ply ahead. Good
 * moves first lets alpha-beta prune earlier, and capping the sorted list
 * (BRANCHING_CAP) narrows the search below the root to the locally most
 * promising replies.
 */

import type { Board } from '../game/board'

/** Center-first order that candidates start from */
export const DEFAULT_COLUMN_ORDER: readonly number[] = [3, 2, 4, 1, 5, 0, 6]

/** Maximum number of candidates explored at internal search nodes */
export const BRANCHING_CAP = 4

export type OrderDirection = 'descending' | 'ascending'

export interface ScoredMove {
  column: number
  evaluation: number
}

/**
 * Scores each legal candidate by applying it, reading the evaluation and
 * undoing it. Illegal (full) columns are dropped. The board is left as it
 * was found.
 */
export function scoreMoves(board: Board, candidates: readonly number[]): ScoredMove[] {
  const scored: ScoredMove[] = []
  for (const column of candidates) {
    if (!board.isLegal(column)) continue
    board.apply(column)
    scored.push({ column, evaluation: board.evaluation })
    board.undo()
  }
  return scored
}

/**
 * Orders the legal candidates by one-ply evaluation: 'descending' for the
 * maximizing side (computer), 'ascending' for the minimizing side (human).
 * Ties keep their candidate order.
 *
 * @param board - Board to order moves on (restored before returning)
 * @param candidates - Columns in their default order
 * @param direction - Sort direction
 * @returns Legal columns, best first for the side implied by direction
 */
export function orderMoves(
  board: Board,
  candidates: readonly number[],
  direction: OrderDirection
): number[] {
  const scored = scoreMoves(board, candidates)
  if (direction === 'descending') {
    scored.sort((a, b) => b.evaluation - a.evaluation)
  } else {
    scored.sort((a, b) => a.evaluation - b.evaluation)
  }
  return scored.map((m) => m.column)
}
