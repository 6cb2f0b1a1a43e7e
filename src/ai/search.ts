/**
 * Alpha-Beta Search
 *
 * Depth-limited minimax with alpha-beta pruning over a single Board that
 * is mutated with apply/undo and restored on every path. The computer is
 * the maximizer, the human the minimizer.
 *
 * Depth counts plies. A node at depth 0 does not recurse: it sweeps every
 * legal column and returns the best static evaluation one ply ahead.
 * Internal nodes explore at most BRANCHING_CAP replies, best first; the
 * root explores every legal column.
 */

import type { Board } from '../game/board'
import type { Player } from '../game/types'
import { COLUMNS } from '../game/types'
import { InvariantViolationError } from '../lib/errors'
import type { SearchParams } from './difficulty'
import { BRANCHING_CAP, DEFAULT_COLUMN_ORDER, orderMoves } from './moveOrdering'

// Unreachable evaluations used to seed alpha/beta
export const WORST_EVAL = -10000
export const BEST_EVAL = 10000

export type RandomSource = () => number

export interface SearchStats {
  nodesSearched: number
}

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Plies searched from the root */
  depth: number
  /** Number of search nodes visited */
  nodesSearched: number
  /** Time spent on move selection (ms) */
  timeUsed: number
}

export interface RootValue {
  column: number
  /**
   * Value of the column. Exact when it improved on the columns before it;
   * otherwise only a bound at least as good as the real value, which is
   * enough to know it did not.
   */
  value: number
}

export interface RootEvaluation {
  side: Player
  /** Legal columns in the order they were searched */
  ordered: number[]
  values: RootValue[]
  best: number
  secondBest: number
  bestValue: number
}

export type MovePick = 'best' | 'second-best' | 'random'

export interface MoveChoice extends RootEvaluation {
  column: number
  pick: MovePick
  searchInfo: SearchInfo
}

function sweep(board: Board, maximizing: boolean): number {
  let best = maximizing ? WORST_EVAL : BEST_EVAL
  for (let col = 0; col < COLUMNS; col++) {
    if (board.isColumnFull(col)) continue
    board.apply(col)
    const value = board.evaluation
    board.undo()
    if (maximizing ? value > best : value < best) {
      best = value
    }
  }
  return best
}

/**
 * Value of the position for the computer (maximizer) to move.
 *
 * The maximizer's own bound comes from its running best, so `alpha` is
 * not used to cut; the window handed to each reply is (runningBest, beta).
 */
export function searchMax(
  board: Board,
  depth: number,
  alpha: number,
  beta: number,
  stats?: SearchStats
): number {
  if (stats) stats.nodesSearched++
  if (depth <= 0) return sweep(board, true)

  const moves = orderMoves(board, DEFAULT_COLUMN_ORDER, 'descending')
  const limit = Math.min(moves.length, BRANCHING_CAP)
  let best = WORST_EVAL

  for (let i = 0; i < limit; i++) {
    board.apply(moves[i])
    const value = board.isGameOver()
      ? board.evaluation
      : searchMin(board, depth - 1, best, beta, stats)
    board.undo()

    if (value > best) {
      best = value
      // The minimizer above already has something at least this good
      if (value >= beta) break
    }
  }

  return best
}

/**
 * Value of the position for the human (minimizer) to move.
 * Mirror of searchMax; `beta` is not used to cut.
 */
export function searchMin(
  board: Board,
  depth: number,
  alpha: number,
  beta: number,
  stats?: SearchStats
): number {
  if (stats) stats.nodesSearched++
  if (depth <= 0) return sweep(board, false)

  const moves = orderMoves(board, DEFAULT_COLUMN_ORDER, 'ascending')
  const limit = Math.min(moves.length, BRANCHING_CAP)
  let best = BEST_EVAL

  for (let i = 0; i < limit; i++) {
    board.apply(moves[i])
    const value = board.isGameOver()
      ? board.evaluation
      : searchMax(board, depth - 1, alpha, best, stats)
    board.undo()

    if (value < best) {
      best = value
      if (value <= alpha) break
    }
  }

  return best
}

/**
 * Searches the value of one root column for `side`, leaving the board as
 * it was. `bound` is the best value already found at the root.
 */
export function searchRootColumn(
  board: Board,
  side: Player,
  column: number,
  depthMax: number,
  bound: number,
  stats?: SearchStats
): number {
  board.apply(column)
  let value: number
  if (board.isGameOver()) {
    value = board.evaluation
  } else if (side === 'computer') {
    value = searchMin(board, depthMax - 1, bound, BEST_EVAL, stats)
  } else {
    value = searchMax(board, depthMax - 1, WORST_EVAL, bound, stats)
  }
  board.undo()
  return value
}

/**
 * Root move order for `side`: every legal column, best one-ply value first.
 */
export function orderRoot(board: Board, side: Player): number[] {
  if (board.isGameOver()) {
    throw new InvariantViolationError('cannot search a finished game')
  }
  return orderMoves(board, DEFAULT_COLUMN_ORDER, side === 'computer' ? 'descending' : 'ascending')
}

/**
 * Folds root values in search order into best and second best.
 * A column becomes best only when it strictly improves on the current
 * best, and the previous best becomes second best, so under ties the
 * second best follows search order rather than value.
 */
export function foldRootValues(side: Player, values: readonly RootValue[]): RootEvaluation {
  if (values.length === 0) {
    throw new InvariantViolationError('no legal columns at the root')
  }

  let bestValue = side === 'computer' ? WORST_EVAL - 1 : BEST_EVAL + 1
  let best = values[0].column
  let secondBest = values[0].column

  for (const { column, value } of values) {
    if (side === 'computer' ? value > bestValue : value < bestValue) {
      bestValue = value
      secondBest = best
      best = column
    }
  }

  return {
    side,
    ordered: values.map((v) => v.column),
    values: [...values],
    best,
    secondBest,
    bestValue,
  }
}

/**
 * Searches every legal root column for `side` and returns best and second
 * best. The running best is fed to each later column as its bound.
 */
export function evaluateRoot(
  board: Board,
  side: Player,
  depthMax: number,
  stats?: SearchStats
): RootEvaluation {
  const ordered = orderRoot(board, side)
  const values: RootValue[] = []
  let bound = side === 'computer' ? WORST_EVAL : BEST_EVAL

  for (const column of ordered) {
    const value = searchRootColumn(board, side, column, depthMax, bound, stats)
    values.push({ column, value })
    if (side === 'computer' ? value > bound : value < bound) {
      bound = value
    }
  }

  return foldRootValues(side, values)
}

/**
 * Picks the best, second best, or a random legal column according to the
 * configured chances.
 */
export function pickMove(
  evaluation: RootEvaluation,
  params: SearchParams,
  random: RandomSource
): { column: number; pick: MovePick } {
  const chance = random()
  if (chance < params.chanceBest) {
    return { column: evaluation.best, pick: 'best' }
  }
  if (chance < params.chanceBest + params.chanceSecondBest) {
    return { column: evaluation.secondBest, pick: 'second-best' }
  }
  const index = Math.floor(random() * evaluation.ordered.length)
  return { column: evaluation.ordered[index], pick: 'random' }
}

/**
 * Chooses a move for `side` on `board` (restored before returning).
 *
 * @param board - Position to search; must not be finished
 * @param side - Player to move
 * @param params - Depth and pick chances (see difficultyToParams)
 * @param random - Source of uniform numbers in [0, 1)
 */
export function chooseMove(
  board: Board,
  side: Player,
  params: SearchParams,
  random: RandomSource = Math.random
): MoveChoice {
  const startTime = Date.now()
  const stats: SearchStats = { nodesSearched: 0 }
  const evaluation = evaluateRoot(board, side, params.depth, stats)
  const { column, pick } = pickMove(evaluation, params, random)

  return {
    ...evaluation,
    column,
    pick,
    searchInfo: {
      depth: params.depth,
      nodesSearched: stats.nodesSearched,
      timeUsed: Date.now() - startTime,
    },
  }
}

export function chooseComputerMove(
  board: Board,
  params: SearchParams,
  random: RandomSource = Math.random
): MoveChoice {
  return chooseMove(board, 'computer', params, random)
}

/**
 * Move the search would recommend for the human (hints and analysis).
 */
export function chooseHumanMove(
  board: Board,
  params: SearchParams,
  random: RandomSource = Math.random
): MoveChoice {
  return chooseMove(board, 'human', params, random)
}
