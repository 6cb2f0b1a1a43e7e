/**
 * Test utilities for the engine
 *
 * Provides:
 * - A seeded random source so playouts and matches are reproducible
 * - Helpers for building boards from move lists and text diagrams
 * - A brute-force gravity check
 */

import type { Board } from './game/board'
import { cellIndex } from './game/lines'
import { COLUMNS, ROWS, type Cell } from './game/types'
import type { RandomSource } from './ai/search'

/**
 * Small deterministic PRNG (mulberry32) returning numbers in [0, 1).
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed | 0
  return () => {
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Random source that replays the given values in order, then repeats the last.
 */
export function scriptedRandom(values: readonly number[]): RandomSource {
  let index = 0
  return () => {
    const value = values[Math.min(index, values.length - 1)]
    index++
    return value
  }
}

/**
 * Parses a board diagram into 42 cells.
 * 'O' = computer, 'X' = human, anything else = empty.
 * Rows are from top to bottom.
 */
export function cellsFromString(str: string): Cell[] {
  const lines = str
    .trim()
    .split('\n')
    .map((l) => l.trim())
  const cells: Cell[] = []
  for (let row = 0; row < ROWS; row++) {
    for (let col = 0; col < COLUMNS; col++) {
      const char = lines[row]?.[col]
      cells.push(char === 'O' ? 'computer' : char === 'X' ? 'human' : null)
    }
  }
  return cells
}

/**
 * Plays random legal moves until the game ends or `maxMoves` have been
 * played, calling `onMove` after each one.
 */
export function randomPlayout(
  board: Board,
  random: RandomSource,
  maxMoves = Infinity,
  onMove?: (board: Board) => void
): void {
  let played = 0
  while (!board.isGameOver() && played < maxMoves) {
    const legal = board.legalColumns()
    board.apply(legal[Math.floor(random() * legal.length)])
    played++
    onMove?.(board)
  }
}

/**
 * True when every column is filled from the bottom with no gaps.
 */
export function hasGravity(cells: readonly Cell[]): boolean {
  for (let col = 0; col < COLUMNS; col++) {
    let seenEmpty = false
    for (let row = ROWS - 1; row >= 0; row--) {
      const empty = cells[cellIndex(row, col)] === null
      if (empty) seenEmpty = true
      else if (seenEmpty) return false
    }
  }
  return true
}

