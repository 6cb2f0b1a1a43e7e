/**
 * Line Index
 *
 * Every way to win is a "line": four cells in a row horizontally,
 * vertically or along a diagonal. There are 69 of them on a 6x7 grid:
 *
 * - 24 horizontal (4 per row)
 * - 21 vertical (3 per column)
 * - 12 diagonal going down-right
 * - 12 diagonal going down-left (up-right when read from the bottom)
 *
 * Cells are addressed by index `row * COLUMNS + column`, with row 0 at
 * the top. The inverse mapping (cell -> lines covering it) lets the board
 * update only the lines touched by a move instead of rescanning all 69.
 */

import { ROWS, COLUMNS, WIN_LENGTH, CELL_COUNT } from './types'

export type LineDirection = 'horizontal' | 'vertical' | 'diagonal-down-right' | 'diagonal-down-left'

export interface Line {
  readonly id: number
  readonly direction: LineDirection
  /** Cell indices in walking order from the starting cell */
  readonly cells: readonly number[]
}

/**
 * Converts (row, column) to a cell index.
 */
export function cellIndex(row: number, column: number): number {
  return row * COLUMNS + column
}

export function cellRow(index: number): number {
  return Math.floor(index / COLUMNS)
}

export function cellColumn(index: number): number {
  return index % COLUMNS
}

const DIRECTIONS: ReadonlyArray<{ direction: LineDirection; deltaRow: number; deltaCol: number }> = [
  { direction: 'horizontal', deltaRow: 0, deltaCol: 1 },
  { direction: 'vertical', deltaRow: 1, deltaCol: 0 },
  { direction: 'diagonal-down-right', deltaRow: 1, deltaCol: 1 },
  { direction: 'diagonal-down-left', deltaRow: 1, deltaCol: -1 },
]

function buildLines(): Line[] {
  const lines: Line[] = []

  for (const { direction, deltaRow, deltaCol } of DIRECTIONS) {
    // Vertical lines are enumerated column by column, the rest row by row
    const starts: [number, number][] = []
    if (direction === 'vertical') {
      for (let col = 0; col < COLUMNS; col++) {
        for (let row = 0; row <= ROWS - WIN_LENGTH; row++) {
          starts.push([row, col])
        }
      }
    } else {
      for (let row = 0; row < ROWS; row++) {
        for (let col = 0; col < COLUMNS; col++) {
          starts.push([row, col])
        }
      }
    }

    for (const [row, col] of starts) {
      const endRow = row + (WIN_LENGTH - 1) * deltaRow
      const endCol = col + (WIN_LENGTH - 1) * deltaCol
      if (endRow < 0 || endRow >= ROWS || endCol < 0 || endCol >= COLUMNS) continue

      const cells = Array.from({ length: WIN_LENGTH }, (_, i) =>
        cellIndex(row + i * deltaRow, col + i * deltaCol)
      )
      lines.push({ id: lines.length, direction, cells })
    }
  }

  return lines
}

function buildLinesByCell(lines: readonly Line[]): number[][] {
  const byCell: number[][] = Array.from({ length: CELL_COUNT }, () => [])
  for (const line of lines) {
    for (const cell of line.cells) {
      byCell[cell].push(line.id)
    }
  }
  return byCell
}

/** All 69 lines, ids 0-68 */
export const LINES: readonly Line[] = buildLines()

export const LINE_COUNT = LINES.length

/** For each cell index, the ids of the lines that contain it (3 to 13) */
export const LINES_BY_CELL: readonly (readonly number[])[] = buildLinesByCell(LINES)
