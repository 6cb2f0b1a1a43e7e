import { COLUMNS, ROWS, type Cell } from './types'

const CELL_CHARS: Record<'computer' | 'human' | 'empty', string> = {
  computer: 'O',
  human: 'X',
  empty: '*',
}

/**
 * Renders 42 cells (row-major, top row first) as a text grid for debugging.
 * 'X' is the human, 'O' the computer, '*' an empty cell.
 */
export function formatBoard(cells: readonly Cell[]): string {
  const rows: string[] = []
  for (let row = 0; row < ROWS; row++) {
    let line = ''
    for (let col = 0; col < COLUMNS; col++) {
      line += CELL_CHARS[cells[row * COLUMNS + col] ?? 'empty']
    }
    rows.push(line)
  }
  return rows.join('\n')
}
