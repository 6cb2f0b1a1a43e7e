/**
 * Shared game types and constants - import these instead of hardcoding
 */

export const ROWS = 6
export const COLUMNS = 7
export const WIN_LENGTH = 4
export const CELL_COUNT = ROWS * COLUMNS

// The computer maximizes the evaluation, the human minimizes it
export type Player = 'computer' | 'human'

// null is an empty cell
export type Cell = Player | null

export type Winner = Player | null

/**
 * Returns the other player.
 */
export function opponentOf(player: Player): Player {
  return player === 'computer' ? 'human' : 'computer'
}

/**
 * Checks that a value is a column index the board has (0-6).
 */
export function isColumnInRange(column: number): boolean {
  return Number.isInteger(column) && column >= 0 && column < COLUMNS
}
