/**
 * Board State & Incremental Evaluator
 *
 * Owns the 42 cells, the state of every line, a running static evaluation
 * and the move history. The evaluation is the sum over all lines of the
 * line's contribution:
 *
 *   - 0 for an empty line, or a line both players have a piece in
 *   - +1, +3, +17, +2000 for 1-4 computer pieces and no human piece
 *   - -1, -3, -17, -2000 for 1-4 human pieces and no computer piece
 *
 * A move touches only the 3-13 lines covering its cell, so apply/undo
 * adjust the evaluation by the change in those lines' contributions
 * rather than rescanning the board. apply and undo are exact inverses and
 * are the only way cell or line state changes.
 */

import { InvariantViolationError } from '../lib/errors'
import { LINES, LINES_BY_CELL, LINE_COUNT, cellIndex } from './lines'
import {
  type Cell,
  type Player,
  type Winner,
  ROWS,
  COLUMNS,
  WIN_LENGTH,
  CELL_COUNT,
  isColumnInRange,
  opponentOf,
} from './types'

/** Value of a pure line holding 0-4 pieces of one player */
export const LINE_VALUES: readonly number[] = [0, 1, 3, 17, 2000]

/**
 * Evaluation beyond which a completed line is assumed.
 * Win detection itself uses the per-line counts; this is the proxy the
 * search and older callers reason with.
 */
export const WIN_THRESHOLD = 1000

export interface LineState {
  computer: number
  human: number
}

/**
 * Full state of a board, for comparisons in tests and debugging.
 */
export interface BoardState {
  cells: Cell[]
  lines: LineState[]
  evaluation: number
  history: number[]
  sideToMove: Player
  firstPlayer: Player
}

/**
 * Contribution of a line to the evaluation, from its piece counts.
 */
export function contribution(countComputer: number, countHuman: number): number {
  if (countComputer > 0 && countHuman > 0) return 0
  if (countComputer > 0) return LINE_VALUES[countComputer]
  if (countHuman > 0) return -LINE_VALUES[countHuman]
  return 0
}

/**
 * Change in a line's contribution when `mover` adds one piece to it.
 * Undoing that piece applies the negation.
 */
export function forwardDelta(countComputer: number, countHuman: number, mover: Player): number {
  const before = contribution(countComputer, countHuman)
  const after =
    mover === 'computer'
      ? contribution(countComputer + 1, countHuman)
      : contribution(countComputer, countHuman + 1)
  return after - before
}

/**
 * Brute-force evaluation of a cell array, scanning all 69 lines.
 * Used to cross-check the incremental evaluation.
 */
export function recomputeEvaluation(cells: readonly Cell[]): number {
  let total = 0
  for (const line of LINES) {
    let computer = 0
    let human = 0
    for (const cell of line.cells) {
      if (cells[cell] === 'computer') computer++
      else if (cells[cell] === 'human') human++
    }
    total += contribution(computer, human)
  }
  return total
}

export class Board {
  private readonly cells: Cell[] = Array<Cell>(CELL_COUNT).fill(null)
  private readonly computerCounts = new Int8Array(LINE_COUNT)
  private readonly humanCounts = new Int8Array(LINE_COUNT)
  // Pieces per column; the next piece lands in row ROWS - 1 - height
  private readonly heights = new Int8Array(COLUMNS)
  private readonly moves: number[] = []
  private runningEvaluation = 0
  private computerLinesCompleted = 0
  private humanLinesCompleted = 0

  constructor(readonly firstPlayer: Player = 'human') {}

  /**
   * Rebuilds a board by replaying a list of columns.
   * Throws InvariantViolationError if a column cannot be played.
   */
  static fromMoves(moves: readonly number[], firstPlayer: Player = 'human'): Board {
    const board = new Board(firstPlayer)
    for (const column of moves) {
      board.apply(column)
    }
    return board
  }

  /**
   * Independent copy of this board.
   */
  clone(): Board {
    return Board.fromMoves(this.moves, this.firstPlayer)
  }

  get evaluation(): number {
    return this.runningEvaluation
  }

  get moveCount(): number {
    return this.moves.length
  }

  get history(): readonly number[] {
    return this.moves
  }

  get lastMove(): number | null {
    return this.moves.length > 0 ? this.moves[this.moves.length - 1] : null
  }

  get sideToMove(): Player {
    return this.moves.length % 2 === 0 ? this.firstPlayer : opponentOf(this.firstPlayer)
  }

  isComputerWin(): boolean {
    return this.computerLinesCompleted > 0
  }

  isHumanWin(): boolean {
    return this.humanLinesCompleted > 0
  }

  isGameOver(): boolean {
    return this.isComputerWin() || this.isHumanWin() || this.moves.length === CELL_COUNT
  }

  winner(): Winner {
    if (this.isComputerWin()) return 'computer'
    if (this.isHumanWin()) return 'human'
    return null
  }

  isColumnFull(column: number): boolean {
    return this.heights[column] >= ROWS
  }

  /**
   * Whether a piece can be dropped in the column (ignores game over).
   */
  isLegal(column: number): boolean {
    return isColumnInRange(column) && !this.isColumnFull(column)
  }

  legalColumns(): number[] {
    const columns: number[] = []
    for (let col = 0; col < COLUMNS; col++) {
      if (!this.isColumnFull(col)) columns.push(col)
    }
    return columns
  }

  cellAt(row: number, column: number): Cell {
    return this.cells[cellIndex(row, column)]
  }

  lineState(lineId: number): LineState {
    return { computer: this.computerCounts[lineId], human: this.humanCounts[lineId] }
  }

  /**
   * Copy of the 42 cells, row-major, top row first.
   */
  snapshot(): Cell[] {
    return [...this.cells]
  }

  getState(): BoardState {
    return {
      cells: this.snapshot(),
      lines: Array.from({ length: LINE_COUNT }, (_, id) => this.lineState(id)),
      evaluation: this.runningEvaluation,
      history: [...this.moves],
      sideToMove: this.sideToMove,
      firstPlayer: this.firstPlayer,
    }
  }

  /**
   * Drops a piece for the side to move. Callers check legality first;
   * playing an illegal column is a bug and throws.
   */
  apply(column: number): void {
    if (!this.isLegal(column)) {
      throw new InvariantViolationError(`apply: column ${column} cannot be played`)
    }

    const mover = this.sideToMove
    const height = this.heights[column]
    const cell = cellIndex(ROWS - 1 - height, column)

    this.cells[cell] = mover
    this.heights[column] = height + 1
    this.moves.push(column)

    for (const lineId of LINES_BY_CELL[cell]) {
      this.advanceLine(lineId, mover)
    }
  }

  /**
   * Takes back the most recent move and returns its column.
   * Throws if there is nothing to undo.
   */
  undo(): number {
    const column = this.moves.pop()
    if (column === undefined) {
      throw new InvariantViolationError('undo: no moves to take back')
    }

    const height = this.heights[column] - 1
    const cell = cellIndex(ROWS - 1 - height, column)
    const mover = this.cells[cell]
    if (mover === null) {
      throw new InvariantViolationError(`undo: top of column ${column} is empty`)
    }

    this.cells[cell] = null
    this.heights[column] = height

    for (const lineId of LINES_BY_CELL[cell]) {
      this.retreatLine(lineId, mover)
    }

    return column
  }

  private advanceLine(lineId: number, mover: Player): void {
    const computer = this.computerCounts[lineId]
    const human = this.humanCounts[lineId]
    if (computer + human >= WIN_LENGTH) {
      throw new InvariantViolationError(`line ${lineId} is already full`)
    }

    this.runningEvaluation += forwardDelta(computer, human, mover)

    if (mover === 'computer') {
      this.computerCounts[lineId] = computer + 1
      if (computer + 1 === WIN_LENGTH) this.computerLinesCompleted++
    } else {
      this.humanCounts[lineId] = human + 1
      if (human + 1 === WIN_LENGTH) this.humanLinesCompleted++
    }
  }

  private retreatLine(lineId: number, mover: Player): void {
    let computer = this.computerCounts[lineId]
    let human = this.humanCounts[lineId]

    if (mover === 'computer') {
      if (computer === 0) {
        throw new InvariantViolationError(`line ${lineId} has no computer piece to remove`)
      }
      if (computer === WIN_LENGTH) this.computerLinesCompleted--
      computer--
      this.computerCounts[lineId] = computer
    } else {
      if (human === 0) {
        throw new InvariantViolationError(`line ${lineId} has no human piece to remove`)
      }
      if (human === WIN_LENGTH) this.humanLinesCompleted--
      human--
      this.humanCounts[lineId] = human
    }

    this.runningEvaluation -= forwardDelta(computer, human, mover)
  }
}
