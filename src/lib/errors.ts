/**
 * Engine error types
 *
 * Boundary errors (illegal moves, game over, nothing to undo) are returned
 * to callers inside a MoveOutcome. Invariant violations mean a bug in the
 * legality checks upstream and are always thrown.
 */

export type EngineErrorCode =
  | 'illegal-move'
  | 'game-over'
  | 'no-history'
  | 'invariant-violation'
  | 'worker-failure'

export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string) {
    super(message)
    this.name = 'EngineError'
    this.code = code
  }
}

export type IllegalMoveReason =
  | 'game-over'
  | 'out-of-range'
  | 'column-full'
  | 'search-in-progress'
  | 'stale-position'

export class IllegalMoveError extends EngineError {
  /** Column involved, or null when the request named none */
  readonly column: number | null
  readonly reason: IllegalMoveReason

  constructor(column: number | null, reason: IllegalMoveReason) {
    super('illegal-move', describeIllegalMove(column, reason))
    this.name = 'IllegalMoveError'
    this.column = column
    this.reason = reason
  }
}

function describeIllegalMove(column: number | null, reason: IllegalMoveReason): string {
  if (column === null) {
    return reason === 'search-in-progress'
      ? 'A computer move is already being searched'
      : `Move rejected: ${reason}`
  }
  switch (reason) {
    case 'game-over':
      return `Cannot play column ${column}: the game is over`
    case 'out-of-range':
      return `Column ${column} is not on the board`
    case 'column-full':
      return `Column ${column} is full`
    case 'search-in-progress':
      return `Cannot play column ${column} while a computer move is being searched`
    case 'stale-position':
      return `Column ${column} was chosen for a game that has since been restarted`
  }
}

export class GameOverError extends EngineError {
  constructor() {
    super('game-over', 'The game is over')
    this.name = 'GameOverError'
  }
}

export class NoHistoryError extends EngineError {
  constructor() {
    super('no-history', 'No moves to take back')
    this.name = 'NoHistoryError'
  }
}

export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super('invariant-violation', message)
    this.name = 'InvariantViolationError'
  }
}

export class WorkerFailureError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('worker-failure', message)
    this.name = 'WorkerFailureError'
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

/**
 * Result of a move request at the public boundary.
 */
export type MoveOutcome<E extends EngineError = EngineError> =
  | { success: true; column: number }
  | { success: false; error: E }
