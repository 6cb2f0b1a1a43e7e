/**
 * Drop Four Engine
 *
 * Decision engine for a 6x7 drop-piece game: incremental board
 * evaluation, alpha-beta search, a difficulty model and an optional
 * worker-thread search.
 */

export { DropFourGame, type DropFourGameOptions } from './game/dropfour'
export {
  Board,
  LINE_VALUES,
  WIN_THRESHOLD,
  contribution,
  forwardDelta,
  recomputeEvaluation,
  type BoardState,
  type LineState,
} from './game/board'
export { LINES, LINES_BY_CELL, LINE_COUNT, cellIndex, cellRow, cellColumn, type Line, type LineDirection } from './game/lines'
export { formatBoard } from './game/format'
export {
  ROWS,
  COLUMNS,
  WIN_LENGTH,
  CELL_COUNT,
  opponentOf,
  isColumnInRange,
  type Player,
  type Cell,
  type Winner,
} from './game/types'

export {
  DEFAULT_DIFFICULTY,
  DIFFICULTY_LEVELS,
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  difficultyToParams,
  isValidDifficulty,
  normalizeDifficulty,
  type DifficultyParams,
  type SearchParams,
} from './ai/difficulty'
export { BRANCHING_CAP, DEFAULT_COLUMN_ORDER, orderMoves, scoreMoves, type OrderDirection } from './ai/moveOrdering'
export {
  BEST_EVAL,
  WORST_EVAL,
  chooseComputerMove,
  chooseHumanMove,
  chooseMove,
  evaluateRoot,
  foldRootValues,
  orderRoot,
  pickMove,
  searchMax,
  searchMin,
  searchRootColumn,
  type MoveChoice,
  type MovePick,
  type RandomSource,
  type RootEvaluation,
  type RootValue,
  type SearchInfo,
  type SearchStats,
} from './ai/search'
export { SerialSearchEngine, createSearchEngine, type SearchEngine } from './ai/engine'
export { ParallelSearchEngine, type ParallelSearchEngineOptions } from './ai/parallel/parallelEngine'
export { SearchWorkerPool, type SearchTaskInput, type SearchTaskResult } from './ai/parallel/searchPool'
export { playMatch, playSeries, type MatchOptions, type MatchResult, type SeriesResult } from './ai/match'

export {
  EngineError,
  GameOverError,
  IllegalMoveError,
  InvariantViolationError,
  NoHistoryError,
  WorkerFailureError,
  type EngineErrorCode,
  type IllegalMoveReason,
  type MoveOutcome,
} from './lib/errors'
export { getErrorMessage, logError } from './lib/errorUtils'
export {
  formatZodError,
  gameConfigSchema,
  parseGameConfig,
  type EngineType,
  type GameConfig,
  type GameConfigInput,
} from './lib/schemas'
