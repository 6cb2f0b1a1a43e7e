/**
 * Search Engine Abstraction
 *
 * The game asks an engine for a move without caring whether the search
 * runs on the calling thread or is spread over worker threads. Both
 * engines order and fold the root the same way, so they agree on best and
 * second best for the same board and depth.
 */

import type { Board } from '../game/board'
import type { Player } from '../game/types'
import { type EngineType, type GameConfigInput, parseGameConfig } from '../lib/schemas'
import type { SearchParams } from './difficulty'
import { ParallelSearchEngine } from './parallel/parallelEngine'
import { type MoveChoice, type RandomSource, chooseMove } from './search'

/**
 * Pluggable search engine interface.
 *
 * Engines keep no game state between calls; the board passed in is left
 * as it was found.
 */
export interface SearchEngine {
  /** Unique engine identifier */
  readonly name: EngineType

  /** Human-readable description */
  readonly description: string

  /**
   * Select a move for `side` on the given position.
   *
   * @param board - Current board; must not be finished
   * @param side - Player to move
   * @param params - Search depth and pick chances
   * @param random - Source of uniform numbers in [0, 1)
   */
  chooseMove(board: Board, side: Player, params: SearchParams, random: RandomSource): Promise<MoveChoice>

  /** Release threads or other resources held by the engine */
  dispose(): Promise<void>
}

/**
 * Runs the search on the calling thread.
 */
export class SerialSearchEngine implements SearchEngine {
  readonly name = 'serial'
  readonly description = 'Single-threaded alpha-beta search'

  async chooseMove(
    board: Board,
    side: Player,
    params: SearchParams,
    random: RandomSource
  ): Promise<MoveChoice> {
    return chooseMove(board, side, params, random)
  }

  async dispose(): Promise<void> {}
}

/**
 * Creates the engine named by a (validated) game configuration.
 */
export function createSearchEngine(config: GameConfigInput = {}): SearchEngine {
  const { engine, workers } = parseGameConfig(config)
  if (engine === 'parallel') {
    return new ParallelSearchEngine({ workers })
  }
  return new SerialSearchEngine()
}
