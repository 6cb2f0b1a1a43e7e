/**
 * Parallel Search Engine
 *
 * Fork-join over the root: every legal root column becomes one task on a
 * bounded worker pool, each worker searching its own copy of the board.
 * Once all tasks have joined, the values are folded in root order with
 * the same rule the serial engine uses.
 *
 * Workers search with a full window instead of the serial engine's
 * running bound. A column's value is then always exact, while the serial
 * engine may only get a bound for columns that cannot improve on the
 * best so far; both pick the same best and second best.
 */

import type { Board } from '../../game/board'
import type { Player } from '../../game/types'
import type { SearchEngine } from '../engine'
import type { SearchParams } from '../difficulty'
import {
  type MoveChoice,
  type RandomSource,
  foldRootValues,
  orderRoot,
  pickMove,
} from '../search'
import { SearchWorkerPool } from './searchPool'

export interface ParallelSearchEngineOptions {
  /** Worker threads in the pool */
  workers: number
  /** Share an existing pool instead of creating one */
  pool?: SearchWorkerPool
}

export class ParallelSearchEngine implements SearchEngine {
  readonly name = 'parallel'
  readonly description = 'Alpha-beta search with root columns spread over worker threads'

  private readonly pool: SearchWorkerPool
  private readonly ownsPool: boolean

  constructor(options: ParallelSearchEngineOptions) {
    this.pool = options.pool ?? new SearchWorkerPool({ size: options.workers })
    this.ownsPool = options.pool === undefined
  }

  async chooseMove(
    board: Board,
    side: Player,
    params: SearchParams,
    random: RandomSource
  ): Promise<MoveChoice> {
    const startTime = Date.now()
    const ordered = orderRoot(board, side)

    // Copy the position now; the caller's board is not read again
    const moves = [...board.history]
    const firstPlayer = board.firstPlayer

    // Any failed task fails the whole search; the caller reports it
    const results = await Promise.all(
      ordered.map((column) => this.pool.run({ moves, firstPlayer, side, column, depth: params.depth }))
    )

    const evaluation = foldRootValues(
      side,
      ordered.map((column, i) => ({ column, value: results[i].value }))
    )
    const { column, pick } = pickMove(evaluation, params, random)

    return {
      ...evaluation,
      column,
      pick,
      searchInfo: {
        depth: params.depth,
        nodesSearched: results.reduce((sum, r) => sum + r.nodesSearched, 0),
        timeUsed: Date.now() - startTime,
      },
    }
  }

  async dispose(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.destroy()
    }
  }
}

