/**
 * Search worker thread
 *
 * Receives one root column at a time, rebuilds its own copy of the board
 * from the move list, and searches that column with a full window.
 */

import { parentPort } from 'node:worker_threads'
import { Board } from '../../game/board'
import { getErrorMessage } from '../../lib/errorUtils'
import { formatZodError, searchTaskSchema, type SearchReply } from '../../lib/schemas'
import { BEST_EVAL, WORST_EVAL, searchRootColumn, type SearchStats } from '../search'

const port = parentPort
if (port === null) {
  throw new Error('searchWorker must be started as a worker thread')
}

port.on('message', (message: unknown) => {
  const parsed = searchTaskSchema.safeParse(message)
  if (!parsed.success) {
    const reply: SearchReply = {
      type: 'error',
      id: null,
      message: `Invalid search task: ${formatZodError(parsed.error).details}`,
    }
    port.postMessage(reply)
    return
  }

  const task = parsed.data
  try {
    const board = Board.fromMoves(task.moves, task.firstPlayer)
    const stats: SearchStats = { nodesSearched: 0 }
    const bound = task.side === 'computer' ? WORST_EVAL : BEST_EVAL
    const value = searchRootColumn(board, task.side, task.column, task.depth, bound, stats)
    const reply: SearchReply = { type: 'result', id: task.id, value, nodesSearched: stats.nodesSearched }
    port.postMessage(reply)
  } catch (error) {
    const reply: SearchReply = { type: 'error', id: task.id, message: getErrorMessage(error) }
    port.postMessage(reply)
  }
})
