/**
 * Misbehaving search worker for pool tests. What it does depends on the
 * task's column: 0 crashes, 1 replies with garbage, anything else answers
 * the wrong task id.
 */

import { parentPort } from 'node:worker_threads'
import { searchTaskSchema } from '../../../lib/schemas'

const port = parentPort
if (port === null) {
  throw new Error('faultyWorker must be started as a worker thread')
}

port.on('message', (message: unknown) => {
  const parsed = searchTaskSchema.safeParse(message)
  const column = parsed.success ? parsed.data.column : -1
  const id = parsed.success ? parsed.data.id : 0

  if (column === 0) {
    throw new Error('worker fixture crash')
  }
  if (column === 1) {
    port.postMessage({ type: 'result', id: 'not-a-number' })
    return
  }
  port.postMessage({ type: 'result', id: id + 1000, value: 0, nodesSearched: 0 })
})
