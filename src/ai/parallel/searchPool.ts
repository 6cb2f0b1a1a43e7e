/**
 * Search Worker Pool
 *
 * A fixed-size pool of worker threads with a task queue. Workers are
 * started on demand up to `size`, each runs one task at a time, and a
 * worker that crashes is dropped and replaced by the next dispatch.
 */

import { Worker } from 'node:worker_threads'
import { WorkerFailureError } from '../../lib/errors'
import { getErrorMessage, logError } from '../../lib/errorUtils'
import { searchReplySchema, type SearchTask } from '../../lib/schemas'

export type SearchTaskInput = Omit<SearchTask, 'id'>

export interface SearchTaskResult {
  value: number
  nodesSearched: number
}

export interface SearchWorkerPoolOptions {
  /** Maximum number of worker threads */
  size: number
  /** Worker entry point (defaults to ./searchWorker.mjs) */
  workerUrl?: URL
}

interface PendingTask {
  task: SearchTask
  resolve: (result: SearchTaskResult) => void
  reject: (error: Error) => void
}

interface PoolWorker {
  worker: Worker
  current: PendingTask | null
}

// A plain module that registers the tsx loader before importing the
// TypeScript worker; workers do not pick up loaders from execArgv
const DEFAULT_WORKER_URL = new URL('./searchWorker.mjs', import.meta.url)

export class SearchWorkerPool {
  private readonly size: number
  private readonly workerUrl: URL
  private readonly workers: PoolWorker[] = []
  private readonly queue: PendingTask[] = []
  private nextTaskId = 0
  private destroyed = false

  constructor(options: SearchWorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`)
    }
    this.size = options.size
    this.workerUrl = options.workerUrl ?? DEFAULT_WORKER_URL
  }

  /** Number of worker threads currently running */
  get activeWorkers(): number {
    return this.workers.length
  }

  /** Number of tasks waiting for a free worker */
  get queuedTasks(): number {
    return this.queue.length
  }

  get capacity(): number {
    return this.size
  }

  /**
   * Queues a task and resolves with the worker's result.
   * Rejects with WorkerFailureError if the worker fails or the pool is destroyed.
   */
  run(input: SearchTaskInput): Promise<SearchTaskResult> {
    if (this.destroyed) {
      return Promise.reject(new WorkerFailureError('Search pool has been destroyed'))
    }

    return new Promise<SearchTaskResult>((resolve, reject) => {
      const task: SearchTask = { ...input, moves: [...input.moves], id: this.nextTaskId++ }
      this.queue.push({ task, resolve, reject })
      this.dispatch()
    })
  }

  /**
   * Terminates every worker and rejects all queued and running tasks.
   */
  async destroy(): Promise<void> {
    if (this.destroyed) return
    this.destroyed = true

    const error = new WorkerFailureError('Search pool has been destroyed')
    for (const pending of this.queue.splice(0)) {
      pending.reject(error)
    }

    const workers = this.workers.splice(0)
    for (const entry of workers) {
      entry.current?.reject(error)
      entry.current = null
    }

    await Promise.all(workers.map((entry) => entry.worker.terminate()))
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      let idle = this.workers.find((entry) => entry.current === null)
      if (!idle && this.workers.length < this.size) {
        idle = this.spawn()
      }
      if (!idle) return

      const pending = this.queue.shift()
      if (!pending) return

      idle.current = pending
      idle.worker.postMessage(pending.task)
    }
  }

  private spawn(): PoolWorker {
    const worker = new Worker(this.workerUrl)
    const entry: PoolWorker = { worker, current: null }

    worker.on('message', (message: unknown) => this.handleMessage(entry, message))
    worker.on('error', (error: Error) => {
      this.handleFailure(
        entry,
        new WorkerFailureError(`Search worker crashed: ${getErrorMessage(error)}`, { cause: error })
      )
    })
    worker.on('exit', (code: number) => {
      this.handleFailure(entry, new WorkerFailureError(`Search worker exited with code ${code}`))
    })

    this.workers.push(entry)
    return entry
  }

  private handleMessage(entry: PoolWorker, message: unknown): void {
    const pending = entry.current
    if (pending === null) {
      console.warn('[search-pool] Ignoring a reply from an idle worker')
      return
    }
    entry.current = null

    const parsed = searchReplySchema.safeParse(message)
    if (!parsed.success) {
      pending.reject(new WorkerFailureError('Search worker sent an invalid reply'))
    } else if (parsed.data.type === 'error') {
      pending.reject(new WorkerFailureError(parsed.data.message))
    } else if (parsed.data.id !== pending.task.id) {
      pending.reject(
        new WorkerFailureError(`Search worker answered task ${parsed.data.id}, expected ${pending.task.id}`)
      )
    } else {
      pending.resolve({ value: parsed.data.value, nodesSearched: parsed.data.nodesSearched })
    }

    this.dispatch()
  }

  private handleFailure(entry: PoolWorker, error: WorkerFailureError): void {
    const index = this.workers.indexOf(entry)
    // Already removed: the exit that follows an error, or a destroyed pool
    if (index === -1) return
    this.workers.splice(index, 1)

    const pending = entry.current
    entry.current = null
    if (pending) {
      pending.reject(error)
    } else {
      console.warn(`[search-pool] ${error.message} while idle`)
    }

    entry.worker.terminate().catch((terminateError: unknown) => {
      logError('search-pool', terminateError)
    })

    this.dispatch()
  }
}
