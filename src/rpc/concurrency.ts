// src/rpc/concurrency.ts — Fixed-size handler pool for RPC servers
//
// At most `maxWorkers` calls run at once; up to `maxQueueDepth` more wait in
// FIFO order. Anything beyond that is refused with RESOURCE_EXHAUSTED. A
// streamed response holds its slot until the body ends or the caller leaves.

import type { Context, Next } from "hono"
import { RpcError } from "./errors.js"

export interface WorkerPoolConfig {
  /** Calls allowed in flight (default: 10) */
  maxWorkers: number
  /** Calls allowed to wait for a slot (default: 100) */
  maxQueueDepth: number
}

export const DEFAULT_WORKER_POOL: WorkerPoolConfig = {
  maxWorkers: 10,
  maxQueueDepth: 100,
}

export interface WorkerPoolStats {
  active: number
  queued: number
  completed: number
}

export class CallPool {
  private active = 0
  private completed = 0
  private readonly waiters: Array<() => void> = []
  private readonly config: WorkerPoolConfig

  constructor(config: Partial<WorkerPoolConfig> = {}) {
    this.config = { ...DEFAULT_WORKER_POOL, ...config }
    if (this.config.maxWorkers < 1) {
      throw new Error(`maxWorkers must be >= 1 (got ${this.config.maxWorkers})`)
    }
  }

  /** Run fn once a slot is free. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  /** Wait for a slot; the returned release is safe to call more than once */
  async acquire(): Promise<() => void> {
    await this.waitForSlot()
    let released = false
    return () => {
      if (released) return
      released = true
      this.release()
    }
  }

  stats(): WorkerPoolStats {
    return { active: this.active, queued: this.waiters.length, completed: this.completed }
  }

  private waitForSlot(): Promise<void> {
    if (this.active < this.config.maxWorkers) {
      this.active++
      return Promise.resolve()
    }
    if (this.waiters.length >= this.config.maxQueueDepth) {
      return Promise.reject(new RpcError("RESOURCE_EXHAUSTED", "Server is at capacity, retry later"))
    }
    return new Promise<void>((resolve) => {
      // The slot is handed over directly, so `active` stays unchanged.
      this.waiters.push(resolve)
    })
  }

  private release(): void {
    this.completed++
    const next = this.waiters.shift()
    if (next) {
      next()
    } else {
      this.active = Math.max(0, this.active - 1)
    }
  }
}

function isEventStream(res: Response): boolean {
  return res.headers.get("Content-Type")?.startsWith("text/event-stream") ?? false
}

/** Pass the body through unchanged, calling release once it ends, fails or is cancelled */
function releaseWhenDone(body: ReadableStream<Uint8Array>, release: () => void): ReadableStream<Uint8Array> {
  const reader = body.getReader()
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { done, value } = await reader.read()
        if (done) {
          release()
          controller.close()
          return
        }
        controller.enqueue(value)
      } catch (err) {
        release()
        controller.error(err)
      }
    },
    async cancel(reason) {
      release()
      await reader.cancel(reason)
    },
  })
}

export function callPoolMiddleware(pool: CallPool) {
  return async (c: Context, next: Next) => {
    let release: () => void
    try {
      release = await pool.acquire()
    } catch (err) {
      if (err instanceof RpcError && err.code === "RESOURCE_EXHAUSTED") {
        c.header("Retry-After", "1")
        return c.json(err.toJSON(), err.httpStatus)
      }
      throw err
    }

    try {
      await next()
    } catch (err) {
      release()
      throw err
    }

    const body = c.res.body
    if (body && isEventStream(c.res)) {
      c.res = new Response(releaseWhenDone(body, release), {
        status: c.res.status,
        headers: c.res.headers,
      })
    } else {
      release()
    }
  }
}
