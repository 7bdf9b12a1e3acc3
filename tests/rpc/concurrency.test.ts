// tests/rpc/concurrency.test.ts — Fixed-size call pool

import { describe, it, expect } from "vitest"
import { Hono } from "hono"
import { CallPool, callPoolMiddleware } from "../../src/rpc/concurrency.js"
import { RpcError } from "../../src/rpc/errors.js"

function deferred<T = void>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe("CallPool", () => {
  it("runs up to maxWorkers at once and queues the rest in order", async () => {
    const pool = new CallPool({ maxWorkers: 1, maxQueueDepth: 5 })
    const gate = deferred()
    const order: string[] = []

    const first = pool.run(async () => {
      await gate.promise
      order.push("first")
    })
    const second = pool.run(async () => {
      order.push("second")
    })

    expect(pool.stats()).toEqual({ active: 1, queued: 1, completed: 0 })
    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(["first", "second"])
    expect(pool.stats()).toEqual({ active: 0, queued: 0, completed: 2 })
  })

  it("refuses with RESOURCE_EXHAUSTED once the queue is full", async () => {
    const pool = new CallPool({ maxWorkers: 1, maxQueueDepth: 1 })
    const gate = deferred()

    const running = pool.run(() => gate.promise)
    const queued = pool.run(async () => "queued")
    const refused = pool.run(async () => "refused")

    await expect(refused).rejects.toBeInstanceOf(RpcError)
    await expect(refused).rejects.toMatchObject({ code: "RESOURCE_EXHAUSTED" })

    gate.resolve()
    await running
    await expect(queued).resolves.toBe("queued")
  })

  it("releases the slot when the task throws", async () => {
    const pool = new CallPool({ maxWorkers: 1, maxQueueDepth: 0 })
    await expect(pool.run(async () => { throw new Error("nope") })).rejects.toThrow("nope")
    await expect(pool.run(async () => 1)).resolves.toBe(1)
  })

  it("counts a repeated release only once", async () => {
    const pool = new CallPool({ maxWorkers: 2, maxQueueDepth: 0 })
    const release = await pool.acquire()
    await pool.acquire()
    release()
    release()
    expect(pool.stats()).toEqual({ active: 1, queued: 0, completed: 1 })
  })

  it("rejects a pool without workers", () => {
    expect(() => new CallPool({ maxWorkers: 0 })).toThrow("maxWorkers must be >= 1")
  })
})

describe("callPoolMiddleware", () => {
  it("answers 429 with an envelope and Retry-After when saturated", async () => {
    const pool = new CallPool({ maxWorkers: 1, maxQueueDepth: 0 })
    const entered = deferred()
    const gate = deferred()

    const app = new Hono()
    app.use("/rpc/*", callPoolMiddleware(pool))
    app.post("/rpc/slow", async (c) => {
      entered.resolve()
      await gate.promise
      return c.json({ ok: true })
    })

    const inFlight = app.request("/rpc/slow", { method: "POST" })
    await entered.promise

    const res = await app.request("/rpc/slow", { method: "POST" })
    expect(res.status).toBe(429)
    expect(res.headers.get("Retry-After")).toBe("1")
    expect(await res.json()).toEqual({ code: "RESOURCE_EXHAUSTED", message: "Server is at capacity, retry later" })

    gate.resolve()
    const ok = await inFlight
    expect(ok.status).toBe(200)
  })

  it("keeps the slot until an event-stream body is fully read", async () => {
    const pool = new CallPool({ maxWorkers: 1, maxQueueDepth: 0 })
    const app = new Hono()
    app.use("/rpc/*", callPoolMiddleware(pool))
    app.post("/rpc/feed", () =>
      new Response("data: one\n\n", { headers: { "Content-Type": "text/event-stream" } }),
    )

    const res = await app.request("/rpc/feed", { method: "POST" })
    expect(pool.stats()).toEqual({ active: 1, queued: 0, completed: 0 })
    expect(await res.text()).toBe("data: one\n\n")
    expect(pool.stats()).toEqual({ active: 0, queued: 0, completed: 1 })
  })

  it("releases at once for a JSON reply", async () => {
    const pool = new CallPool({ maxWorkers: 1, maxQueueDepth: 0 })
    const app = new Hono()
    app.use("/rpc/*", callPoolMiddleware(pool))
    app.post("/rpc/quick", (c) => c.json({ ok: true }))

    await app.request("/rpc/quick", { method: "POST" })
    expect(pool.stats()).toEqual({ active: 0, queued: 0, completed: 1 })
  })
})
