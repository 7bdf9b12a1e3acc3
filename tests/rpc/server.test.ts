// tests/rpc/server.test.ts — Contract server over Hono

import { describe, it, expect, vi, afterEach } from "vitest"
import { createRpcServer } from "../../src/rpc/server.js"
import { parseSSEJson } from "../../src/rpc/sse.js"
import { collect } from "../support/fakes.js"
import { ECHO_CONTRACT, createEchoService } from "./echo-service.js"

function post(body: unknown, headers: Record<string, string> = {}) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  }
}

function setup() {
  const fixture = createEchoService()
  const app = createRpcServer(ECHO_CONTRACT, fixture.service, { name: "echo" })
  return { app, closed: fixture.closed }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("createRpcServer — unary", () => {
  it("answers a valid call with the handler's JSON", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Say", post({ text: "hi" }))
    expect(res.status).toBe(200)
    expect(res.headers.get("Content-Type")).toContain("application/json")
    expect(await res.json()).toEqual({ echo: "hi" })
  })

  it("exposes request headers as call metadata", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Say", post({ text: "hi" }, { "x-shout": "1" }))
    expect(await res.json()).toEqual({ echo: "HI" })
  })

  it("rejects a payload that fails the request schema", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Say", post({ text: "" }))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({
      code: "INVALID_ARGUMENT",
      message: expect.stringMatching(/^Invalid request at \/text: /),
    })
  })

  it("rejects a body that is not JSON", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Say", post("{not json"))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ code: "INVALID_ARGUMENT", message: "Request body must be a JSON object" })
  })

  it("answers unknown methods with UNIMPLEMENTED", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Shout", post({}))
    expect(res.status).toBe(501)
    expect(await res.json()).toEqual({
      code: "UNIMPLEMENTED",
      message: "Method /rpc/test.Echo/Shout is not implemented by test.Echo",
    })
  })

  it("turns handler exceptions into INTERNAL and logs them", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
    const { app } = setup()

    const res = await app.request("/rpc/test.Echo/Fail", post({}))
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ code: "INTERNAL", message: "disk on fire" })

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toEqual({
      metric: "echo.handler_error",
      method: "Fail",
      code: "INTERNAL",
      error: "disk on fire",
    })
  })

  it("treats an empty body as an empty request", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Say", { method: "POST" })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ message: expect.stringMatching(/^Invalid request at \/text/) })
  })
})

describe("createRpcServer — server streaming", () => {
  it("writes one chunk event per fragment", async () => {
    const { app, closed } = setup()
    const res = await app.request("/rpc/test.Echo/Count", post({ n: 3 }))
    expect(res.status).toBe(200)
    expect(res.headers.get("Content-Type")).toContain("text/event-stream")

    const body = res.body
    if (!body) throw new Error("no body")
    const events = await collect(parseSSEJson(body))
    expect(events).toEqual([
      { event: "chunk", data: { i: 0 } },
      { event: "chunk", data: { i: 1 } },
      { event: "chunk", data: { i: 2 } },
    ])
    expect(closed()).toBe(1)
  })

  it("answers a failure before the first fragment with an envelope", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Count", post({ n: 0 }))
    expect(res.status).toBe(412)
    expect(await res.json()).toEqual({ code: "FAILED_PRECONDITION", message: "nothing to count" })
  })

  it("validates the request before opening the stream", async () => {
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Count", post({ n: -1 }))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: "INVALID_ARGUMENT" })
  })

  it("ends with an error event when the stream fails midway", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {})
    const { app } = setup()
    const res = await app.request("/rpc/test.Echo/Count", post({ n: 5, fail_at: 2 }))
    expect(res.status).toBe(200)

    const body = res.body
    if (!body) throw new Error("no body")
    const events = await collect(parseSSEJson(body))
    expect(events).toEqual([
      { event: "chunk", data: { i: 0 } },
      { event: "chunk", data: { i: 1 } },
      { event: "error", data: { code: "INTERNAL", message: "exploded" } },
    ])
  })
})

describe("createRpcServer — health", () => {
  it("reports the service and pool", async () => {
    const { app } = setup()
    const res = await app.request("/health")
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: "healthy",
      service: "test.Echo",
      pool: { active: 0, queued: 0, completed: 0 },
    })
  })
})

describe("createRpcServer — call pool", () => {
  function singleSlot() {
    const fixture = createEchoService()
    const app = createRpcServer(ECHO_CONTRACT, fixture.service, {
      name: "echo",
      pool: { maxWorkers: 1, maxQueueDepth: 0 },
    })
    return { app, fixture }
  }

  async function openHold(app: ReturnType<typeof singleSlot>["app"]) {
    const res = await app.request("/rpc/test.Echo/Hold", post({}))
    expect(res.status).toBe(200)
    const body = res.body
    if (!body) throw new Error("no body")
    const reader = body.getReader()
    const first = await reader.read()
    expect(first.done).toBe(false)
    return reader
  }

  it("holds the slot while a stream is open", async () => {
    const { app, fixture } = singleSlot()
    const reader = await openHold(app)

    const refused = await app.request("/rpc/test.Echo/Say", post({ text: "hi" }))
    expect(refused.status).toBe(429)
    expect(refused.headers.get("Retry-After")).toBe("1")
    expect(await (await app.request("/health")).json()).toMatchObject({
      pool: { active: 1, queued: 0, completed: 0 },
    })

    fixture.release()
    for (;;) {
      const { done } = await reader.read()
      if (done) break
    }

    expect(await (await app.request("/health")).json()).toMatchObject({
      pool: { active: 0, queued: 0, completed: 1 },
    })
    const accepted = await app.request("/rpc/test.Echo/Say", post({ text: "hi" }))
    expect(accepted.status).toBe(200)
  })

  it("aborts the handler and frees the slot when the caller cancels", async () => {
    const { app, fixture } = singleSlot()
    const reader = await openHold(app)
    expect(fixture.signals).toHaveLength(1)
    expect(fixture.signals[0].aborted).toBe(false)

    await reader.cancel()

    expect(fixture.signals[0].aborted).toBe(true)
    const accepted = await app.request("/rpc/test.Echo/Say", post({ text: "again" }))
    expect(accepted.status).toBe(200)
    expect(await accepted.json()).toEqual({ echo: "again" })
  })
})
