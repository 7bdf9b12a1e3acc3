// tests/sessions/service.test.ts — Session service over the RPC layer

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { createRpcServer } from "../../src/rpc/server.js"
import { RpcError } from "../../src/rpc/errors.js"
import { SESSION_CONTRACT } from "../../src/sessions/schema.js"
import { createSessionService } from "../../src/sessions/service.js"
import { InMemorySessionStore } from "../../src/sessions/memory-store.js"
import type { SessionStore } from "../../src/sessions/store.js"
import { SessionClient } from "../../src/sdk/sessions.js"
import { routeTo } from "../support/fakes.js"

function serve(store: SessionStore) {
  const app = createRpcServer(SESSION_CONTRACT, createSessionService(store), { name: "sessions" })
  const client = new SessionClient({ address: "sessions:50052", fetch: routeTo({ "sessions:50052": app }) })
  return { app, client }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("SessionService", () => {
  let store: InMemorySessionStore
  let client: SessionClient
  let app: ReturnType<typeof serve>["app"]

  beforeEach(() => {
    let n = 0
    store = new InMemorySessionStore({ generateId: () => `sess_${++n}` })
    ;({ app, client } = serve(store))
  })

  it("creates and re-reads a session", async () => {
    const created = await client.getOrCreate("patient-7")
    expect(created.session_id).toBe("sess_1")
    expect(created.user_id).toBe("patient-7")

    const again = await client.getOrCreate("patient-7", "sess_1")
    expect(again.session_id).toBe("sess_1")
    expect(again.created_at).toBe(created.created_at)
  })

  it("treats an empty session_id as absent", async () => {
    const res = await app.request("/rpc/sessions.SessionService/GetOrCreateSession", {
      method: "POST",
      body: JSON.stringify({ user_id: "patient-7", session_id: "" }),
    })
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ session: { session_id: "sess_1", user_id: "patient-7" } })
  })

  it("returns messages 3–4 and the full count for limit 2, offset 2", async () => {
    const { session_id } = await client.getOrCreate("patient-7")
    const appended = await client.addMessages(
      session_id,
      ["one", "two", "three", "four", "five", "six"].map(content => ({ role: "user" as const, content })),
    )
    expect(appended).toBe(6)

    const page = await client.getMessages(session_id, { limit: 2, offset: 2 })
    expect(page.total_count).toBe(6)
    expect(page.messages.map(m => m.content)).toEqual(["three", "four"])
  })

  it("round-trips a list value unchanged", async () => {
    expect(await client.saveMemory("patient-7", "allergies", ["penicillin", "latex"])).toBe(true)
    const memories = await client.getMemory("patient-7", "allergies")
    expect(memories).toEqual({ allergies: ["penicillin", "latex"] })
  })

  it("empties the log on delete while global memory stays", async () => {
    const { session_id } = await client.getOrCreate("patient-7")
    await client.addMessages(session_id, [{ role: "user", content: "hello" }])
    await client.saveMemory("patient-7", "language", "es")

    const [deleted, memories] = await Promise.all([
      client.deleteSession(session_id),
      client.getMemory("patient-7"),
    ])
    expect(deleted).toBe(true)
    expect(memories).toEqual({ language: "es" })

    expect(await client.getMessages(session_id)).toEqual({ messages: [], total_count: 0 })
    expect(await client.getMemory("patient-7")).toEqual({ language: "es" })
  })

  it("scopes memory by session and clears across scopes", async () => {
    await client.saveMemory("patient-7", "step", 1)
    await client.saveMemory("patient-7", "step", 2, { sessionId: "intake" })

    expect(await client.getMemory("patient-7", "step", { sessionId: "intake" })).toEqual({ step: 2 })
    expect(await client.deleteMemory("patient-7", "step")).toBe(true)
    expect(await client.getMemory("patient-7", "step", { sessionId: "intake" })).toEqual({ step: 2 })
    expect(await client.clearUserMemory("patient-7")).toBe(1)
  })

  it("reports appending to an unknown session as INTERNAL", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
    const err = await client.addMessages("ghost", [{ role: "user", content: "hi" }]).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(RpcError)
    expect(err).toMatchObject({ code: "INTERNAL", message: "Failed to add messages: Session 'ghost' not found" })
    expect(errorSpy).toHaveBeenCalledTimes(1)
  })

  it("rejects requests missing required fields", async () => {
    const res = await app.request("/rpc/sessions.SessionService/SaveMemory", {
      method: "POST",
      body: JSON.stringify({ user_id: "patient-7", value: 1 }),
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: "INVALID_ARGUMENT" })
  })

  it("rejects a negative page offset", async () => {
    await expect(client.getMessages("s", { offset: -1 })).rejects.toMatchObject({ code: "INVALID_ARGUMENT" })
  })
})

describe("SessionService — storage failures", () => {
  it("prefixes unexpected store errors with the operation", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {})
    const broken = new InMemorySessionStore()
    vi.spyOn(broken, "getMemory").mockRejectedValue(new Error("connection terminated"))
    const { client } = serve(broken)

    await expect(client.getMemory("patient-7")).rejects.toMatchObject({
      code: "INTERNAL",
      message: "Failed to get memory: connection terminated",
    })
  })
})
