// src/sessions/factory.ts — Pick the session storage backend from configuration

import type { GantryConfig } from "../config.js"
import { InMemorySessionStore } from "./memory-store.js"
import { PostgresSessionStore } from "./pg-store.js"
import type { SessionStore } from "./store.js"

export function createSessionStore(config: Pick<GantryConfig, "sessions">): SessionStore {
  const { storage, postgres } = config.sessions
  if (storage === "postgres") {
    if (!postgres.connectionString) {
      throw new Error("SESSION_STORAGE=postgres requires DATABASE_URL")
    }
    console.log(`[sessions] storage backend: postgres (max ${postgres.maxConnections} connections)`)
    return new PostgresSessionStore({
      connectionString: postgres.connectionString,
      maxConnections: postgres.maxConnections,
    })
  }
  console.log("[sessions] storage backend: in-memory (not durable)")
  return new InMemorySessionStore()
}
