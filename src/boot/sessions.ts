// src/boot/sessions.ts — Session service entry point

import { loadConfig } from "../config.js"
import { createSessionStore } from "../sessions/factory.js"
import { PostgresSessionStore } from "../sessions/pg-store.js"
import { SESSION_CONTRACT } from "../sessions/schema.js"
import { createSessionService } from "../sessions/service.js"
import { createRpcServer } from "../rpc/server.js"
import { installShutdown, listen } from "./serve.js"

async function main() {
  console.log("[sessions] booting...")
  const config = loadConfig()

  const store = createSessionStore(config)
  if (store instanceof PostgresSessionStore) {
    await store.init()
    console.log("[sessions] database schema ready")
  }
  const app = createRpcServer(SESSION_CONTRACT, createSessionService(store), {
    name: "sessions",
    pool: config.workerPool,
  })

  const server = listen(app, "sessions", config.sessions.port)
  installShutdown("sessions", [server], () => store.close())
}

main().catch((err) => {
  console.error("[sessions] fatal:", err)
  process.exit(1)
})
