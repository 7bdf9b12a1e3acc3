// src/boot/serve.ts — Listen and graceful shutdown shared by every service entry point

import { serve } from "@hono/node-server"
import type { ServerType } from "@hono/node-server"
import type { Hono } from "hono"

const FORCE_EXIT_MS = 30_000

export function listen(app: Hono, name: string, port: number, hostname = "0.0.0.0"): ServerType {
  return serve({ fetch: app.fetch, port, hostname }, (info) => {
    console.log(`[${name}] listening on :${info.port}`)
  })
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err?: Error) => (err ? reject(err) : resolve()))
  })
}

/**
 * Close listeners first so no new calls arrive, then release owned
 * resources. A second signal, or a shutdown that outlives the timer,
 * exits immediately.
 */
export function installShutdown(name: string, servers: ServerType[], cleanup: () => Promise<void> = async () => {}): void {
  let shuttingDown = false

  const gracefulShutdown = async (signal: string) => {
    const start = Date.now()
    console.log(`[${name}] ${signal} received, shutting down gracefully...`)

    const results = await Promise.allSettled(servers.map(closeServer))
    for (const result of results) {
      if (result.status === "rejected") console.error(`[${name}] listener close error:`, result.reason)
    }

    try {
      await cleanup()
    } catch (err) {
      console.error(`[${name}] cleanup failed:`, err)
    }

    console.log(`[${name}] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    if (shuttingDown) {
      console.error(`[${name}] second ${signal}, exiting now`)
      process.exit(1)
    }
    shuttingDown = true
    setTimeout(() => {
      console.error(`[${name}] forced shutdown after ${FORCE_EXIT_MS / 1000}s timeout`)
      process.exit(1)
    }, FORCE_EXIT_MS).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      console.error(`[${name}] shutdown failed:`, err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}
