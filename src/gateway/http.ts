// src/gateway/http.ts — External HTTP listener (clients → workflows)
// Routing only: the matched workflow address is reported, the body is not forwarded yet.

import { Hono } from "hono"
import { RpcError } from "../rpc/errors.js"
import type { ServiceRegistry } from "./registry.js"

export function createWorkflowApp(registry: ServiceRegistry): Hono {
  const app = new Hono()

  app.get("/health", (c) =>
    c.json({ status: "healthy", service: "gateway-http", uptime: process.uptime(), ...registry.describe() }),
  )

  app.post("*", (c) => {
    const apiPath = c.req.path
    try {
      const address = registry.resolveWorkflow(apiPath)
      return c.json({
        message: `Request routed to workflow at ${address}`,
        api_path: apiPath,
        note: "HTTP forwarding to workflows not yet implemented",
      })
    } catch (err) {
      if (err instanceof RpcError && err.code === "NOT_FOUND") {
        return c.json({ error: err.message }, 404)
      }
      return c.json({ error: err instanceof Error ? err.message : String(err) }, 500)
    }
  })

  app.onError((err, c) => c.json({ error: err.message }, 500))

  return app
}
