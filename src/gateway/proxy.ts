// src/gateway/proxy.ts — Generic forwarding proxy for internal calls
//
// Callers address any platform method at POST /rpc/<Service>/<Method> and
// name the backend in the x-target-service header. The dispatch table is
// built once from each service contract (method → forward closure), so a
// method added to a contract is forwarded without touching this file.
// Payloads, response bodies and error envelopes cross the proxy unchanged.

import { Hono } from "hono"
import type { Context } from "hono"
import { CallPool, callPoolMiddleware } from "../rpc/concurrency.js"
import type { WorkerPoolConfig } from "../rpc/concurrency.js"
import { baseUrlFor } from "../rpc/client.js"
import type { FetchLike } from "../rpc/client.js"
import { ROUTING_HEADER, methodPath } from "../rpc/contract.js"
import type { MethodKind, ServiceContract } from "../rpc/contract.js"
import { RpcError, parseRpcErrorEnvelope, toRpcError } from "../rpc/errors.js"
import { rpcErrorResponse } from "../rpc/server.js"
import { MODEL_CONTRACT } from "../models/schema.js"
import { SESSION_CONTRACT } from "../sessions/schema.js"
import type { ServiceRegistry } from "./registry.js"

/** Routing name → contract of every platform service the gateway fronts */
export const PLATFORM_CONTRACTS: Readonly<Record<string, ServiceContract>> = {
  sessions: SESSION_CONTRACT,
  models: MODEL_CONTRACT,
}

// Never copied onto the outbound request
const DROPPED_HEADERS = ["host", "connection", "content-length", "transfer-encoding", "keep-alive", ROUTING_HEADER]

type Forward = (c: Context, address: string) => Promise<Response>

interface DispatchEntry {
  contract: ServiceContract
  methods: Map<string, Forward>
}

export interface GenericProxyOptions {
  registry: ServiceRegistry
  /** Defaults to PLATFORM_CONTRACTS */
  contracts?: Readonly<Record<string, ServiceContract>>
  /** Outbound transport; one request per forwarded call */
  fetch?: FetchLike
}

export class GenericProxy {
  private readonly registry: ServiceRegistry
  private readonly dispatch = new Map<string, DispatchEntry>()
  private readonly _fetch: FetchLike

  constructor(options: GenericProxyOptions) {
    this.registry = options.registry
    this._fetch = options.fetch ?? globalThis.fetch

    for (const [routingName, contract] of Object.entries(options.contracts ?? PLATFORM_CONTRACTS)) {
      const methods = new Map<string, Forward>()
      for (const [method, kind] of Object.entries<MethodKind>(contract.methods)) {
        methods.set(method, this.forwarder(contract, method, kind))
      }
      this.dispatch.set(routingName, { contract, methods })
    }
  }

  /** Routing names the proxy can dispatch to */
  routableServices(): string[] {
    return [...this.dispatch.keys()]
  }

  /**
   * Forward one inbound call. Every failure is returned as an RpcError
   * response; a backend's own error envelope is returned as received.
   */
  async handle(c: Context, service: string, method: string): Promise<Response> {
    try {
      const target = c.req.header(ROUTING_HEADER)
      if (!target) throw new RpcError("INVALID_ARGUMENT", `Missing ${ROUTING_HEADER} metadata`)

      const entry = this.dispatch.get(target)
      if (!entry) throw new RpcError("NOT_FOUND", `Service '${target}' not found`)
      const address = this.registry.resolveService(target)

      const forward = service === entry.contract.service ? entry.methods.get(method) : undefined
      if (!forward) {
        throw new RpcError("UNIMPLEMENTED", `Method /rpc/${service}/${method} is not implemented by ${entry.contract.service}`)
      }
      return await forward(c, address)
    } catch (err) {
      return rpcErrorResponse(c, toRpcError(err, "Proxy failure"))
    }
  }

  private forwarder(contract: ServiceContract, method: string, kind: MethodKind): Forward {
    const path = methodPath(contract, method)
    const label = `${contract.service}/${method}`

    return async (c, address) => {
      const body = await c.req.arrayBuffer()

      let upstream: Response
      try {
        upstream = await this._fetch(`${baseUrlFor(address)}${path}`, {
          method: "POST",
          headers: outboundHeaders(c.req.raw.headers),
          body,
          // Caller disconnect cancels the backend call
          signal: c.req.raw.signal,
        })
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err)
        throw new RpcError("UNAVAILABLE", `Failed to forward ${label} to ${address}: ${detail}`)
      }

      if (!upstream.ok) {
        const text = await upstream.text()
        if (!parseRpcErrorEnvelope(text)) {
          throw new RpcError("INTERNAL", `Unexpected HTTP ${upstream.status} from ${label} at ${address}`)
        }
        return new Response(text, {
          status: upstream.status,
          headers: { "Content-Type": "application/json" },
        })
      }

      if (kind === "server_stream") {
        return new Response(upstream.body, {
          status: 200,
          headers: {
            "Content-Type": "text/event-stream",
            "Cache-Control": "no-cache",
          },
        })
      }
      return new Response(upstream.body, {
        status: 200,
        headers: { "Content-Type": upstream.headers.get("Content-Type") ?? "application/json" },
      })
    }
  }
}

function outboundHeaders(inbound: Headers): Headers {
  const headers = new Headers(inbound)
  for (const name of DROPPED_HEADERS) headers.delete(name)
  if (!headers.has("Content-Type")) headers.set("Content-Type", "application/json")
  return headers
}

export interface ProxyAppOptions {
  pool?: Partial<WorkerPoolConfig>
}

/** The gateway's internal RPC listener */
export function createProxyApp(proxy: GenericProxy, registry: ServiceRegistry, options: ProxyAppOptions = {}): Hono {
  const app = new Hono()
  const pool = new CallPool(options.pool)

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      service: "gateway",
      uptime: process.uptime(),
      pool: pool.stats(),
      routes: proxy.routableServices().map(name => ({ name, registered: registry.hasService(name) })),
    }),
  )

  app.use("/rpc/*", callPoolMiddleware(pool))

  app.post("/rpc/:service/:method", (c) => proxy.handle(c, c.req.param("service"), c.req.param("method")))

  app.notFound((c) => rpcErrorResponse(c, new RpcError("UNIMPLEMENTED", `No route for ${c.req.method} ${c.req.path}`)))

  app.onError((err, c) => rpcErrorResponse(c, toRpcError(err, "Proxy failure")))

  return app
}
