// src/gateway/server.ts — Gateway assembly: one registry, two listeners

import type { Hono } from "hono"
import type { GantryConfig } from "../config.js"
import type { FetchLike } from "../rpc/client.js"
import { createWorkflowApp } from "./http.js"
import { GenericProxy, createProxyApp } from "./proxy.js"
import { ServiceRegistry } from "./registry.js"

export interface Gateway {
  registry: ServiceRegistry
  proxy: GenericProxy
  /** External listener, routed by URL path */
  httpApp: Hono
  /** Internal listener, routed by x-target-service */
  rpcApp: Hono
}

export interface GatewayOptions {
  /** Outbound transport for forwarded calls */
  fetch?: FetchLike
}

/** Build both listeners over one registry seeded from configuration */
export function createGateway(config: Pick<GantryConfig, "gateway" | "workerPool">, options: GatewayOptions = {}): Gateway {
  const registry = new ServiceRegistry()
  for (const [name, address] of Object.entries(config.gateway.services)) {
    registry.registerService(name, address)
  }
  for (const [apiPath, address] of Object.entries(config.gateway.workflows)) {
    registry.registerWorkflow(apiPath, address)
  }

  const proxy = new GenericProxy({ registry, fetch: options.fetch })

  return {
    registry,
    proxy,
    httpApp: createWorkflowApp(registry),
    rpcApp: createProxyApp(proxy, registry, { pool: config.workerPool }),
  }
}
