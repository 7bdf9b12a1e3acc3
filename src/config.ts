// src/config.ts — Configuration loader from environment variables

import type { WorkerPoolConfig } from "./rpc/concurrency.js"

export interface GantryConfig {
  gateway: {
    /** External HTTP listener (clients → workflows) */
    httpPort: number
    /** Internal RPC listener (workflows → platform services) */
    rpcPort: number
    host: string
    /** Platform services the gateway forwards to, by routing name */
    services: Record<string, string>
    /** api_path → address */
    workflows: Record<string, string>
  }

  sessions: {
    port: number
    storage: "memory" | "postgres"
    postgres: {
      connectionString: string
      maxConnections: number
    }
  }

  models: {
    port: number
    openai: { apiKey: string; baseURL: string } | null
    anthropic: { apiKey: string; baseURL: string } | null
  }

  /** Per-server handler pool */
  workerPool: WorkerPoolConfig
}

/** Default listen port per service */
export const SERVICE_PORTS = {
  gateway_http: 8080,
  gateway: 50051,
  sessions: 50052,
  models: 50053,
} as const

const VALID_STORAGE = ["memory", "postgres"] as const
type StorageKind = (typeof VALID_STORAGE)[number]

function isStorageKind(value: string): value is StorageKind {
  return VALID_STORAGE.some(kind => kind === value)
}

function parseStorage(value: string | undefined): StorageKind {
  const v = (value ?? "memory").trim().toLowerCase()
  if (isStorageKind(v)) return v
  throw new Error(`SESSION_STORAGE must be one of ${VALID_STORAGE.join(", ")} (got "${value}")`)
}

function parsePort(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
  const raw = env[name]
  if (raw === undefined || raw === "") return fallback
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`${name} must be a port number (got "${raw}")`)
  }
  return port
}

function parsePositiveInt(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
  const raw = env[name]
  if (raw === undefined || raw === "") return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`)
  }
  return n
}

/**
 * Parse WORKFLOWS="/patient-assistant=localhost:8000,/triage=10.0.0.5:8000".
 * Entries without "=" or with an empty side are rejected.
 */
export function parseWorkflows(raw: string | undefined): Record<string, string> {
  const workflows: Record<string, string> = {}
  if (!raw) return workflows
  for (const entry of raw.split(",").map(e => e.trim()).filter(Boolean)) {
    const eq = entry.indexOf("=")
    const path = eq === -1 ? "" : entry.slice(0, eq).trim()
    const address = eq === -1 ? "" : entry.slice(eq + 1).trim()
    if (!path || !address) {
      throw new Error(`WORKFLOWS entry "${entry}" must look like /path=host:port`)
    }
    workflows[path.startsWith("/") ? path : `/${path}`] = address
  }
  return workflows
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GantryConfig {
  const openaiKey = env.OPENAI_API_KEY
  const anthropicKey = env.ANTHROPIC_API_KEY

  return {
    gateway: {
      httpPort: parsePort("GATEWAY_HTTP_PORT", SERVICE_PORTS.gateway_http, env),
      rpcPort: parsePort("GATEWAY_PORT", SERVICE_PORTS.gateway, env),
      host: env.GATEWAY_HOST ?? "0.0.0.0",
      services: {
        sessions: env.SESSIONS_SERVICE_ADDR || `localhost:${SERVICE_PORTS.sessions}`,
        models: env.MODELS_SERVICE_ADDR || `localhost:${SERVICE_PORTS.models}`,
      },
      workflows: parseWorkflows(env.WORKFLOWS),
    },

    sessions: {
      port: parsePort("SESSIONS_PORT", SERVICE_PORTS.sessions, env),
      storage: parseStorage(env.SESSION_STORAGE),
      postgres: {
        connectionString: env.DATABASE_URL ?? "",
        maxConnections: parsePositiveInt("DATABASE_MAX_CONNECTIONS", 10, env),
      },
    },

    models: {
      port: parsePort("MODELS_PORT", SERVICE_PORTS.models, env),
      openai: openaiKey
        ? { apiKey: openaiKey, baseURL: env.OPENAI_BASE_URL || "https://api.openai.com/v1" }
        : null,
      anthropic: anthropicKey
        ? { apiKey: anthropicKey, baseURL: env.ANTHROPIC_BASE_URL || "https://api.anthropic.com" }
        : null,
    },

    workerPool: {
      maxWorkers: parsePositiveInt("RPC_MAX_WORKERS", 10, env),
      maxQueueDepth: parsePositiveInt("RPC_MAX_QUEUE", 100, env),
    },
  }
}
