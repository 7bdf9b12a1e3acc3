// tests/config.test.ts — Environment configuration

import { describe, it, expect } from "vitest"
import { loadConfig, parseWorkflows } from "../src/config.js"

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({})

    expect(config.gateway).toEqual({
      httpPort: 8080,
      rpcPort: 50051,
      host: "0.0.0.0",
      services: { sessions: "localhost:50052", models: "localhost:50053" },
      workflows: {},
    })
    expect(config.sessions).toEqual({
      port: 50052,
      storage: "memory",
      postgres: { connectionString: "", maxConnections: 10 },
    })
    expect(config.models).toEqual({ port: 50053, openai: null, anthropic: null })
    expect(config.workerPool).toEqual({ maxWorkers: 10, maxQueueDepth: 100 })
  })

  it("enables providers whose key is set", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://vllm.internal:8000/v1",
      ANTHROPIC_API_KEY: "test-secret",
    })

    expect(config.models.openai).toEqual({ apiKey: "test-secret", baseURL: "http://vllm.internal:8000/v1" })
    expect(config.models.anthropic).toEqual({ apiKey: "test-secret", baseURL: "https://api.anthropic.com" })
  })

  it("reads service addresses, storage and pool sizes", () => {
    const config = loadConfig({
      SESSIONS_SERVICE_ADDR: "sessions:7000",
      SESSION_STORAGE: "Postgres",
      DATABASE_URL: "postgres://localhost/gantry",
      RPC_MAX_WORKERS: "4",
      RPC_MAX_QUEUE: "16",
    })

    expect(config.gateway.services.sessions).toBe("sessions:7000")
    expect(config.sessions.storage).toBe("postgres")
    expect(config.workerPool).toEqual({ maxWorkers: 4, maxQueueDepth: 16 })
  })

  it("throws on invalid values", () => {
    expect(() => loadConfig({ GATEWAY_PORT: "http" })).toThrow('GATEWAY_PORT must be a port number (got "http")')
    expect(() => loadConfig({ MODELS_PORT: "70000" })).toThrow('MODELS_PORT must be a port number (got "70000")')
    expect(() => loadConfig({ RPC_MAX_WORKERS: "0" })).toThrow('RPC_MAX_WORKERS must be a positive integer (got "0")')
    expect(() => loadConfig({ SESSION_STORAGE: "redis" })).toThrow(
      'SESSION_STORAGE must be one of memory, postgres (got "redis")',
    )
  })
})

describe("parseWorkflows", () => {
  it("parses path=address pairs", () => {
    expect(parseWorkflows("/patient-assistant=localhost:8000, triage=10.0.0.5:8000")).toEqual({
      "/patient-assistant": "localhost:8000",
      "/triage": "10.0.0.5:8000",
    })
    expect(parseWorkflows(undefined)).toEqual({})
    expect(parseWorkflows("")).toEqual({})
  })

  it("rejects malformed entries", () => {
    expect(() => parseWorkflows("/triage")).toThrow('WORKFLOWS entry "/triage" must look like /path=host:port')
    expect(() => parseWorkflows("/triage=")).toThrow('WORKFLOWS entry "/triage=" must look like /path=host:port')
  })
})
