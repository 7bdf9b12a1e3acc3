// tests/models/model-registry.test.ts — Explicit model registrations

import { describe, it, expect } from "vitest"
import { ModelRegistry } from "../../src/models/model-registry.js"

describe("ModelRegistry", () => {
  it("applies defaults to a bare registration", () => {
    const registry = new ModelRegistry({ now: () => new Date("2026-03-01T00:00:00.000Z") })
    const model = registry.register({ name: "med-llama", endpoint: "http://llm.internal:8000" })

    expect(model).toEqual({
      name: "med-llama",
      endpoint: "http://llm.internal:8000",
      capabilities: { context_window: 0, supports_vision: false, supports_tools: false },
      health_check: "",
      adapter_type: "openai",
      provider: "custom",
      status: "provisioning",
      registered_at: "2026-03-01T00:00:00.000Z",
    })
  })

  it("treats empty adapter_type and provider as absent", () => {
    const registry = new ModelRegistry()
    const model = registry.register({ name: "m", endpoint: "e", adapter_type: "", provider: "" })
    expect(model.adapter_type).toBe("openai")
    expect(model.provider).toBe("custom")
  })

  it("replaces an earlier registration of the same name", () => {
    const registry = new ModelRegistry()
    registry.register({ name: "m", endpoint: "http://a" })
    registry.register({ name: "other", endpoint: "http://o" })
    registry.register({ name: "m", endpoint: "http://b", adapter_type: "anthropic" })

    expect(registry.list().map(m => [m.name, m.endpoint])).toEqual([
      ["m", "http://b"],
      ["other", "http://o"],
    ])
    expect(registry.get("m")?.adapter_type).toBe("anthropic")
  })

  it("hands out copies", () => {
    const registry = new ModelRegistry()
    registry.register({
      name: "m",
      endpoint: "e",
      capabilities: { context_window: 4096, supports_vision: false, supports_tools: true },
    })

    const first = registry.get("m")
    if (first) first.capabilities.context_window = 1
    expect(registry.get("m")?.capabilities.context_window).toBe(4096)
    expect(registry.get("missing")).toBeUndefined()
  })
})
