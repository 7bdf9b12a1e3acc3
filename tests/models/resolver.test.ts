// tests/models/resolver.test.ts — Model → adapter resolution

import { describe, it, expect } from "vitest"
import { ModelRegistry } from "../../src/models/model-registry.js"
import { ModelResolver } from "../../src/models/resolver.js"
import { RpcError } from "../../src/rpc/errors.js"
import { FakeAdapter } from "../support/fakes.js"

function setup() {
  const openai = new FakeAdapter({ id: "openai", models: ["gpt-4o", "gpt-4o-mini"] })
  const anthropic = new FakeAdapter({ id: "anthropic", models: ["claude-sonnet-4-5", "gpt-4o"] })
  const registry = new ModelRegistry()
  return { openai, anthropic, registry, resolver: new ModelResolver([openai, anthropic], registry) }
}

describe("ModelResolver", () => {
  it("takes the first adapter that lists the model", () => {
    const { resolver, openai, anthropic } = setup()
    expect(resolver.resolveAdapter("gpt-4o")).toBe(openai)
    expect(resolver.resolveAdapter("claude-sonnet-4-5")).toBe(anthropic)
  })

  it("routes a registered model to its adapter_type regardless of listings", () => {
    const { resolver, registry, anthropic } = setup()
    registry.register({ name: "gpt-4o", endpoint: "http://proxy", adapter_type: "anthropic" })
    expect(resolver.resolveAdapter("gpt-4o")).toBe(anthropic)
  })

  it("does not fall through when the registered adapter is not configured", () => {
    const { resolver, registry } = setup()
    registry.register({ name: "gpt-4o", endpoint: "http://x", adapter_type: "vllm" })

    expect(resolver.findAdapter("gpt-4o")).toBeUndefined()
    expect(() => resolver.resolveAdapter("gpt-4o")).toThrow("No provider found for model 'gpt-4o'.")
  })

  it("raises NOT_FOUND for an unknown model", () => {
    const { resolver } = setup()
    let caught: unknown
    try {
      resolver.resolveAdapter("mystery")
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(RpcError)
    expect(caught).toMatchObject({ code: "NOT_FOUND", message: "No provider found for model 'mystery'." })
  })

  it("prefers the first configured default model", () => {
    const registry = new ModelRegistry()
    const anthropicOnly = new ModelResolver([new FakeAdapter({ id: "anthropic", models: [] })], registry)

    expect(setup().resolver.defaultModel()).toBe("gpt-4o")
    expect(anthropicOnly.defaultModel()).toBe("claude-sonnet-4-5")
    expect(() => new ModelResolver([], registry).defaultModel()).toThrow(
      "No model specified and no providers configured.",
    )
  })

  it("reads capabilities from the registration before the adapter", () => {
    const { resolver, registry } = setup()
    expect(resolver.capabilities("gpt-4o").context_window).toBe(8000)

    registry.register({
      name: "gpt-4o",
      endpoint: "e",
      capabilities: { context_window: 1000, supports_vision: true, supports_tools: false },
    })
    expect(resolver.capabilities("gpt-4o")).toEqual({ context_window: 1000, supports_vision: true, supports_tools: false })
    expect(() => resolver.capabilities("mystery")).toThrow("Model 'mystery' not found")
  })

  it("lists discovered models with registrations overriding in place", () => {
    const { resolver, registry } = setup()
    registry.register({ name: "gpt-4o-mini", endpoint: "e", provider: "azure" })
    registry.register({ name: "med-llama", endpoint: "e" })

    expect(resolver.listModels().map(m => [m.name, m.provider])).toEqual([
      ["gpt-4o", "openai"],
      ["gpt-4o-mini", "azure"],
      ["claude-sonnet-4-5", "anthropic"],
      ["med-llama", "custom"],
    ])
  })
})
