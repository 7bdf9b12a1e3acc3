// src/models/resolver.ts — Which adapter serves a model, and with what capabilities
//
// Resolution order for a name:
//   1. Explicit registration → the adapter whose id equals its adapter_type.
//      An unconfigured adapter_type fails; it does not fall through.
//   2. Adapters in priority order, first exact match in supportedModels().
//   3. NOT_FOUND.

import { RpcError } from "../rpc/errors.js"
import type { ModelRegistry } from "./model-registry.js"
import { DEFAULT_MODELS } from "./providers/index.js"
import type { ProviderAdapter } from "./providers/types.js"
import type { ModelCapabilities, ModelInfo } from "./schema.js"

export class ModelResolver {
  private readonly byId = new Map<string, ProviderAdapter>()

  constructor(
    private readonly adapters: ProviderAdapter[],
    private readonly registry: ModelRegistry,
  ) {
    for (const adapter of adapters) this.byId.set(adapter.id, adapter)
  }

  /** Adapter ids in priority order */
  adapterIds(): string[] {
    return this.adapters.map(a => a.id)
  }

  /** Default model for a chat that names none */
  defaultModel(): string {
    for (const [adapterId, model] of DEFAULT_MODELS) {
      if (this.byId.has(adapterId)) return model
    }
    throw new RpcError("FAILED_PRECONDITION", "No model specified and no providers configured.")
  }

  /** Returns undefined when nothing serves the name */
  findAdapter(model: string): ProviderAdapter | undefined {
    const registered = this.registry.get(model)
    if (registered) return this.byId.get(registered.adapter_type)

    return this.adapters.find(adapter => adapter.supportedModels().some(info => info.name === model))
  }

  resolveAdapter(model: string): ProviderAdapter {
    const adapter = this.findAdapter(model)
    if (!adapter) throw new RpcError("NOT_FOUND", `No provider found for model '${model}'.`)
    return adapter
  }

  capabilities(model: string): ModelCapabilities {
    const registered = this.registry.get(model)
    if (registered) return registered.capabilities

    for (const adapter of this.adapters) {
      const info = adapter.supportedModels().find(m => m.name === model)
      if (info) return info.capabilities
    }
    throw new RpcError("NOT_FOUND", `Model '${model}' not found`)
  }

  /**
   * Auto-discovered models first, in adapter order; a registration with the
   * same name replaces the discovered entry in its position, new names follow.
   */
  listModels(): ModelInfo[] {
    const byName = new Map<string, ModelInfo>()
    for (const adapter of this.adapters) {
      for (const info of adapter.supportedModels()) {
        // First adapter wins, matching resolution order
        if (!byName.has(info.name)) byName.set(info.name, info)
      }
    }
    for (const registered of this.registry.list()) {
      byName.set(registered.name, {
        name: registered.name,
        provider: registered.provider,
        capabilities: registered.capabilities,
      })
    }
    return [...byName.values()]
  }
}
