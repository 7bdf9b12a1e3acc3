// src/models/model-registry.ts — Explicit model registrations (custom models and overrides)

import type { ModelCapabilities, RegisterModelInput, RegisteredModel } from "./schema.js"

export const DEFAULT_ADAPTER_TYPE = "openai"
export const DEFAULT_PROVIDER = "custom"
export const INITIAL_STATUS = "provisioning"

const NO_CAPABILITIES: ModelCapabilities = { context_window: 0, supports_vision: false, supports_tools: false }

export interface ModelRegistryOptions {
  now?: () => Date
}

/**
 * name → registration. Re-registering a name replaces the earlier entry in
 * place. Entries are never handed out by reference.
 */
export class ModelRegistry {
  private readonly models = new Map<string, RegisteredModel>()
  private readonly now: () => Date

  constructor(options: ModelRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date())
  }

  register(input: RegisterModelInput): RegisteredModel {
    const model: RegisteredModel = {
      name: input.name,
      endpoint: input.endpoint,
      capabilities: { ...(input.capabilities ?? NO_CAPABILITIES) },
      health_check: input.health_check ?? "",
      adapter_type: input.adapter_type || DEFAULT_ADAPTER_TYPE,
      provider: input.provider || DEFAULT_PROVIDER,
      status: INITIAL_STATUS,
      registered_at: this.now().toISOString(),
    }
    this.models.set(model.name, model)
    return copy(model)
  }

  get(name: string): RegisteredModel | undefined {
    const model = this.models.get(name)
    return model ? copy(model) : undefined
  }

  list(): RegisteredModel[] {
    return [...this.models.values()].map(copy)
  }
}

function copy(model: RegisteredModel): RegisteredModel {
  return { ...model, capabilities: { ...model.capabilities } }
}
