// src/models/service.ts — Model service handlers
//
// Chat flow: model (or default) → adapter → named system prompt → config
// with defaults → adapter call. Every lookup failure is raised before the
// vendor is contacted.

import { serverStream, unary } from "../rpc/contract.js"
import type { CallContext, ServiceImplementation } from "../rpc/contract.js"
import { RpcError, toRpcError } from "../rpc/errors.js"
import type { ModelRegistry } from "./model-registry.js"
import type { PromptRegistry } from "./prompt-registry.js"
import type { ChatInput, ProviderAdapter } from "./providers/types.js"
import type { ModelResolver } from "./resolver.js"
import {
  ChatRequest,
  GetModelCapabilitiesRequest,
  GetModelStatusRequest,
  GetPromptRequest,
  ListModelsRequest,
  ListPromptsRequest,
  ListRegisteredModelsRequest,
  RegisterModelRequest,
  RegisterPromptRequest,
} from "./schema.js"
import type { ChatChunk, ChatConfig, ChatRequestBody, ModelContract } from "./schema.js"

export const DEFAULT_CHAT_CONFIG: Readonly<ChatConfig> = Object.freeze({
  temperature: 0.7,
  max_tokens: 512,
  top_p: 1.0,
  stop_sequences: [],
})

export interface ModelServiceDeps {
  resolver: ModelResolver
  registry: ModelRegistry
  prompts: PromptRegistry
}

export function createModelService(deps: ModelServiceDeps): ServiceImplementation<ModelContract> {
  const { resolver, registry, prompts } = deps

  function prepareChat(req: ChatRequestBody): { adapter: ProviderAdapter; input: ChatInput } {
    const model = req.model || resolver.defaultModel()
    const adapter = resolver.resolveAdapter(model)

    let systemPrompt: string | undefined
    if (req.system_prompt_name) {
      const prompt = prompts.get(req.system_prompt_name)
      if (!prompt) throw new RpcError("NOT_FOUND", `Prompt '${req.system_prompt_name}' not found`)
      systemPrompt = prompt.content
    }

    const input: ChatInput = {
      model,
      messages: req.messages,
      config: {
        temperature: req.config?.temperature ?? DEFAULT_CHAT_CONFIG.temperature,
        max_tokens: req.config?.max_tokens ?? DEFAULT_CHAT_CONFIG.max_tokens,
        top_p: req.config?.top_p ?? DEFAULT_CHAT_CONFIG.top_p,
        stop_sequences: [...(req.config?.stop_sequences ?? DEFAULT_CHAT_CONFIG.stop_sequences)],
      },
    }
    if (req.tools) input.tools = req.tools
    if (req.response_format) input.response_format = req.response_format
    if (systemPrompt !== undefined) input.system_prompt = systemPrompt
    return { adapter, input }
  }

  async function* streamChat(req: ChatRequestBody, ctx: CallContext): AsyncGenerator<ChatChunk> {
    const { adapter, input } = prepareChat(req)
    try {
      yield* adapter.chatStream(input, { signal: ctx.signal })
    } catch (err) {
      throw toRpcError(err, "Failed to stream chat response")
    }
  }

  return {
    Chat: unary(ChatRequest, async (req, ctx) => {
      const { adapter, input } = prepareChat(req)
      try {
        return await adapter.chat(input, { signal: ctx.signal })
      } catch (err) {
        throw toRpcError(err, "Failed to generate chat response")
      }
    }),

    ChatStream: serverStream(ChatRequest, streamChat),

    ListModels: unary(ListModelsRequest, async () => ({ models: resolver.listModels() })),

    GetModelCapabilities: unary(GetModelCapabilitiesRequest, async (req) => resolver.capabilities(req.model)),

    RegisterPrompt: unary(RegisterPromptRequest, async (req) => {
      const prompt = prompts.register(req.name, req.content, req.metadata)
      console.log(`[models] prompt registered: ${prompt.name} v${prompt.version}`)
      return { name: prompt.name, version: prompt.version, created_at: prompt.created_at }
    }),

    GetPrompt: unary(GetPromptRequest, async (req) => {
      const prompt = prompts.get(req.name, req.version)
      if (!prompt) throw new RpcError("NOT_FOUND", `Prompt '${req.name}' not found`)
      return prompt
    }),

    ListPrompts: unary(ListPromptsRequest, async () => ({ prompts: prompts.listLatest() })),

    RegisterModel: unary(RegisterModelRequest, async (req) => {
      const model = registry.register(req)
      console.log(`[models] model registered: ${model.name} (adapter=${model.adapter_type}, provider=${model.provider})`)
      return { name: model.name, status: model.status, registered_at: model.registered_at }
    }),

    ListRegisteredModels: unary(ListRegisteredModelsRequest, async () => ({ models: registry.list() })),

    GetModelStatus: unary(GetModelStatusRequest, async (req) => {
      const model = registry.get(req.name)
      if (!model) throw new RpcError("NOT_FOUND", `Model '${req.name}' not registered`)
      return {
        name: model.name,
        status: model.status,
        // No health checking; the registration time is the last observation
        last_checked: model.registered_at,
        endpoint: model.endpoint,
      }
    }),
  }
}
