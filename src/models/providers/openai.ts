// src/models/providers/openai.ts — OpenAI Chat Completions adapter
// Also serves OpenAI-compatible endpoints through OPENAI_BASE_URL.

import { Type } from "@sinclair/typebox"
import type { Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { parseSSEJson } from "../../rpc/sse.js"
import type { FetchLike } from "../../rpc/client.js"
import type { ChatChunk, ChatMessage, ChatResponse, FinishReason, ModelInfo, ResponseFormat, ToolDefinition } from "../schema.js"
import { ProviderError, emptyUsage, linkedController } from "./types.js"
import type { ChatCallOptions, ChatInput, ProviderAdapter, ProviderOptions } from "./types.js"

// --- OpenAI wire shapes (only the fields read back) ---

const NullableString = Type.Union([Type.String(), Type.Null()])

const OpenAIUsage = Type.Object({
  prompt_tokens: Type.Integer(),
  completion_tokens: Type.Integer(),
  total_tokens: Type.Integer(),
})

const OpenAIToolCall = Type.Object({
  id: Type.String(),
  function: Type.Object({ name: Type.String(), arguments: Type.String() }),
})

const OpenAICompletion = Type.Object({
  model: Type.String(),
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: Type.Optional(NullableString),
        tool_calls: Type.Optional(Type.Array(OpenAIToolCall)),
      }),
      finish_reason: Type.Optional(NullableString),
    }),
    { minItems: 1 },
  ),
  usage: Type.Optional(OpenAIUsage),
})

const OpenAIStreamEvent = Type.Object({
  choices: Type.Array(
    Type.Object({
      delta: Type.Optional(Type.Object({ content: Type.Optional(NullableString) })),
      finish_reason: Type.Optional(NullableString),
    }),
  ),
  usage: Type.Optional(Type.Union([OpenAIUsage, Type.Null()])),
})

type OpenAIUsage = Static<typeof OpenAIUsage>

interface OpenAIRequest {
  model: string
  messages: Array<Record<string, unknown>>
  temperature: number
  max_tokens: number
  top_p: number
  stop?: string[]
  tools?: Array<{ type: "function"; function: { name: string; description: string; parameters: Record<string, unknown> } }>
  response_format?: Record<string, unknown>
  stream?: boolean
  stream_options?: { include_usage: boolean }
}

// --- Conversion ---

function toOpenAIMessage(message: ChatMessage): Record<string, unknown> {
  const data: Record<string, unknown> = { role: message.role, content: message.content ?? "" }
  if (message.tool_calls && message.tool_calls.length > 0) data.tool_calls = message.tool_calls
  if (message.tool_call_id) data.tool_call_id = message.tool_call_id
  if (message.name) data.name = message.name
  return data
}

function toOpenAITool(tool: ToolDefinition): NonNullable<OpenAIRequest["tools"]>[number] {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description ?? "",
      parameters: tool.parameters ?? {},
    },
  }
}

function toOpenAIResponseFormat(format: ResponseFormat): Record<string, unknown> {
  const payload: Record<string, unknown> = { type: format.type }
  if (format.schema) payload.json_schema = format.schema
  return payload
}

export function mapOpenAIFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case "length":
      return "length"
    case "tool_calls":
    case "function_call":
      return "tool_calls"
    case "content_filter":
      return "content_filter"
    default:
      return "stop"
  }
}

function toUsage(usage: OpenAIUsage | null | undefined): ChatResponse["usage"] {
  if (!usage) return emptyUsage()
  return {
    prompt_tokens: usage.prompt_tokens,
    completion_tokens: usage.completion_tokens,
    total_tokens: usage.total_tokens,
  }
}

const OPENAI_MODELS: ModelInfo[] = [
  { name: "gpt-4o", provider: "openai", capabilities: { context_window: 128000, supports_vision: true, supports_tools: true } },
  { name: "gpt-4o-mini", provider: "openai", capabilities: { context_window: 128000, supports_vision: true, supports_tools: true } },
]

// --- OpenAIAdapter ---

export class OpenAIAdapter implements ProviderAdapter {
  readonly id = "openai"
  private readonly baseUrl: string
  private readonly apiKey: string
  private readonly _fetch: FetchLike

  constructor(options: ProviderOptions) {
    this.baseUrl = options.baseURL.replace(/\/+$/, "")
    this.apiKey = options.apiKey
    this._fetch = options.fetch ?? globalThis.fetch
  }

  supportedModels(): ModelInfo[] {
    return OPENAI_MODELS.map(m => ({ ...m, capabilities: { ...m.capabilities } }))
  }

  async chat(input: ChatInput, options?: ChatCallOptions): Promise<ChatResponse> {
    const res = await this.post(this.buildRequest(input, false), options?.signal)
    const data: unknown = await res.json()
    if (!Value.Check(OpenAICompletion, data)) {
      throw new ProviderError("OpenAI", res.status, "unexpected response shape")
    }

    const choice = data.choices[0]
    return {
      text: choice.message.content ?? "",
      model: data.model,
      provider: this.id,
      usage: toUsage(data.usage),
      tool_calls: (choice.message.tool_calls ?? []).map(tc => ({
        id: tc.id,
        type: "function" as const,
        function: { name: tc.function.name, arguments: tc.function.arguments },
      })),
      finish_reason: mapOpenAIFinishReason(choice.finish_reason),
    }
  }

  async *chatStream(input: ChatInput, options?: ChatCallOptions): AsyncGenerator<ChatChunk> {
    const controller = linkedController(options?.signal)
    let completed = false

    try {
      const res = await this.post(this.buildRequest(input, true), controller.signal)
      if (!res.body) throw new ProviderError("OpenAI", res.status, "response body is null")

      let index = 0
      let finish: string | null = null
      let usage: OpenAIUsage | null = null

      for await (const { data } of parseSSEJson(res.body)) {
        if (!Value.Check(OpenAIStreamEvent, data)) continue
        if (data.usage) usage = data.usage

        // The usage-only event at the end has no choices
        const choice = data.choices[0]
        if (!choice) continue
        const token = choice.delta?.content
        if (token) {
          yield { token, index }
          index++
        }
        if (choice.finish_reason) finish = choice.finish_reason
      }

      const final: ChatChunk = { token: "", index, finish_reason: mapOpenAIFinishReason(finish) }
      if (usage) final.usage = toUsage(usage)
      completed = true
      yield final
    } finally {
      if (!completed) controller.abort()
    }
  }

  private buildRequest(input: ChatInput, stream: boolean): OpenAIRequest {
    const messages = input.messages.map(toOpenAIMessage)
    if (input.system_prompt) {
      messages.unshift({ role: "system", content: input.system_prompt })
    }

    const req: OpenAIRequest = {
      model: input.model,
      messages,
      temperature: input.config.temperature,
      max_tokens: input.config.max_tokens,
      top_p: input.config.top_p,
    }
    if (input.config.stop_sequences.length > 0) req.stop = input.config.stop_sequences
    if (input.tools && input.tools.length > 0) req.tools = input.tools.map(toOpenAITool)
    if (input.response_format) req.response_format = toOpenAIResponseFormat(input.response_format)
    if (stream) {
      req.stream = true
      req.stream_options = { include_usage: true }
    }
    return req
  }

  private async post(body: OpenAIRequest, signal?: AbortSignal): Promise<Response> {
    const res = await this._fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal,
    })
    if (!res.ok) {
      const errBody = await res.text().catch(() => "")
      throw new ProviderError("OpenAI", res.status, errBody.slice(0, 200))
    }
    return res
  }
}
