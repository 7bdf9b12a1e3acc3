// src/models/providers/anthropic.ts — Anthropic Messages API adapter

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { parseSSEJson } from "../../rpc/sse.js"
import type { FetchLike } from "../../rpc/client.js"
import type { ChatChunk, ChatMessage, ChatResponse, ChatToolCall, FinishReason, ModelInfo, ToolDefinition } from "../schema.js"
import { ProviderError, linkedController } from "./types.js"
import type { ChatCallOptions, ChatInput, ProviderAdapter, ProviderOptions } from "./types.js"

// --- Anthropic API Types ---

interface AnthropicMessage {
  role: "user" | "assistant"
  content: AnthropicContentBlock[]
}

type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "tool_result"; tool_use_id: string; content: string }

interface AnthropicTool {
  name: string
  description: string
  input_schema: Record<string, unknown>
}

interface AnthropicRequest {
  model: string
  max_tokens: number
  messages: AnthropicMessage[]
  system?: string
  tools?: AnthropicTool[]
  stream?: boolean
  temperature?: number
  top_p?: number
  stop_sequences?: string[]
}

const AnthropicUsage = Type.Object({
  input_tokens: Type.Integer(),
  output_tokens: Type.Integer(),
})

const AnthropicResponse = Type.Object({
  model: Type.String(),
  content: Type.Array(
    Type.Union([
      Type.Object({ type: Type.Literal("text"), text: Type.String() }),
      Type.Object({ type: Type.Literal("tool_use"), id: Type.String(), name: Type.String(), input: Type.Unknown() }),
      Type.Object({ type: Type.String() }),
    ]),
  ),
  stop_reason: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  usage: AnthropicUsage,
})

// --- SSE Event Types ---

const SSEMessageStart = Type.Object({
  type: Type.Literal("message_start"),
  message: Type.Object({ usage: AnthropicUsage }),
})

const SSETextDelta = Type.Object({
  type: Type.Literal("content_block_delta"),
  delta: Type.Object({ type: Type.Literal("text_delta"), text: Type.String() }),
})

const SSEMessageDelta = Type.Object({
  type: Type.Literal("message_delta"),
  delta: Type.Object({ stop_reason: Type.Optional(Type.Union([Type.String(), Type.Null()])) }),
  usage: Type.Optional(Type.Object({ output_tokens: Type.Integer() })),
})

const SSEError = Type.Object({
  type: Type.Literal("error"),
  error: Type.Object({ type: Type.String(), message: Type.String() }),
})

// --- Message Format Conversion ---

/** Registered prompt first, then any system messages from the conversation */
function extractSystemMessage(
  messages: ChatMessage[],
  systemPrompt: string | undefined,
): { system: string | undefined; messages: ChatMessage[] } {
  const systemMessages: string[] = []
  const rest: ChatMessage[] = []

  if (systemPrompt) systemMessages.push(systemPrompt)
  for (const msg of messages) {
    if (msg.role === "system") {
      if (msg.content) systemMessages.push(msg.content)
    } else {
      rest.push(msg)
    }
  }

  return {
    system: systemMessages.length > 0 ? systemMessages.join("\n") : undefined,
    messages: rest,
  }
}

function toAnthropicMessages(messages: ChatMessage[]): AnthropicMessage[] {
  const result: AnthropicMessage[] = []

  for (const msg of messages) {
    if (msg.role === "user") {
      result.push({
        role: "user",
        content: [{ type: "text", text: msg.content ?? "" }],
      })
    } else if (msg.role === "assistant") {
      const blocks: AnthropicContentBlock[] = []

      if (msg.content) {
        blocks.push({ type: "text", text: msg.content })
      }

      for (const tc of msg.tool_calls ?? []) {
        let input: unknown
        try {
          input = JSON.parse(tc.function.arguments)
        } catch {
          throw new Error(`Malformed tool arguments for ${tc.function.name}: ${tc.function.arguments.slice(0, 100)}`)
        }
        blocks.push({ type: "tool_use", id: tc.id, name: tc.function.name, input })
      }

      if (blocks.length > 0) {
        result.push({ role: "assistant", content: blocks })
      }
    } else if (msg.role === "tool") {
      if (!msg.tool_call_id) {
        throw new Error("Tool result message missing tool_call_id")
      }
      const toolBlock: AnthropicContentBlock = {
        type: "tool_result",
        tool_use_id: msg.tool_call_id,
        content: msg.content ?? "",
      }

      // Consecutive tool results share one user turn
      const lastMsg = result[result.length - 1]
      if (lastMsg?.role === "user" && lastMsg.content.some(b => b.type === "tool_result")) {
        lastMsg.content.push(toolBlock)
      } else {
        result.push({ role: "user", content: [toolBlock] })
      }
    }
  }

  return result
}

function toAnthropicTools(tools: ToolDefinition[]): AnthropicTool[] {
  return tools.map(t => ({
    name: t.name,
    description: t.description ?? "",
    input_schema: t.parameters ?? { type: "object", properties: {} },
  }))
}

export function mapAnthropicStopReason(reason: string | null | undefined): FinishReason {
  if (reason === "tool_use") return "tool_calls"
  if (reason === "max_tokens") return "length"
  if (reason === "refusal") return "content_filter"
  return "stop" // end_turn, stop_sequence, null
}

const ANTHROPIC_API_VERSION = "2023-06-01"

const ANTHROPIC_MODELS: ModelInfo[] = [
  "claude-sonnet-4-5",
  "claude-haiku-4-5",
  "claude-opus-4-5",
  "claude-opus-4-1",
].map(name => ({
  name,
  provider: "anthropic",
  capabilities: { context_window: 200000, supports_vision: true, supports_tools: true },
}))

// --- AnthropicAdapter ---

export class AnthropicAdapter implements ProviderAdapter {
  readonly id = "anthropic"
  private readonly baseUrl: string
  private readonly apiKey: string
  private readonly _fetch: FetchLike

  constructor(options: ProviderOptions) {
    this.baseUrl = options.baseURL.replace(/\/+$/, "")
    this.apiKey = options.apiKey
    this._fetch = options.fetch ?? globalThis.fetch
  }

  supportedModels(): ModelInfo[] {
    return ANTHROPIC_MODELS.map(m => ({ ...m, capabilities: { ...m.capabilities } }))
  }

  async chat(input: ChatInput, options?: ChatCallOptions): Promise<ChatResponse> {
    const res = await this.post(this.buildRequest(input, false), options?.signal)
    const data: unknown = await res.json()
    if (!Value.Check(AnthropicResponse, data)) {
      throw new ProviderError("Anthropic", res.status, "unexpected response shape")
    }

    let text = ""
    const toolCalls: ChatToolCall[] = []
    for (const block of data.content) {
      if ("text" in block && block.type === "text") {
        text += block.text
      } else if ("id" in block && block.type === "tool_use") {
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input) },
        })
      }
    }

    const { input_tokens, output_tokens } = data.usage
    return {
      text,
      model: data.model,
      provider: this.id,
      usage: {
        prompt_tokens: input_tokens,
        completion_tokens: output_tokens,
        total_tokens: input_tokens + output_tokens,
      },
      tool_calls: toolCalls,
      finish_reason: mapAnthropicStopReason(data.stop_reason),
    }
  }

  async *chatStream(input: ChatInput, options?: ChatCallOptions): AsyncGenerator<ChatChunk> {
    const controller = linkedController(options?.signal)
    let completed = false

    try {
      const res = await this.post(this.buildRequest(input, true), controller.signal)
      if (!res.body) throw new ProviderError("Anthropic", res.status, "response body is null")

      let index = 0
      let inputTokens = 0
      let outputTokens = 0
      let stopReason: string | null = null

      for await (const { data } of parseSSEJson(res.body)) {
        if (Value.Check(SSETextDelta, data)) {
          if (data.delta.text) {
            yield { token: data.delta.text, index }
            index++
          }
        } else if (Value.Check(SSEMessageStart, data)) {
          inputTokens = data.message.usage.input_tokens
          outputTokens = data.message.usage.output_tokens
        } else if (Value.Check(SSEMessageDelta, data)) {
          if (data.delta.stop_reason) stopReason = data.delta.stop_reason
          if (data.usage) outputTokens = data.usage.output_tokens
        } else if (Value.Check(SSEError, data)) {
          throw new Error(`Anthropic stream error (${data.error.type}): ${data.error.message}`)
        }
        // ping, content_block_start/stop, message_stop carry nothing we emit
      }

      completed = true
      yield {
        token: "",
        index,
        finish_reason: mapAnthropicStopReason(stopReason),
        usage: {
          prompt_tokens: inputTokens,
          completion_tokens: outputTokens,
          total_tokens: inputTokens + outputTokens,
        },
      }
    } finally {
      if (!completed) controller.abort()
    }
  }

  private buildRequest(input: ChatInput, stream: boolean): AnthropicRequest {
    const { system, messages } = extractSystemMessage(input.messages, input.system_prompt)
    const req: AnthropicRequest = {
      model: input.model,
      max_tokens: input.config.max_tokens,
      messages: toAnthropicMessages(messages),
    }

    // The API rejects temperature and top_p together; temperature wins
    if (input.config.temperature > 0) {
      req.temperature = input.config.temperature
    } else if (input.config.top_p > 0 && input.config.top_p < 1) {
      req.top_p = input.config.top_p
    }
    if (input.config.stop_sequences.length > 0) req.stop_sequences = input.config.stop_sequences
    if (system) req.system = system
    if (input.tools && input.tools.length > 0) req.tools = toAnthropicTools(input.tools)
    if (stream) req.stream = true
    return req
  }

  private async post(body: AnthropicRequest, signal?: AbortSignal): Promise<Response> {
    const res = await this._fetch(`${this.baseUrl}/v1/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_API_VERSION,
      },
      body: JSON.stringify(body),
      signal,
    })
    if (!res.ok) {
      const errBody = await res.text().catch(() => "")
      throw new ProviderError("Anthropic", res.status, errBody.slice(0, 200))
    }
    return res
  }
}
