// src/models/providers/types.ts — Provider adapter port

import type {
  ChatChunk,
  ChatConfig,
  ChatMessage,
  ChatResponse,
  ModelInfo,
  ResponseFormat,
  ToolDefinition,
} from "../schema.js"
import type { FetchLike } from "../../rpc/client.js"

/** A fully resolved chat call, ready for one vendor request */
export interface ChatInput {
  model: string
  messages: ChatMessage[]
  config: ChatConfig
  tools?: ToolDefinition[]
  response_format?: ResponseFormat
  /** Content of a registered system prompt, placed ahead of the conversation */
  system_prompt?: string
}

export interface ChatCallOptions {
  signal?: AbortSignal
}

/**
 * One per vendor. Adapters make exactly one vendor request per call and
 * never retry.
 */
export interface ProviderAdapter {
  /** Identifier matched against a registration's adapter_type */
  readonly id: string

  chat(input: ChatInput, options?: ChatCallOptions): Promise<ChatResponse>

  /**
   * Lazy, single-consumer fragment sequence. The final fragment carries an
   * empty token, the finish reason and usage totals. Returning early or
   * aborting the signal closes the vendor request.
   */
  chatStream(input: ChatInput, options?: ChatCallOptions): AsyncGenerator<ChatChunk>

  /** Built-in models this adapter serves without registration */
  supportedModels(): ModelInfo[]
}

export interface ProviderOptions {
  apiKey: string
  baseURL: string
  fetch?: FetchLike
}

export class ProviderError extends Error {
  constructor(
    readonly provider: string,
    readonly status: number,
    detail: string,
  ) {
    super(`${provider} API error ${status}: ${detail}`)
    this.name = "ProviderError"
  }
}

/** Link an optional caller signal to a fresh controller owned by one vendor request */
export function linkedController(signal?: AbortSignal): AbortController {
  const controller = new AbortController()
  if (signal) {
    if (signal.aborted) controller.abort()
    else signal.addEventListener("abort", () => controller.abort(), { once: true })
  }
  return controller
}

export function emptyUsage(): ChatResponse["usage"] {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 }
}
