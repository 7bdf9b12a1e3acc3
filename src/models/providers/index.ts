// src/models/providers/index.ts — Configured provider adapters, in priority order

import type { GantryConfig } from "../../config.js"
import type { FetchLike } from "../../rpc/client.js"
import { AnthropicAdapter } from "./anthropic.js"
import { OpenAIAdapter } from "./openai.js"
import type { ProviderAdapter } from "./types.js"

export { AnthropicAdapter } from "./anthropic.js"
export { OpenAIAdapter } from "./openai.js"
export type { ChatInput, ChatCallOptions, ProviderAdapter, ProviderOptions } from "./types.js"
export { ProviderError } from "./types.js"

/** Model picked when a chat names none, by adapter id, in priority order */
export const DEFAULT_MODELS: ReadonlyArray<readonly [adapterId: string, model: string]> = [
  ["openai", "gpt-4o"],
  ["anthropic", "claude-sonnet-4-5"],
]

/**
 * Build one adapter per vendor with credentials. The returned order
 * (openai, then anthropic) is the auto-discovery scan order.
 */
export function createProviderAdapters(
  config: GantryConfig["models"],
  options: { fetch?: FetchLike } = {},
): ProviderAdapter[] {
  const adapters: ProviderAdapter[] = []
  if (config.openai) {
    adapters.push(new OpenAIAdapter({ ...config.openai, fetch: options.fetch }))
  }
  if (config.anthropic) {
    adapters.push(new AnthropicAdapter({ ...config.anthropic, fetch: options.fetch }))
  }
  return adapters
}
