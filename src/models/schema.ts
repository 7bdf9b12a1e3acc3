// src/models/schema.ts — Model service wire schemas and contract

import { Type } from "@sinclair/typebox"
import type { Static } from "@sinclair/typebox"
import { defineContract } from "../rpc/contract.js"

export const MODEL_CONTRACT = defineContract("models.ModelService", {
  Chat: "unary",
  ChatStream: "server_stream",
  ListModels: "unary",
  GetModelCapabilities: "unary",
  RegisterPrompt: "unary",
  GetPrompt: "unary",
  ListPrompts: "unary",
  RegisterModel: "unary",
  ListRegisteredModels: "unary",
  GetModelStatus: "unary",
})

export type ModelContract = typeof MODEL_CONTRACT

const NonEmpty = Type.String({ minLength: 1 })

// --- Models ---

export const ModelCapabilitiesSchema = Type.Object({
  context_window: Type.Integer({ minimum: 0 }),
  supports_vision: Type.Boolean(),
  supports_tools: Type.Boolean(),
})
export type ModelCapabilities = Static<typeof ModelCapabilitiesSchema>

export const ModelInfoSchema = Type.Object({
  name: Type.String(),
  provider: Type.String(),
  capabilities: ModelCapabilitiesSchema,
})
export type ModelInfo = Static<typeof ModelInfoSchema>

export const RegisteredModelSchema = Type.Object({
  name: Type.String(),
  endpoint: Type.String(),
  capabilities: ModelCapabilitiesSchema,
  health_check: Type.String(),
  /** Which provider adapter serves this model */
  adapter_type: Type.String(),
  /** Display name, "custom" unless given */
  provider: Type.String(),
  status: Type.String(),
  registered_at: Type.String(),
})
export type RegisteredModel = Static<typeof RegisteredModelSchema>

export const ModelStatusSchema = Type.Object({
  name: Type.String(),
  status: Type.String(),
  last_checked: Type.String(),
  endpoint: Type.String(),
})
export type ModelStatus = Static<typeof ModelStatusSchema>

// --- Prompts ---

export const PromptMetadataSchema = Type.Object({
  author: Type.String(),
  reviewed_by: Type.String(),
  tags: Type.Array(Type.String()),
})
export type PromptMetadata = Static<typeof PromptMetadataSchema>

export const PromptSchema = Type.Object({
  name: Type.String(),
  version: Type.Integer({ minimum: 1 }),
  content: Type.String(),
  metadata: PromptMetadataSchema,
  created_at: Type.String(),
})
export type Prompt = Static<typeof PromptSchema>

// --- Chat ---

export const ChatToolCallSchema = Type.Object({
  id: Type.String(),
  type: Type.Literal("function"),
  function: Type.Object({
    name: Type.String(),
    arguments: Type.String(), // JSON-encoded
  }),
})
export type ChatToolCall = Static<typeof ChatToolCallSchema>

export const ChatMessageSchema = Type.Object({
  role: Type.Union([
    Type.Literal("system"),
    Type.Literal("user"),
    Type.Literal("assistant"),
    Type.Literal("tool"),
  ]),
  content: Type.Optional(Type.String()),
  tool_calls: Type.Optional(Type.Array(ChatToolCallSchema)),
  tool_call_id: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
})
export type ChatMessage = Static<typeof ChatMessageSchema>

export const ChatConfigSchema = Type.Object({
  temperature: Type.Number({ minimum: 0 }),
  max_tokens: Type.Integer({ minimum: 1 }),
  top_p: Type.Number({ minimum: 0, maximum: 1 }),
  stop_sequences: Type.Array(Type.String()),
})
export type ChatConfig = Static<typeof ChatConfigSchema>

export const ToolDefinitionSchema = Type.Object({
  name: NonEmpty,
  description: Type.Optional(Type.String()),
  /** JSON Schema of the arguments object */
  parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})
export type ToolDefinition = Static<typeof ToolDefinitionSchema>

export const ResponseFormatSchema = Type.Object({
  type: Type.Union([Type.Literal("text"), Type.Literal("json_object"), Type.Literal("json_schema")]),
  schema: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})
export type ResponseFormat = Static<typeof ResponseFormatSchema>

export const FinishReasonSchema = Type.Union([
  Type.Literal("stop"),
  Type.Literal("length"),
  Type.Literal("tool_calls"),
  Type.Literal("content_filter"),
])
export type FinishReason = Static<typeof FinishReasonSchema>

export const TokenUsageSchema = Type.Object({
  prompt_tokens: Type.Integer({ minimum: 0 }),
  completion_tokens: Type.Integer({ minimum: 0 }),
  total_tokens: Type.Integer({ minimum: 0 }),
})
export type TokenUsage = Static<typeof TokenUsageSchema>

export const ChatResponseSchema = Type.Object({
  text: Type.String(),
  model: Type.String(),
  provider: Type.String(),
  usage: TokenUsageSchema,
  tool_calls: Type.Array(ChatToolCallSchema),
  finish_reason: FinishReasonSchema,
})
export type ChatResponse = Static<typeof ChatResponseSchema>

/** One streamed fragment; the last one has an empty token, the finish reason and usage */
export const ChatChunkSchema = Type.Object({
  token: Type.String(),
  index: Type.Integer({ minimum: 0 }),
  finish_reason: Type.Optional(FinishReasonSchema),
  usage: Type.Optional(TokenUsageSchema),
})
export type ChatChunk = Static<typeof ChatChunkSchema>

// --- Requests ---

export const ChatRequest = Type.Object({
  /** Empty or omitted selects the default model */
  model: Type.Optional(Type.String()),
  messages: Type.Array(ChatMessageSchema, { minItems: 1 }),
  system_prompt_name: Type.Optional(Type.String()),
  /** Omitted fields take the defaults */
  config: Type.Optional(Type.Partial(ChatConfigSchema)),
  tools: Type.Optional(Type.Array(ToolDefinitionSchema)),
  response_format: Type.Optional(ResponseFormatSchema),
})
export type ChatRequestBody = Static<typeof ChatRequest>

export const ListModelsRequest = Type.Object({})

export const GetModelCapabilitiesRequest = Type.Object({
  model: NonEmpty,
})

export const RegisterPromptRequest = Type.Object({
  name: NonEmpty,
  content: Type.String(),
  metadata: Type.Optional(Type.Partial(PromptMetadataSchema)),
})

export const GetPromptRequest = Type.Object({
  name: NonEmpty,
  /** 0 or omitted = latest */
  version: Type.Optional(Type.Integer({ minimum: 0 })),
})

export const ListPromptsRequest = Type.Object({})

export const RegisterModelRequest = Type.Object({
  name: NonEmpty,
  endpoint: Type.String(),
  capabilities: Type.Optional(ModelCapabilitiesSchema),
  health_check: Type.Optional(Type.String()),
  adapter_type: Type.Optional(Type.String()),
  provider: Type.Optional(Type.String()),
})
export type RegisterModelInput = Static<typeof RegisterModelRequest>

export const ListRegisteredModelsRequest = Type.Object({})

export const GetModelStatusRequest = Type.Object({
  name: NonEmpty,
})

// --- Responses ---

export const ListModelsResponse = Type.Object({ models: Type.Array(ModelInfoSchema) })
export const RegisterPromptResponse = Type.Object({
  name: Type.String(),
  version: Type.Integer(),
  created_at: Type.String(),
})
export const ListPromptsResponse = Type.Object({ prompts: Type.Array(PromptSchema) })
export const RegisterModelResponse = Type.Object({
  name: Type.String(),
  status: Type.String(),
  registered_at: Type.String(),
})
export const ListRegisteredModelsResponse = Type.Object({ models: Type.Array(RegisteredModelSchema) })
