// src/index.ts — Public exports: SDK, contracts and the building blocks of each service

export { PlatformClient, DEFAULT_GATEWAY_ADDR } from "./sdk/platform.js"
export type { PlatformClientConfig } from "./sdk/platform.js"
export { SessionClient } from "./sdk/sessions.js"
export type { MemoryScope } from "./sdk/sessions.js"
export { ModelClient } from "./sdk/models.js"
export { defineWorkflow, DEFAULT_AUTOSCALING } from "./sdk/workflow.js"
export type { AutoscalingConfig, ResponseMode, Workflow, WorkflowMetadata, WorkflowOptions } from "./sdk/workflow.js"

export { RpcError, HTTP_STATUS_BY_CODE, RPC_STATUS_CODES } from "./rpc/errors.js"
export type { RpcErrorEnvelope, RpcStatusCode } from "./rpc/errors.js"
export { RpcClient } from "./rpc/client.js"
export type { CallOptions, FetchLike, RpcClientOptions } from "./rpc/client.js"
export { ROUTING_HEADER, defineContract, serverStream, unary } from "./rpc/contract.js"
export type { CallContext, ServiceContract, ServiceImplementation } from "./rpc/contract.js"
export { createRpcServer } from "./rpc/server.js"

export { loadConfig } from "./config.js"
export type { GantryConfig } from "./config.js"

export { createGateway } from "./gateway/server.js"
export type { Gateway } from "./gateway/server.js"
export { GenericProxy, PLATFORM_CONTRACTS } from "./gateway/proxy.js"
export { ServiceRegistry } from "./gateway/registry.js"

export { MODEL_CONTRACT } from "./models/schema.js"
export type {
  ChatChunk,
  ChatMessage,
  ChatRequestBody,
  ChatResponse,
  ModelCapabilities,
  ModelInfo,
  Prompt,
  RegisteredModel,
} from "./models/schema.js"
export { createModelService, DEFAULT_CHAT_CONFIG } from "./models/service.js"
export { ModelResolver } from "./models/resolver.js"
export { ModelRegistry } from "./models/model-registry.js"
export { PromptRegistry } from "./models/prompt-registry.js"
export { createProviderAdapters, OpenAIAdapter, AnthropicAdapter } from "./models/providers/index.js"
export type { ProviderAdapter, ChatInput } from "./models/providers/index.js"

export { SESSION_CONTRACT } from "./sessions/schema.js"
export type { Message, MessageInput, Session } from "./sessions/schema.js"
export { createSessionService } from "./sessions/service.js"
export { createSessionStore } from "./sessions/factory.js"
export { InMemorySessionStore } from "./sessions/memory-store.js"
export { PostgresSessionStore } from "./sessions/pg-store.js"
export type { SessionStore } from "./sessions/store.js"
