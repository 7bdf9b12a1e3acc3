// src/sdk/models.ts — Model service client

import { RpcClient } from "../rpc/client.js"
import type { CallOptions, RpcClientOptions } from "../rpc/client.js"
import {
  ChatChunkSchema,
  ChatResponseSchema,
  ListModelsResponse,
  ListPromptsResponse,
  ListRegisteredModelsResponse,
  MODEL_CONTRACT,
  ModelCapabilitiesSchema,
  ModelStatusSchema,
  PromptSchema,
  RegisterModelResponse,
  RegisterPromptResponse,
} from "../models/schema.js"
import type {
  ChatChunk,
  ChatRequestBody,
  ChatResponse,
  ModelCapabilities,
  ModelContract,
  ModelInfo,
  ModelStatus,
  Prompt,
  PromptMetadata,
  RegisterModelInput,
  RegisteredModel,
} from "../models/schema.js"

export class ModelClient {
  private readonly rpc: RpcClient<ModelContract>

  constructor(options: RpcClientOptions) {
    this.rpc = new RpcClient(MODEL_CONTRACT, options)
  }

  chat(request: ChatRequestBody, options?: CallOptions): Promise<ChatResponse> {
    return this.rpc.call("Chat", request, ChatResponseSchema, options)
  }

  /** Fragments in order; breaking out of the loop cancels the call */
  chatStream(request: ChatRequestBody, options?: CallOptions): AsyncGenerator<ChatChunk> {
    return this.rpc.stream("ChatStream", request, ChatChunkSchema, options)
  }

  async listModels(options?: CallOptions): Promise<ModelInfo[]> {
    const res = await this.rpc.call("ListModels", {}, ListModelsResponse, options)
    return res.models
  }

  getModelCapabilities(model: string, options?: CallOptions): Promise<ModelCapabilities> {
    return this.rpc.call("GetModelCapabilities", { model }, ModelCapabilitiesSchema, options)
  }

  registerPrompt(
    name: string,
    content: string,
    metadata?: Partial<PromptMetadata>,
    options?: CallOptions,
  ): Promise<{ name: string; version: number; created_at: string }> {
    return this.rpc.call("RegisterPrompt", { name, content, metadata }, RegisterPromptResponse, options)
  }

  /** version 0 or omitted = latest */
  getPrompt(name: string, version = 0, options?: CallOptions): Promise<Prompt> {
    return this.rpc.call("GetPrompt", { name, version }, PromptSchema, options)
  }

  async listPrompts(options?: CallOptions): Promise<Prompt[]> {
    const res = await this.rpc.call("ListPrompts", {}, ListPromptsResponse, options)
    return res.prompts
  }

  registerModel(
    model: RegisterModelInput,
    options?: CallOptions,
  ): Promise<{ name: string; status: string; registered_at: string }> {
    return this.rpc.call("RegisterModel", model, RegisterModelResponse, options)
  }

  async listRegisteredModels(options?: CallOptions): Promise<RegisteredModel[]> {
    const res = await this.rpc.call("ListRegisteredModels", {}, ListRegisteredModelsResponse, options)
    return res.models
  }

  getModelStatus(name: string, options?: CallOptions): Promise<ModelStatus> {
    return this.rpc.call("GetModelStatus", { name }, ModelStatusSchema, options)
  }
}
