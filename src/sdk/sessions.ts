// src/sdk/sessions.ts — Session service client

import { RpcClient } from "../rpc/client.js"
import type { CallOptions, RpcClientOptions } from "../rpc/client.js"
import {
  AddMessagesResponse,
  ClearUserMemoryResponse,
  DeleteMemoryResponse,
  DeleteSessionResponse,
  GetMemoryResponse,
  GetMessagesResponse,
  GetOrCreateSessionResponse,
  SESSION_CONTRACT,
  SaveMemoryResponse,
} from "../sessions/schema.js"
import type { MessageInput, Session, SessionContract } from "../sessions/schema.js"
import type { MessagePage } from "../sessions/store.js"

export interface MemoryScope {
  /** Session-scoped slot; omitted = user-global */
  sessionId?: string
}

export class SessionClient {
  private readonly rpc: RpcClient<SessionContract>

  constructor(options: RpcClientOptions) {
    this.rpc = new RpcClient(SESSION_CONTRACT, options)
  }

  async getOrCreate(userId: string, sessionId?: string, options?: CallOptions): Promise<Session> {
    const res = await this.rpc.call(
      "GetOrCreateSession",
      { user_id: userId, session_id: sessionId },
      GetOrCreateSessionResponse,
      options,
    )
    return res.session
  }

  /** Returns the number of messages appended */
  async addMessages(sessionId: string, messages: MessageInput[], options?: CallOptions): Promise<number> {
    const res = await this.rpc.call("AddMessages", { session_id: sessionId, messages }, AddMessagesResponse, options)
    return res.message_count
  }

  getMessages(
    sessionId: string,
    page: { limit?: number; offset?: number } = {},
    options?: CallOptions,
  ): Promise<MessagePage> {
    return this.rpc.call("GetMessages", { session_id: sessionId, ...page }, GetMessagesResponse, options)
  }

  async deleteSession(sessionId: string, options?: CallOptions): Promise<boolean> {
    const res = await this.rpc.call("DeleteSession", { session_id: sessionId }, DeleteSessionResponse, options)
    return res.success
  }

  async saveMemory(userId: string, key: string, value: unknown, scope: MemoryScope = {}, options?: CallOptions): Promise<boolean> {
    const res = await this.rpc.call(
      "SaveMemory",
      { user_id: userId, key, value, session_id: scope.sessionId },
      SaveMemoryResponse,
      options,
    )
    return res.success
  }

  /** All entries of the scope, or just `key` when given */
  async getMemory(userId: string, key?: string, scope: MemoryScope = {}, options?: CallOptions): Promise<Record<string, unknown>> {
    const res = await this.rpc.call(
      "GetMemory",
      { user_id: userId, key, session_id: scope.sessionId },
      GetMemoryResponse,
      options,
    )
    return res.memories
  }

  async deleteMemory(userId: string, key: string, scope: MemoryScope = {}, options?: CallOptions): Promise<boolean> {
    const res = await this.rpc.call(
      "DeleteMemory",
      { user_id: userId, key, session_id: scope.sessionId },
      DeleteMemoryResponse,
      options,
    )
    return res.success
  }

  /** Removes every scope; returns the count removed */
  async clearUserMemory(userId: string, options?: CallOptions): Promise<number> {
    const res = await this.rpc.call("ClearUserMemory", { user_id: userId }, ClearUserMemoryResponse, options)
    return res.count
  }
}
