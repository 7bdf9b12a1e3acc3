// src/sessions/service.ts — Session service handlers
//
// Every handler converts unexpected storage failures into INTERNAL with a
// message naming the operation; request validation happens before the
// handler runs and surfaces as INVALID_ARGUMENT.

import { unary } from "../rpc/contract.js"
import type { ServiceImplementation } from "../rpc/contract.js"
import { toRpcError } from "../rpc/errors.js"
import {
  AddMessagesRequest,
  ClearUserMemoryRequest,
  DeleteMemoryRequest,
  DeleteSessionRequest,
  GetMemoryRequest,
  GetMessagesRequest,
  GetOrCreateSessionRequest,
  SaveMemoryRequest,
} from "./schema.js"
import type { SessionContract } from "./schema.js"
import type { SessionStore } from "./store.js"

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    throw toRpcError(err, `Failed to ${operation}`)
  }
}

export function createSessionService(store: SessionStore): ServiceImplementation<SessionContract> {
  return {
    GetOrCreateSession: unary(GetOrCreateSessionRequest, (req) =>
      guarded("get or create session", async () => ({
        session: await store.getOrCreate(req.user_id, req.session_id || undefined),
      })),
    ),

    AddMessages: unary(AddMessagesRequest, (req) =>
      guarded("add messages", async () => ({
        success: true,
        message_count: await store.addMessages(req.session_id, req.messages),
      })),
    ),

    GetMessages: unary(GetMessagesRequest, (req) =>
      guarded("get messages", () => store.getMessages(req.session_id, req.limit, req.offset)),
    ),

    DeleteSession: unary(DeleteSessionRequest, (req) =>
      guarded("delete session", async () => ({
        success: await store.deleteSession(req.session_id),
      })),
    ),

    SaveMemory: unary(SaveMemoryRequest, (req) =>
      guarded("save memory", async () => ({
        success: await store.saveMemory(req.user_id, req.key, req.value, req.session_id || undefined),
      })),
    ),

    GetMemory: unary(GetMemoryRequest, (req) =>
      guarded("get memory", async () => ({
        memories: await store.getMemory(req.user_id, req.key || undefined, req.session_id || undefined),
      })),
    ),

    DeleteMemory: unary(DeleteMemoryRequest, (req) =>
      guarded("delete memory", async () => ({
        success: await store.deleteMemory(req.user_id, req.key, req.session_id || undefined),
      })),
    ),

    ClearUserMemory: unary(ClearUserMemoryRequest, (req) =>
      guarded("clear user memory", async () => ({
        count: await store.clearUserMemory(req.user_id),
      })),
    ),
  }
}
