// src/sessions/schema.ts — Session service wire schemas and contract

import { Type } from "@sinclair/typebox"
import type { Static } from "@sinclair/typebox"
import { defineContract } from "../rpc/contract.js"

export const SESSION_CONTRACT = defineContract("sessions.SessionService", {
  GetOrCreateSession: "unary",
  AddMessages: "unary",
  GetMessages: "unary",
  DeleteSession: "unary",
  SaveMemory: "unary",
  GetMemory: "unary",
  DeleteMemory: "unary",
  ClearUserMemory: "unary",
})

export type SessionContract = typeof SESSION_CONTRACT

// --- Records ---

export const ToolCallSchema = Type.Object({
  id: Type.String(),
  type: Type.Literal("function"),
  function: Type.Object({
    name: Type.String(),
    arguments: Type.String(), // JSON-encoded
  }),
})
export type ToolCall = Static<typeof ToolCallSchema>

export const MessageRoleSchema = Type.Union([
  Type.Literal("system"),
  Type.Literal("user"),
  Type.Literal("assistant"),
  Type.Literal("tool"),
])

/** A message as supplied by the caller; the store stamps the timestamp when omitted */
export const MessageInputSchema = Type.Object({
  role: MessageRoleSchema,
  content: Type.Optional(Type.String()),
  tool_calls: Type.Optional(Type.Array(ToolCallSchema)),
  tool_call_id: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  timestamp: Type.Optional(Type.String()),
})
export type MessageInput = Static<typeof MessageInputSchema>

export const MessageSchema = Type.Object({
  role: MessageRoleSchema,
  content: Type.Optional(Type.String()),
  tool_calls: Type.Optional(Type.Array(ToolCallSchema)),
  tool_call_id: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  timestamp: Type.String(),
})
export type Message = Static<typeof MessageSchema>

export const SessionSchema = Type.Object({
  session_id: Type.String(),
  user_id: Type.String(),
  created_at: Type.String(),
  updated_at: Type.String(),
})
export type Session = Static<typeof SessionSchema>

// --- Requests ---

const NonEmpty = Type.String({ minLength: 1 })

export const GetOrCreateSessionRequest = Type.Object({
  user_id: NonEmpty,
  session_id: Type.Optional(Type.String()),
})

export const AddMessagesRequest = Type.Object({
  session_id: NonEmpty,
  messages: Type.Array(MessageInputSchema),
})

export const GetMessagesRequest = Type.Object({
  session_id: NonEmpty,
  limit: Type.Optional(Type.Integer({ minimum: 0 })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
})

export const DeleteSessionRequest = Type.Object({
  session_id: NonEmpty,
})

export const SaveMemoryRequest = Type.Object({
  user_id: NonEmpty,
  key: NonEmpty,
  value: Type.Unknown(),
  session_id: Type.Optional(Type.String()),
})

export const GetMemoryRequest = Type.Object({
  user_id: NonEmpty,
  key: Type.Optional(Type.String()),
  session_id: Type.Optional(Type.String()),
})

export const DeleteMemoryRequest = Type.Object({
  user_id: NonEmpty,
  key: NonEmpty,
  session_id: Type.Optional(Type.String()),
})

export const ClearUserMemoryRequest = Type.Object({
  user_id: NonEmpty,
})

// --- Responses ---

export const GetOrCreateSessionResponse = Type.Object({ session: SessionSchema })
export const AddMessagesResponse = Type.Object({ success: Type.Boolean(), message_count: Type.Integer() })
export const GetMessagesResponse = Type.Object({ messages: Type.Array(MessageSchema), total_count: Type.Integer() })
export const DeleteSessionResponse = Type.Object({ success: Type.Boolean() })
export const SaveMemoryResponse = Type.Object({ success: Type.Boolean() })
export const GetMemoryResponse = Type.Object({ memories: Type.Record(Type.String(), Type.Unknown()) })
export const DeleteMemoryResponse = Type.Object({ success: Type.Boolean() })
export const ClearUserMemoryResponse = Type.Object({ count: Type.Integer() })
