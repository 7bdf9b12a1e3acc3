// src/drizzle/schema.ts — Session store database schema
// All tables live in the `gantry` schema, isolated from other services.

import { pgSchema, text, timestamp, jsonb, bigserial, index, uniqueIndex } from "drizzle-orm/pg-core"
import type { ToolCall } from "../sessions/schema.js"

export const gantrySchema = pgSchema("gantry")

// --- sessions ---
export const sessions = gantrySchema.table("sessions", {
  sessionId: text("session_id").primaryKey(),
  userId: text("user_id").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
}, (table) => [
  index("idx_sessions_user").on(table.userId),
])

// --- session_messages ---
// Append-only; `seq` is the total order within and across sessions.
export const sessionMessages = gantrySchema.table("session_messages", {
  seq: bigserial("seq", { mode: "number" }).primaryKey(),
  sessionId: text("session_id").notNull().references(() => sessions.sessionId, { onDelete: "cascade" }),
  role: text("role", { enum: ["system", "user", "assistant", "tool"] }).notNull(),
  content: text("content"),
  toolCalls: jsonb("tool_calls").$type<ToolCall[]>(),
  toolCallId: text("tool_call_id"),
  name: text("name"),
  timestamp: text("timestamp").notNull(),                       // ISO 8601, as supplied or stamped on insert
}, (table) => [
  index("idx_session_messages_session_seq").on(table.sessionId, table.seq),
])

// --- memories ---
// session_id '' is the user-global scope; no FK so memories outlive sessions.
export const memories = gantrySchema.table("memories", {
  userId: text("user_id").notNull(),
  key: text("key").notNull(),
  sessionId: text("session_id").notNull().default(""),
  value: jsonb("value").$type<unknown>(),
  createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex("idx_memories_scope_key").on(table.userId, table.key, table.sessionId),
  index("idx_memories_user").on(table.userId),
])
