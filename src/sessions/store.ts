// src/sessions/store.ts — Session storage port
//
// Backends are interchangeable and chosen at construction time; the service
// layer only ever sees this interface.

import type { Message, MessageInput, Session } from "./schema.js"

/** Scope key for user-global memory */
export const GLOBAL_SCOPE = ""

export interface MessagePage {
  messages: Message[]
  /** Length of the full log, regardless of pagination */
  total_count: number
}

export interface SessionStore {
  readonly kind: "memory" | "postgres"

  /**
   * Return the session, refreshing updated_at, or create it.
   * A missing sessionId means "generate a fresh one".
   */
  getOrCreate(userId: string, sessionId?: string): Promise<Session>

  /** Append in call order. Throws SessionNotFoundError for an unknown session. */
  addMessages(sessionId: string, messages: MessageInput[]): Promise<number>

  /** messages[offset : offset + limit] of the insertion-ordered log */
  getMessages(sessionId: string, limit?: number, offset?: number): Promise<MessagePage>

  /** Remove the session and its messages; memories are untouched */
  deleteSession(sessionId: string): Promise<boolean>

  /** Upsert the value at (userId, key, sessionId ?? GLOBAL_SCOPE) */
  saveMemory(userId: string, key: string, value: unknown, sessionId?: string): Promise<boolean>

  /** Entries of exactly one scope, optionally narrowed to one key */
  getMemory(userId: string, key?: string, sessionId?: string): Promise<Record<string, unknown>>

  deleteMemory(userId: string, key: string, sessionId?: string): Promise<boolean>

  /** Remove every entry for the user across all scopes */
  clearUserMemory(userId: string): Promise<number>

  close(): Promise<void>
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session '${sessionId}' not found`)
    this.name = "SessionNotFoundError"
  }
}

export function scopeOf(sessionId: string | undefined): string {
  return sessionId ?? GLOBAL_SCOPE
}

/** Slice [offset, offset + limit) with the documented defaults */
export function pageBounds(total: number, limit?: number, offset?: number): { start: number; end: number } {
  const start = Math.min(offset ?? 0, total)
  const end = limit === undefined ? total : Math.min(start + limit, total)
  return { start, end }
}
