// src/sessions/memory-store.ts — Transient in-process session store (default backend)
//
// Every operation runs to completion synchronously on the event loop before
// its promise settles, so individual operations never interleave.

import { ulid } from "ulid"
import type { Message, MessageInput, Session } from "./schema.js"
import { SessionNotFoundError, pageBounds, scopeOf } from "./store.js"
import type { MessagePage, SessionStore } from "./store.js"

interface StoredMessage {
  seq: number
  message: Message
}

interface MemoryEntry {
  value: unknown
  created_at: string
  updated_at: string
}

/** scope (session_id, or "" for global) → key → entry */
type ScopeMap = Map<string, Map<string, MemoryEntry>>

export interface InMemorySessionStoreOptions {
  /** Clock override for deterministic tests */
  now?: () => Date
  /** Id generator override for deterministic tests */
  generateId?: () => string
}

export class InMemorySessionStore implements SessionStore {
  readonly kind = "memory" as const
  private readonly sessions = new Map<string, Session>()
  private readonly messages = new Map<string, StoredMessage[]>()
  private readonly memories = new Map<string, ScopeMap>() // by user_id
  private seq = 0
  private readonly now: () => Date
  private readonly generateId: () => string

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? (() => `sess_${ulid()}`)
  }

  async getOrCreate(userId: string, sessionId?: string): Promise<Session> {
    const id = sessionId || this.generateId()
    const ts = this.timestamp()

    const existing = this.sessions.get(id)
    if (existing) {
      const refreshed = { ...existing, updated_at: ts }
      this.sessions.set(id, refreshed)
      return { ...refreshed }
    }

    const session: Session = { session_id: id, user_id: userId, created_at: ts, updated_at: ts }
    this.sessions.set(id, session)
    this.messages.set(id, [])
    return { ...session }
  }

  async addMessages(sessionId: string, messages: MessageInput[]): Promise<number> {
    const session = this.sessions.get(sessionId)
    const log = this.messages.get(sessionId)
    if (!session || !log) throw new SessionNotFoundError(sessionId)

    const ts = this.timestamp()
    for (const input of messages) {
      log.push({ seq: ++this.seq, message: freezeMessage({ ...input, timestamp: input.timestamp ?? ts }) })
    }
    this.sessions.set(sessionId, { ...session, updated_at: ts })
    return messages.length
  }

  async getMessages(sessionId: string, limit?: number, offset?: number): Promise<MessagePage> {
    const log = this.messages.get(sessionId) ?? []
    const { start, end } = pageBounds(log.length, limit, offset)
    return {
      messages: log.slice(start, end).map(m => structuredClone(m.message)),
      total_count: log.length,
    }
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const existed = this.sessions.delete(sessionId)
    this.messages.delete(sessionId)
    return existed
  }

  async saveMemory(userId: string, key: string, value: unknown, sessionId?: string): Promise<boolean> {
    const scope = this.scope(userId, scopeOf(sessionId), true)
    const ts = this.timestamp()
    const previous = scope.get(key)
    scope.set(key, {
      value: structuredClone(value),
      created_at: previous?.created_at ?? ts,
      updated_at: ts,
    })
    return true
  }

  async getMemory(userId: string, key?: string, sessionId?: string): Promise<Record<string, unknown>> {
    const scope = this.scope(userId, scopeOf(sessionId), false)
    const result: Record<string, unknown> = {}
    if (!scope) return result

    for (const [entryKey, entry] of scope) {
      if (key !== undefined && entryKey !== key) continue
      result[entryKey] = structuredClone(entry.value)
    }
    return result
  }

  async deleteMemory(userId: string, key: string, sessionId?: string): Promise<boolean> {
    const scopeKey = scopeOf(sessionId)
    const scope = this.scope(userId, scopeKey, false)
    if (!scope) return false
    const existed = scope.delete(key)
    if (scope.size === 0) this.memories.get(userId)?.delete(scopeKey)
    return existed
  }

  async clearUserMemory(userId: string): Promise<number> {
    const scopes = this.memories.get(userId)
    if (!scopes) return 0
    let count = 0
    for (const scope of scopes.values()) count += scope.size
    this.memories.delete(userId)
    return count
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private scope(userId: string, scopeKey: string, create: true): Map<string, MemoryEntry>
  private scope(userId: string, scopeKey: string, create: false): Map<string, MemoryEntry> | undefined
  private scope(userId: string, scopeKey: string, create: boolean): Map<string, MemoryEntry> | undefined {
    let scopes = this.memories.get(userId)
    if (!scopes) {
      if (!create) return undefined
      scopes = new Map()
      this.memories.set(userId, scopes)
    }
    let scope = scopes.get(scopeKey)
    if (!scope && create) {
      scope = new Map()
      scopes.set(scopeKey, scope)
    }
    return scope
  }

  private timestamp(): string {
    return this.now().toISOString()
  }
}

function freezeMessage(message: Message): Message {
  return Object.freeze(structuredClone(message))
}
