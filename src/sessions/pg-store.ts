// src/sessions/pg-store.ts — Durable session store on PostgreSQL (drizzle-orm + postgres.js)

import { and, asc, count, eq, sql as dsql } from "drizzle-orm"
import { ulid } from "ulid"
import { createDb } from "../drizzle/db.js"
import type { Db, Sql } from "../drizzle/db.js"
import { ensureSchema } from "../drizzle/migrate.js"
import { memories, sessionMessages, sessions } from "../drizzle/schema.js"
import type { Message, MessageInput, Session } from "./schema.js"
import { SessionNotFoundError, scopeOf } from "./store.js"
import type { MessagePage, SessionStore } from "./store.js"

export interface PostgresSessionStoreOptions {
  connectionString: string
  maxConnections?: number
}

type SessionRow = typeof sessions.$inferSelect
type MessageRow = typeof sessionMessages.$inferSelect

function toSession(row: SessionRow): Session {
  return {
    session_id: row.sessionId,
    user_id: row.userId,
    created_at: row.createdAt.toISOString(),
    updated_at: row.updatedAt.toISOString(),
  }
}

function toMessage(row: MessageRow): Message {
  const message: Message = { role: row.role, timestamp: row.timestamp }
  if (row.content !== null) message.content = row.content
  if (row.toolCalls !== null) message.tool_calls = row.toolCalls
  if (row.toolCallId !== null) message.tool_call_id = row.toolCallId
  if (row.name !== null) message.name = row.name
  return message
}

export class PostgresSessionStore implements SessionStore {
  readonly kind = "postgres" as const
  private readonly db: Db
  private readonly sql: Sql
  private ready: Promise<void> | null = null

  constructor(options: PostgresSessionStoreOptions) {
    const { db, sql } = createDb({
      connectionString: options.connectionString,
      maxConnections: options.maxConnections,
    })
    this.db = db
    this.sql = sql
  }

  /** Create tables on first use; later calls share the same promise */
  init(): Promise<void> {
    if (!this.ready) {
      this.ready = ensureSchema(this.sql).catch((err: unknown) => {
        this.ready = null
        throw err
      })
    }
    return this.ready
  }

  async getOrCreate(userId: string, sessionId?: string): Promise<Session> {
    await this.init()
    const id = sessionId || `sess_${ulid()}`
    const now = new Date()

    const [row] = await this.db
      .insert(sessions)
      .values({ sessionId: id, userId, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({ target: sessions.sessionId, set: { updatedAt: now } })
      .returning()
    if (!row) throw new Error(`Upsert of session '${id}' returned no row`)
    return toSession(row)
  }

  async addMessages(sessionId: string, messages: MessageInput[]): Promise<number> {
    await this.init()
    const now = new Date()
    const stamp = now.toISOString()

    return this.db.transaction(async (tx) => {
      const touched = await tx
        .update(sessions)
        .set({ updatedAt: now })
        .where(eq(sessions.sessionId, sessionId))
        .returning({ sessionId: sessions.sessionId })
      if (touched.length === 0) throw new SessionNotFoundError(sessionId)

      if (messages.length > 0) {
        // A single multi-row insert assigns seq in values order
        await tx.insert(sessionMessages).values(
          messages.map(m => ({
            sessionId,
            role: m.role,
            content: m.content ?? null,
            toolCalls: m.tool_calls ?? null,
            toolCallId: m.tool_call_id ?? null,
            name: m.name ?? null,
            timestamp: m.timestamp ?? stamp,
          })),
        )
      }
      return messages.length
    })
  }

  async getMessages(sessionId: string, limit?: number, offset?: number): Promise<MessagePage> {
    await this.init()
    const [totals] = await this.db
      .select({ total: count() })
      .from(sessionMessages)
      .where(eq(sessionMessages.sessionId, sessionId))
    const total = totals?.total ?? 0

    const base = this.db
      .select()
      .from(sessionMessages)
      .where(eq(sessionMessages.sessionId, sessionId))
      .orderBy(asc(sessionMessages.seq))
      .offset(offset ?? 0)
    const rows = limit === undefined ? await base : await base.limit(limit)

    return { messages: rows.map(toMessage), total_count: total }
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    await this.init()
    // session_messages rows go with it via ON DELETE CASCADE
    const deleted = await this.db
      .delete(sessions)
      .where(eq(sessions.sessionId, sessionId))
      .returning({ sessionId: sessions.sessionId })
    return deleted.length > 0
  }

  async saveMemory(userId: string, key: string, value: unknown, sessionId?: string): Promise<boolean> {
    await this.init()
    const now = new Date()
    await this.db
      .insert(memories)
      .values({ userId, key, sessionId: scopeOf(sessionId), value, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [memories.userId, memories.key, memories.sessionId],
        set: { value: dsql`excluded.value`, updatedAt: now },
      })
    return true
  }

  async getMemory(userId: string, key?: string, sessionId?: string): Promise<Record<string, unknown>> {
    await this.init()
    const filters = [eq(memories.userId, userId), eq(memories.sessionId, scopeOf(sessionId))]
    if (key !== undefined) filters.push(eq(memories.key, key))

    const rows = await this.db
      .select({ key: memories.key, value: memories.value })
      .from(memories)
      .where(and(...filters))

    const result: Record<string, unknown> = {}
    for (const row of rows) result[row.key] = row.value
    return result
  }

  async deleteMemory(userId: string, key: string, sessionId?: string): Promise<boolean> {
    await this.init()
    const deleted = await this.db
      .delete(memories)
      .where(and(eq(memories.userId, userId), eq(memories.key, key), eq(memories.sessionId, scopeOf(sessionId))))
      .returning({ key: memories.key })
    return deleted.length > 0
  }

  async clearUserMemory(userId: string): Promise<number> {
    await this.init()
    const deleted = await this.db
      .delete(memories)
      .where(eq(memories.userId, userId))
      .returning({ key: memories.key })
    return deleted.length
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 })
  }
}
