// src/drizzle/migrate.ts — Idempotent DDL for the session store
// Run on startup by the postgres backend, or standalone as:
//   node dist/drizzle/migrate.js

import { fileURLToPath } from "node:url"
import postgres from "postgres"
import type { Sql } from "./db.js"

const DDL: readonly string[] = [
  `CREATE SCHEMA IF NOT EXISTS gantry`,
  `CREATE TABLE IF NOT EXISTS gantry.sessions (
    session_id text PRIMARY KEY,
    user_id text NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_sessions_user ON gantry.sessions (user_id)`,
  `CREATE TABLE IF NOT EXISTS gantry.session_messages (
    seq bigserial PRIMARY KEY,
    session_id text NOT NULL REFERENCES gantry.sessions (session_id) ON DELETE CASCADE,
    role text NOT NULL,
    content text,
    tool_calls jsonb,
    tool_call_id text,
    name text,
    timestamp text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_session_messages_session_seq ON gantry.session_messages (session_id, seq)`,
  `CREATE TABLE IF NOT EXISTS gantry.memories (
    user_id text NOT NULL,
    key text NOT NULL,
    session_id text NOT NULL DEFAULT '',
    value jsonb,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_memories_scope_key ON gantry.memories (user_id, key, session_id)`,
  `CREATE INDEX IF NOT EXISTS idx_memories_user ON gantry.memories (user_id)`,
]

export async function ensureSchema(sql: Sql): Promise<void> {
  for (const statement of DDL) {
    await sql.unsafe(statement)
  }
}

async function runMigrations(): Promise<void> {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    console.error("[gantry-migrate] DATABASE_URL is required")
    process.exit(1)
  }

  console.log("[gantry-migrate] connecting to database...")
  const sql = postgres(connectionString, { max: 1 })

  try {
    await ensureSchema(sql)
    console.log("[gantry-migrate] schema up to date")
  } catch (err) {
    console.error("[gantry-migrate] migration failed:", err)
    process.exitCode = 1
  } finally {
    await sql.end()
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  void runMigrations()
}
