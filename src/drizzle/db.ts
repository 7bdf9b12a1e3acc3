// src/drizzle/db.ts — Database connection factory for the session store

import { drizzle } from "drizzle-orm/postgres-js"
import postgres from "postgres"
import * as schema from "./schema.js"

export interface DbOptions {
  /** DATABASE_URL */
  connectionString: string
  /** DATABASE_MAX_CONNECTIONS (default: 10) */
  maxConnections?: number
}

/**
 * Open the pool behind the session and memory tables. The store issues its
 * first query through `ensureSchema(sql)` at boot; until then no connection
 * is made. `sql` also serves `PostgresSessionStore.close()`.
 */
export function createDb(options: DbOptions) {
  const sql = postgres(options.connectionString, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => {},
  })

  const db = drizzle(sql, { schema })

  return { db, sql }
}

export type Db = ReturnType<typeof createDb>["db"]
export type Sql = ReturnType<typeof createDb>["sql"]
