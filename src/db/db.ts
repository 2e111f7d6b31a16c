/**
 * █ [CORE] :: DB_CONFIG
 * =====================================================================
 * DESC:   Inicializa Drizzle ORM con el pool de Node-Postgres.
 *         Solo se usa si hay DATABASE_URL; sin ella -> memory store.
 * STATUS: STABLE
 * =====================================================================
 */
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import type { Pool as PgPool } from "pg";
import * as schema from "./schema.ts";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DbHandle {
  db: Database;
  pool: PgPool;
}

// [INFO] -> Añade parámetros sin romper una URL que ya trae query string
export function withSslParams(url: string): string {
  // [SEC]: FORCE SSL  -> 'sslmode=require' asegura conexión encriptada (Neon/Cloud)
  // [FIX]: PG WARNING -> 'uselibpqcompat=true' silencia warning de versiones futuras
  return `${url}${url.includes("?") ? "&" : "?"}sslmode=require&uselibpqcompat=true`;
}

// =============================================================================
// █ INSTANCE: DATABASE CONNECTION
// =============================================================================
export function createDb(url: string, options: { ssl: boolean }): DbHandle {
  const pool = new Pool({
    connectionString: options.ssl ? withSslParams(url) : url,
  });

  pool.on("error", (err) => {
    console.error(`[DB]    :: POOL_ERROR    :: ${err.message}`);
  });

  return { db: drizzle(pool, { schema }), pool };
}
