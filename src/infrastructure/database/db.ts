/**
 * PostgreSQL connection pool for the pgvector index provider.
 */
import type { AppConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { Pool } from "pg";

export function createPool(db: AppConfig["vectorStore"]["db"]): Pool {
  const pool = new Pool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
    max: db.max,
    idleTimeoutMillis: db.idleTimeoutMs,
    connectionTimeoutMillis: db.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", { message: err.message });
  });

  return pool;
}
