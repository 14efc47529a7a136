import { Pool } from "pg";
import { componentLogger } from "../logging/logger.js";

const log = componentLogger("postgres");

export interface PostgresPoolOptions {
  max: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  statementTimeoutMs?: number;
}

export function createPostgresPool(connectionString: string, options: PostgresPoolOptions): Pool {
  const pool = new Pool({
    connectionString,
    max: options.max,
    idleTimeoutMillis: options.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: options.connectionTimeoutMs ?? 10_000,
    statement_timeout: options.statementTimeoutMs ?? 30_000,
  });

  // Idle clients can fail in the background; without a listener pg crashes the process.
  pool.on("error", (error) => {
    log.error({ err: error }, "unexpected idle client error");
  });

  return pool;
}
