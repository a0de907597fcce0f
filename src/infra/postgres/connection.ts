import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from "pg";
import { logger } from "../logger-instance";

let pool: Pool | undefined;

export type DbPoolConfig = {
  connectionString: string;
  max?: number;
  statementTimeoutMs?: number;
  lockTimeoutMs?: number;
  idleInTxTimeoutMs?: number;
};

/**
 * Initialise the connection pool. Every session runs in UTC with bounded
 * statement and lock waits, so a stuck row lock surfaces as an error.
 */
export function initPool(config: DbPoolConfig): Pool {
  if (pool) return pool;

  const pgConfig: PoolConfig = {
    connectionString: config.connectionString,
    max: config.max ?? 10,
    idleTimeoutMillis: 10000,
    connectionTimeoutMillis: 5000,
  };
  const statementTimeoutMs = config.statementTimeoutMs ?? 15000;
  const lockTimeoutMs = config.lockTimeoutMs ?? 3000;
  const idleInTxTimeoutMs = config.idleInTxTimeoutMs ?? 20000;

  pool = new Pool(pgConfig);

  pool.on("connect", (client: PoolClient) => {
    client
      .query(
        `SET timezone = 'UTC';
         SET statement_timeout = ${statementTimeoutMs};
         SET lock_timeout = ${lockTimeoutMs};
         SET idle_in_transaction_session_timeout = ${idleInTxTimeoutMs}`
      )
      .catch((error: unknown) => {
        logger.error({ error }, "Failed to apply session settings");
      });
  });

  pool.on("error", (error) => {
    logger.error({ error }, "Idle PostgreSQL client error");
  });

  return pool;
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error("PostgreSQL pool not initialized. Call initPool() first.");
  }
  return pool;
}

export async function query<R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<R>> {
  return getPool().query<R>(text, params);
}

export async function getClient(): Promise<PoolClient> {
  return getPool().connect();
}

export async function checkConnection(): Promise<void> {
  try {
    await query("SELECT 1 AS health_check");
    logger.info("PostgreSQL connected successfully");
  } catch (error) {
    logger.error({ error }, "Failed to connect to PostgreSQL");
    throw error;
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    logger.info("PostgreSQL pool closed");
  }
}
