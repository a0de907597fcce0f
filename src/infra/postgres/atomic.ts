import { PoolClient } from "pg";
import { getClient } from "./connection";
import { logger } from "../logger-instance";

export type IsolationLevel = "READ COMMITTED" | "REPEATABLE READ" | "SERIALIZABLE";

/**
 * Executes a callback within a database transaction.
 * Handles BEGIN, COMMIT and ROLLBACK; the client is always released.
 */
export async function runAtomic<T>(
  callback: (client: PoolClient) => Promise<T>,
  isolationLevel: IsolationLevel = "READ COMMITTED"
): Promise<T> {
  const client = await getClient();

  try {
    await client.query("BEGIN");
    await client.query(`SET TRANSACTION ISOLATION LEVEL ${isolationLevel}`);

    const result = await callback(client);

    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      // connection is most likely gone
      logger.error({ error: rollbackError }, "Failed to rollback transaction");
    }
    throw error;
  } finally {
    client.release();
  }
}
