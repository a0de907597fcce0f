import { ENV } from "../config/env";
import { logger } from "../infra/logger-instance";
import { closePool, initPool } from "../infra/postgres/connection";
import { runMigrations } from "../infra/postgres/migrate";

async function main() {
  initPool({ connectionString: ENV.DATABASE_URL, max: 1 });
  try {
    const applied = await runMigrations();
    logger.info({ applied }, "Migration run complete");
  } finally {
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, "Migration failed");
  process.exit(1);
});
