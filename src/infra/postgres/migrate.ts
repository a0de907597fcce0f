import * as fs from "fs";
import * as path from "path";
import { query } from "./connection";
import { runAtomic } from "./atomic";
import { logger } from "../logger-instance";

interface Migration {
  id: number;
  name: string;
  applied_at: Date;
}

const MIGRATIONS_TABLE = "_credit_engine_migrations";

export async function runMigrations(
  migrationsDir: string = path.join(__dirname, "migrations")
): Promise<string[]> {
  logger.info("Running PostgreSQL migrations...");

  await query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await getMigrationStatus();
  const appliedNames = new Set(applied.map((m) => m.name));

  if (!fs.existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, "No migrations directory found, skipping migrations");
    return [];
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const newlyApplied: string[] = [];

  for (const file of files) {
    if (appliedNames.has(file)) {
      logger.debug(`Migration ${file} already applied, skipping`);
      continue;
    }

    logger.info(`Applying migration: ${file}`);
    const sqlContent = fs.readFileSync(path.join(migrationsDir, file), "utf-8");

    try {
      await runAtomic(async (client) => {
        await client.query(sqlContent);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
      });
      newlyApplied.push(file);
      logger.info(`Migration ${file} applied successfully`);
    } catch (error) {
      logger.error({ error, file }, `Failed to apply migration ${file}`);
      throw error;
    }
  }

  logger.info({ applied: newlyApplied.length }, "All migrations applied");
  return newlyApplied;
}

export async function getMigrationStatus(): Promise<Migration[]> {
  const result = await query<Migration>(
    `SELECT id, name, applied_at FROM ${MIGRATIONS_TABLE} ORDER BY id`
  );
  return result.rows;
}
