import { PoolClient } from "pg";
import { z } from "zod";
import { Money } from "../../utils/money.util";
import { PersistenceError } from "../../utils/error";
import { getPool } from "../../infra/postgres/connection";

export type Executor = (text: string, params?: unknown[]) => Promise<unknown[]>;

export const poolExecutor: Executor = async (text, params) => {
  const result = await getPool().query(text, params);
  return result.rows;
};

export const clientExecutor =
  (client: PoolClient): Executor =>
  async (text, params) => {
    const result = await client.query(text, params);
    return result.rows;
  };

/** NUMERIC(15,2) arrives as a decimal string */
export const numeric = z.string().transform((v) => Money.toMinor(v));

export const rateNumeric = z.string().transform(Number);

export const toNumeric = (minor: bigint): string => Money.toMajor(minor);

export function parseRows<S extends z.ZodTypeAny>(
  schema: S,
  rows: unknown[],
  table: string
): z.output<S>[] {
  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    throw new PersistenceError(`Unexpected row shape from ${table}`, parsed.error, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export async function wrapQuery<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError(`Database operation failed: ${operation}`, error);
  }
}
