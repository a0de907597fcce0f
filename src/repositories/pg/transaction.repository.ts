import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { TransactionRepository } from "../interfaces";
import { NewTransaction, Page, Transaction } from "../../types/transaction.types";
import { PersistenceError } from "../../utils/error";
import { Executor, numeric, parseRows, toNumeric, wrapQuery } from "./sql";

const transactionRow = z
  .object({
    id: z.string(),
    from_account_id: z.string().nullable(),
    to_account_id: z.string().nullable(),
    amount: numeric,
    currency: z.literal("RUB"),
    type: z.enum(["deposit", "withdraw", "transfer", "credit_disbursement", "credit_payment"]),
    status: z.enum(["completed", "failed"]),
    description: z.string(),
    created_at: z.date(),
  })
  .transform(
    (r): Transaction => ({
      id: r.id,
      fromAccountId: r.from_account_id,
      toAccountId: r.to_account_id,
      amount: r.amount,
      currency: r.currency,
      type: r.type,
      status: r.status,
      description: r.description,
      createdAt: r.created_at,
    })
  );

const COLUMNS =
  "id, from_account_id, to_account_id, amount, currency, type, status, description, created_at";

export class PgTransactionRepository implements TransactionRepository {
  constructor(private readonly exec: Executor) {}

  async create(tx: NewTransaction): Promise<Transaction> {
    return wrapQuery("transactions.create", async () => {
      const rows = parseRows(
        transactionRow,
        await this.exec(
          `INSERT INTO transactions (id, from_account_id, to_account_id, amount, currency, type, status, description)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
           RETURNING ${COLUMNS}`,
          [
            uuidv4(),
            tx.fromAccountId,
            tx.toAccountId,
            toNumeric(tx.amount),
            tx.currency,
            tx.type,
            tx.status ?? "completed",
            tx.description,
          ]
        ),
        "transactions"
      );
      const created = rows[0];
      if (!created) throw new PersistenceError("Transaction insert returned no row");
      return created;
    });
  }

  async listByAccount(accountId: string, page: Required<Page>): Promise<Transaction[]> {
    return wrapQuery("transactions.listByAccount", async () =>
      parseRows(
        transactionRow,
        await this.exec(
          `SELECT ${COLUMNS} FROM transactions
           WHERE from_account_id = $1 OR to_account_id = $1
           ORDER BY created_at DESC, id DESC
           LIMIT $2 OFFSET $3`,
          [accountId, page.limit, page.offset]
        ),
        "transactions"
      )
    );
  }
}
