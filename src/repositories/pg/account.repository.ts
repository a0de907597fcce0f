import { z } from "zod";
import { AccountRepository } from "../interfaces";
import { Account, AccountStatus } from "../../types/account.types";
import { PersistenceError } from "../../utils/error";
import { getLockOrder } from "../../utils/lock-ordering";
import { Executor, numeric, parseRows, toNumeric, wrapQuery } from "./sql";

const accountRow = z
  .object({
    id: z.string(),
    user_id: z.string(),
    number: z.string(),
    balance: numeric,
    currency: z.literal("RUB"),
    status: z.enum(["active", "blocked", "closed"]),
    created_at: z.date(),
    updated_at: z.date(),
  })
  .transform(
    (r): Account => ({
      id: r.id,
      userId: r.user_id,
      number: r.number,
      balance: r.balance,
      currency: r.currency,
      status: r.status,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    })
  );

const COLUMNS = "id, user_id, number, balance, currency, status, created_at, updated_at";

export class PgAccountRepository implements AccountRepository {
  constructor(private readonly exec: Executor) {}

  private async one(text: string, params: unknown[]): Promise<Account | null> {
    const rows = parseRows(accountRow, await this.exec(text, params), "accounts");
    return rows[0] ?? null;
  }

  async create(account: Account): Promise<Account> {
    return wrapQuery("accounts.create", async () => {
      const created = await this.one(
        `INSERT INTO accounts (id, user_id, number, balance, currency, status, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${COLUMNS}`,
        [
          account.id,
          account.userId,
          account.number,
          toNumeric(account.balance),
          account.currency,
          account.status,
          account.createdAt,
          account.updatedAt,
        ]
      );
      if (!created) throw new PersistenceError("Account insert returned no row");
      return created;
    });
  }

  async findById(id: string): Promise<Account | null> {
    return wrapQuery("accounts.findById", () =>
      this.one(`SELECT ${COLUMNS} FROM accounts WHERE id = $1`, [id])
    );
  }

  async findByNumber(number: string): Promise<Account | null> {
    return wrapQuery("accounts.findByNumber", () =>
      this.one(`SELECT ${COLUMNS} FROM accounts WHERE number = $1`, [number])
    );
  }

  async listByUser(userId: string): Promise<Account[]> {
    return wrapQuery("accounts.listByUser", async () =>
      parseRows(
        accountRow,
        await this.exec(
          `SELECT ${COLUMNS} FROM accounts WHERE user_id = $1 ORDER BY created_at`,
          [userId]
        ),
        "accounts"
      )
    );
  }

  async lockForUpdate(ids: string[]): Promise<Map<string, Account>> {
    return wrapQuery("accounts.lockForUpdate", async () => {
      const locked = new Map<string, Account>();
      // one row at a time so the lock order is ours, not the planner's
      for (const id of getLockOrder(ids)) {
        const account = await this.one(
          `SELECT ${COLUMNS} FROM accounts WHERE id = $1 FOR UPDATE`,
          [id]
        );
        if (account) locked.set(id, account);
      }
      return locked;
    });
  }

  async updateBalance(id: string, balance: bigint): Promise<void> {
    await wrapQuery("accounts.updateBalance", async () => {
      const rows = await this.exec(
        `UPDATE accounts SET balance = $2 WHERE id = $1 RETURNING id`,
        [id, toNumeric(balance)]
      );
      if (rows.length === 0) {
        throw new PersistenceError("Account row missing on balance update", undefined, { id });
      }
    });
  }

  async updateStatus(id: string, status: AccountStatus): Promise<Account | null> {
    return wrapQuery("accounts.updateStatus", () =>
      this.one(`UPDATE accounts SET status = $2 WHERE id = $1 RETURNING ${COLUMNS}`, [
        id,
        status,
      ])
    );
  }
}
