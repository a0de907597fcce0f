import { z } from "zod";
import { CreditRepository } from "../interfaces";
import { Credit, CreditPatch } from "../../types/credit.types";
import { PersistenceError } from "../../utils/error";
import { Executor, numeric, parseRows, rateNumeric, toNumeric, wrapQuery } from "./sql";

const creditRow = z
  .object({
    id: z.string(),
    user_id: z.string(),
    account_id: z.string(),
    amount: numeric,
    interest_rate: rateNumeric,
    term_months: z.number().int(),
    monthly_payment: numeric,
    remaining_debt: numeric,
    status: z.enum(["active", "paid_off", "overdue", "cancelled"]),
    start_date: z.date(),
    end_date: z.date(),
    created_at: z.date(),
    updated_at: z.date(),
  })
  .transform(
    (r): Credit => ({
      id: r.id,
      userId: r.user_id,
      accountId: r.account_id,
      amount: r.amount,
      interestRate: r.interest_rate,
      termMonths: r.term_months,
      monthlyPayment: r.monthly_payment,
      remainingDebt: r.remaining_debt,
      status: r.status,
      startDate: r.start_date,
      endDate: r.end_date,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    })
  );

const COLUMNS = `id, user_id, account_id, amount, interest_rate, term_months, monthly_payment,
  remaining_debt, status, start_date, end_date, created_at, updated_at`;

export class PgCreditRepository implements CreditRepository {
  constructor(private readonly exec: Executor) {}

  private async many(text: string, params: unknown[]): Promise<Credit[]> {
    return parseRows(creditRow, await this.exec(text, params), "credits");
  }

  async create(credit: Credit): Promise<Credit> {
    return wrapQuery("credits.create", async () => {
      const [created] = await this.many(
        `INSERT INTO credits (id, user_id, account_id, amount, interest_rate, term_months,
           monthly_payment, remaining_debt, status, start_date, end_date, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         RETURNING ${COLUMNS}`,
        [
          credit.id,
          credit.userId,
          credit.accountId,
          toNumeric(credit.amount),
          credit.interestRate,
          credit.termMonths,
          toNumeric(credit.monthlyPayment),
          toNumeric(credit.remainingDebt),
          credit.status,
          credit.startDate,
          credit.endDate,
          credit.createdAt,
          credit.updatedAt,
        ]
      );
      if (!created) throw new PersistenceError("Credit insert returned no row");
      return created;
    });
  }

  async findById(id: string): Promise<Credit | null> {
    return wrapQuery("credits.findById", async () => {
      const [credit] = await this.many(`SELECT ${COLUMNS} FROM credits WHERE id = $1`, [id]);
      return credit ?? null;
    });
  }

  async listByUser(userId: string): Promise<Credit[]> {
    return wrapQuery("credits.listByUser", () =>
      this.many(
        `SELECT ${COLUMNS} FROM credits WHERE user_id = $1 ORDER BY created_at DESC`,
        [userId]
      )
    );
  }

  async listByAccount(accountId: string): Promise<Credit[]> {
    return wrapQuery("credits.listByAccount", () =>
      this.many(
        `SELECT ${COLUMNS} FROM credits WHERE account_id = $1 ORDER BY created_at DESC`,
        [accountId]
      )
    );
  }

  async lockForUpdate(id: string): Promise<Credit | null> {
    return wrapQuery("credits.lockForUpdate", async () => {
      const [credit] = await this.many(
        `SELECT ${COLUMNS} FROM credits WHERE id = $1 FOR UPDATE`,
        [id]
      );
      return credit ?? null;
    });
  }

  async update(id: string, patch: CreditPatch): Promise<Credit> {
    return wrapQuery("credits.update", async () => {
      const [credit] = await this.many(
        `UPDATE credits
         SET remaining_debt = COALESCE($2, remaining_debt),
             status = COALESCE($3, status)
         WHERE id = $1
         RETURNING ${COLUMNS}`,
        [
          id,
          patch.remainingDebt === undefined ? null : toNumeric(patch.remainingDebt),
          patch.status ?? null,
        ]
      );
      if (!credit) throw new PersistenceError("Credit row missing on update", undefined, { id });
      return credit;
    });
  }
}
