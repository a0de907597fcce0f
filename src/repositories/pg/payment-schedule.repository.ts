import { z } from "zod";
import { PaymentScheduleRepository } from "../interfaces";
import {
  PaymentScheduleEntry,
  PaymentScheduleEntryPatch,
} from "../../types/credit.types";
import { PersistenceError } from "../../utils/error";
import { Executor, numeric, parseRows, toNumeric, wrapQuery } from "./sql";

const entryRow = z
  .object({
    id: z.string(),
    credit_id: z.string(),
    payment_number: z.number().int(),
    due_date: z.date(),
    payment_amount: numeric,
    principal_amount: numeric,
    interest_amount: numeric,
    penalty_amount: numeric,
    paid_amount: numeric,
    remaining_balance: numeric,
    status: z.enum(["pending", "paid", "overdue", "cancelled"]),
    paid_at: z.date().nullable(),
    created_at: z.date(),
    updated_at: z.date(),
  })
  .transform(
    (r): PaymentScheduleEntry => ({
      id: r.id,
      creditId: r.credit_id,
      paymentNumber: r.payment_number,
      dueDate: r.due_date,
      paymentAmount: r.payment_amount,
      principalAmount: r.principal_amount,
      interestAmount: r.interest_amount,
      penaltyAmount: r.penalty_amount,
      paidAmount: r.paid_amount,
      remainingBalance: r.remaining_balance,
      status: r.status,
      paidAt: r.paid_at,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    })
  );

const COLUMNS = `ps.id, ps.credit_id, ps.payment_number, ps.due_date, ps.payment_amount,
  ps.principal_amount, ps.interest_amount, ps.penalty_amount, ps.paid_amount,
  ps.remaining_balance, ps.status, ps.paid_at, ps.created_at, ps.updated_at`;

const INSERT_COLUMNS = 14;

export class PgPaymentScheduleRepository implements PaymentScheduleRepository {
  constructor(private readonly exec: Executor) {}

  private async many(text: string, params: unknown[]): Promise<PaymentScheduleEntry[]> {
    return parseRows(entryRow, await this.exec(text, params), "payment_schedules");
  }

  async createBatch(entries: PaymentScheduleEntry[]): Promise<void> {
    if (entries.length === 0) return;

    await wrapQuery("payment_schedules.createBatch", async () => {
      const params: unknown[] = [];
      const tuples = entries.map((e, i) => {
        params.push(
          e.id,
          e.creditId,
          e.paymentNumber,
          e.dueDate,
          toNumeric(e.paymentAmount),
          toNumeric(e.principalAmount),
          toNumeric(e.interestAmount),
          toNumeric(e.penaltyAmount),
          toNumeric(e.paidAmount),
          toNumeric(e.remainingBalance),
          e.status,
          e.paidAt,
          e.createdAt,
          e.updatedAt
        );
        const base = i * INSERT_COLUMNS;
        const placeholders = Array.from({ length: INSERT_COLUMNS }, (_, k) => `$${base + k + 1}`);
        return `(${placeholders.join(", ")})`;
      });

      await this.exec(
        `INSERT INTO payment_schedules (id, credit_id, payment_number, due_date, payment_amount,
           principal_amount, interest_amount, penalty_amount, paid_amount, remaining_balance,
           status, paid_at, created_at, updated_at)
         VALUES ${tuples.join(",\n")}`,
        params
      );
    });
  }

  async findById(id: string): Promise<PaymentScheduleEntry | null> {
    return wrapQuery("payment_schedules.findById", async () => {
      const [entry] = await this.many(
        `SELECT ${COLUMNS} FROM payment_schedules ps WHERE ps.id = $1`,
        [id]
      );
      return entry ?? null;
    });
  }

  async listByCredit(creditId: string): Promise<PaymentScheduleEntry[]> {
    return wrapQuery("payment_schedules.listByCredit", () =>
      this.many(
        `SELECT ${COLUMNS} FROM payment_schedules ps
         WHERE ps.credit_id = $1
         ORDER BY ps.payment_number ASC`,
        [creditId]
      )
    );
  }

  async listDue(asOf: Date): Promise<PaymentScheduleEntry[]> {
    return wrapQuery("payment_schedules.listDue", () =>
      this.many(
        `SELECT ${COLUMNS} FROM payment_schedules ps
         JOIN credits c ON c.id = ps.credit_id
         WHERE ps.due_date < $1
           AND ps.status IN ('pending', 'overdue')
           AND c.status IN ('active', 'overdue')
         ORDER BY ps.due_date ASC, ps.payment_number ASC`,
        [asOf]
      )
    );
  }

  async listUpcoming(
    creditIds: string[],
    from: Date,
    until: Date
  ): Promise<PaymentScheduleEntry[]> {
    if (creditIds.length === 0) return [];
    return wrapQuery("payment_schedules.listUpcoming", () =>
      this.many(
        `SELECT ${COLUMNS} FROM payment_schedules ps
         JOIN credits c ON c.id = ps.credit_id
         WHERE ps.credit_id = ANY($1::uuid[])
           AND ps.due_date BETWEEN $2 AND $3
           AND ps.status = 'pending'
           AND c.status = 'active'
         ORDER BY ps.due_date ASC, ps.payment_number ASC`,
        [creditIds, from, until]
      )
    );
  }

  async lockForUpdate(id: string): Promise<PaymentScheduleEntry | null> {
    return wrapQuery("payment_schedules.lockForUpdate", async () => {
      const [entry] = await this.many(
        `SELECT ${COLUMNS} FROM payment_schedules ps WHERE ps.id = $1 FOR UPDATE`,
        [id]
      );
      return entry ?? null;
    });
  }

  async update(id: string, patch: PaymentScheduleEntryPatch): Promise<PaymentScheduleEntry> {
    return wrapQuery("payment_schedules.update", async () => {
      const [entry] = await this.many(
        `UPDATE payment_schedules ps
         SET status = COALESCE($2, ps.status),
             penalty_amount = COALESCE($3, ps.penalty_amount),
             paid_amount = COALESCE($4, ps.paid_amount),
             paid_at = CASE WHEN $5::boolean THEN $6::timestamptz ELSE ps.paid_at END
         WHERE ps.id = $1
         RETURNING ${COLUMNS}`,
        [
          id,
          patch.status ?? null,
          patch.penaltyAmount === undefined ? null : toNumeric(patch.penaltyAmount),
          patch.paidAmount === undefined ? null : toNumeric(patch.paidAmount),
          patch.paidAt !== undefined,
          patch.paidAt ?? null,
        ]
      );
      if (!entry) {
        throw new PersistenceError("Schedule entry row missing on update", undefined, { id });
      }
      return entry;
    });
  }

  async countOverdue(creditId: string): Promise<number> {
    return wrapQuery("payment_schedules.countOverdue", async () => {
      const rows = parseRows(
        z.object({ count: z.number().int() }),
        await this.exec(
          `SELECT COUNT(*)::int AS count FROM payment_schedules
           WHERE credit_id = $1 AND status = 'overdue'`,
          [creditId]
        ),
        "payment_schedules"
      );
      return rows[0]?.count ?? 0;
    });
  }
}
