import { PaymentScheduleRepository } from "../interfaces";
import {
  PaymentScheduleEntry,
  PaymentScheduleEntryPatch,
} from "../../types/credit.types";
import { PersistenceError } from "../../utils/error";
import { MemoryStore, WriteContext, copy, lockKey } from "./memory-store";

const byDueDate = (a: PaymentScheduleEntry, b: PaymentScheduleEntry) =>
  a.dueDate.getTime() - b.dueDate.getTime() || a.paymentNumber - b.paymentNumber;

export class MemoryPaymentScheduleRepository implements PaymentScheduleRepository {
  constructor(
    private readonly store: MemoryStore,
    private readonly ctx: WriteContext
  ) {}

  async createBatch(entries: PaymentScheduleEntry[]): Promise<void> {
    const taken = new Set<string>();
    for (const existing of this.store.schedules.values()) {
      taken.add(`${existing.creditId}:${existing.paymentNumber}`);
    }
    for (const entry of entries) {
      const key = `${entry.creditId}:${entry.paymentNumber}`;
      if (taken.has(key) || this.store.schedules.has(entry.id)) {
        throw new PersistenceError("Duplicate payment schedule entry", undefined, {
          creditId: entry.creditId,
          paymentNumber: entry.paymentNumber,
        });
      }
      if (!this.store.credits.has(entry.creditId)) {
        throw new PersistenceError("Schedule entry references a missing credit", undefined, {
          creditId: entry.creditId,
        });
      }
      taken.add(key);
    }

    for (const entry of entries) {
      this.store.schedules.set(entry.id, copy(entry));
    }
    this.ctx.record(() => {
      for (const entry of entries) this.store.schedules.delete(entry.id);
    });
  }

  async findById(id: string): Promise<PaymentScheduleEntry | null> {
    const entry = this.store.schedules.get(id);
    return entry ? copy(entry) : null;
  }

  async listByCredit(creditId: string): Promise<PaymentScheduleEntry[]> {
    return Array.from(this.store.schedules.values())
      .filter((e) => e.creditId === creditId)
      .sort((a, b) => a.paymentNumber - b.paymentNumber)
      .map(copy);
  }

  async listDue(asOf: Date): Promise<PaymentScheduleEntry[]> {
    return Array.from(this.store.schedules.values())
      .filter((e) => {
        if (e.dueDate.getTime() >= asOf.getTime()) return false;
        if (e.status !== "pending" && e.status !== "overdue") return false;
        const credit = this.store.credits.get(e.creditId);
        return credit !== undefined && (credit.status === "active" || credit.status === "overdue");
      })
      .sort(byDueDate)
      .map(copy);
  }

  async listUpcoming(
    creditIds: string[],
    from: Date,
    until: Date
  ): Promise<PaymentScheduleEntry[]> {
    const wanted = new Set(creditIds);
    return Array.from(this.store.schedules.values())
      .filter((e) => {
        if (!wanted.has(e.creditId)) return false;
        const due = e.dueDate.getTime();
        if (due < from.getTime() || due > until.getTime()) return false;
        if (e.status !== "pending") return false;
        return this.store.credits.get(e.creditId)?.status === "active";
      })
      .sort(byDueDate)
      .map(copy);
  }

  async lockForUpdate(id: string): Promise<PaymentScheduleEntry | null> {
    await this.ctx.lock(lockKey.entry(id));
    return this.findById(id);
  }

  async update(id: string, patch: PaymentScheduleEntryPatch): Promise<PaymentScheduleEntry> {
    const prev = this.store.schedules.get(id);
    if (!prev) {
      throw new PersistenceError("Schedule entry row missing on update", undefined, { id });
    }
    const next: PaymentScheduleEntry = { ...prev, ...patch, updatedAt: new Date() };
    this.store.schedules.set(id, next);
    this.ctx.record(() => this.store.schedules.set(id, prev));
    return copy(next);
  }

  async countOverdue(creditId: string): Promise<number> {
    let count = 0;
    for (const entry of this.store.schedules.values()) {
      if (entry.creditId === creditId && entry.status === "overdue") count++;
    }
    return count;
  }
}
