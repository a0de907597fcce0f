import { CreditRepository } from "../interfaces";
import { Credit, CreditPatch } from "../../types/credit.types";
import { PersistenceError } from "../../utils/error";
import { MemoryStore, WriteContext, copy, lockKey } from "./memory-store";

const newestFirst = (a: Credit, b: Credit) => b.createdAt.getTime() - a.createdAt.getTime();

export class MemoryCreditRepository implements CreditRepository {
  constructor(
    private readonly store: MemoryStore,
    private readonly ctx: WriteContext
  ) {}

  async create(credit: Credit): Promise<Credit> {
    if (this.store.credits.has(credit.id)) {
      throw new PersistenceError("Duplicate credit id", undefined, { id: credit.id });
    }
    if (!this.store.accounts.has(credit.accountId)) {
      throw new PersistenceError("Credit references a missing account", undefined, {
        accountId: credit.accountId,
      });
    }
    this.store.credits.set(credit.id, copy(credit));
    this.ctx.record(() => this.store.credits.delete(credit.id));
    return copy(credit);
  }

  async findById(id: string): Promise<Credit | null> {
    const credit = this.store.credits.get(id);
    return credit ? copy(credit) : null;
  }

  async listByUser(userId: string): Promise<Credit[]> {
    return Array.from(this.store.credits.values())
      .filter((c) => c.userId === userId)
      .sort(newestFirst)
      .map(copy);
  }

  async listByAccount(accountId: string): Promise<Credit[]> {
    return Array.from(this.store.credits.values())
      .filter((c) => c.accountId === accountId)
      .sort(newestFirst)
      .map(copy);
  }

  async lockForUpdate(id: string): Promise<Credit | null> {
    await this.ctx.lock(lockKey.credit(id));
    return this.findById(id);
  }

  async update(id: string, patch: CreditPatch): Promise<Credit> {
    const prev = this.store.credits.get(id);
    if (!prev) {
      throw new PersistenceError("Credit row missing on update", undefined, { id });
    }
    const next: Credit = { ...prev, ...patch, updatedAt: new Date() };
    this.store.credits.set(id, next);
    this.ctx.record(() => this.store.credits.set(id, prev));
    return copy(next);
  }
}
