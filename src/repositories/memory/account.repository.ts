import { AccountRepository } from "../interfaces";
import { Account, AccountStatus } from "../../types/account.types";
import { PersistenceError } from "../../utils/error";
import { getLockOrder } from "../../utils/lock-ordering";
import { MemoryStore, WriteContext, copy, lockKey } from "./memory-store";

export class MemoryAccountRepository implements AccountRepository {
  constructor(
    private readonly store: MemoryStore,
    private readonly ctx: WriteContext
  ) {}

  async create(account: Account): Promise<Account> {
    if (this.store.accounts.has(account.id)) {
      throw new PersistenceError("Duplicate account id", undefined, { id: account.id });
    }
    for (const existing of this.store.accounts.values()) {
      if (existing.number === account.number) {
        throw new PersistenceError("Duplicate account number", undefined, {
          number: account.number,
        });
      }
    }
    this.store.accounts.set(account.id, copy(account));
    this.ctx.record(() => this.store.accounts.delete(account.id));
    return copy(account);
  }

  async findById(id: string): Promise<Account | null> {
    const account = this.store.accounts.get(id);
    return account ? copy(account) : null;
  }

  async findByNumber(number: string): Promise<Account | null> {
    for (const account of this.store.accounts.values()) {
      if (account.number === number) return copy(account);
    }
    return null;
  }

  async listByUser(userId: string): Promise<Account[]> {
    return Array.from(this.store.accounts.values())
      .filter((a) => a.userId === userId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copy);
  }

  async lockForUpdate(ids: string[]): Promise<Map<string, Account>> {
    const locked = new Map<string, Account>();
    for (const id of getLockOrder(ids)) {
      await this.ctx.lock(lockKey.account(id));
      const account = this.store.accounts.get(id);
      if (account) locked.set(id, copy(account));
    }
    return locked;
  }

  async updateBalance(id: string, balance: bigint): Promise<void> {
    const prev = this.store.accounts.get(id);
    if (!prev) {
      throw new PersistenceError("Account row missing on balance update", undefined, { id });
    }
    if (balance < 0n) {
      throw new PersistenceError("Account balance cannot be negative", undefined, {
        id,
        balance: balance.toString(),
      });
    }
    this.store.accounts.set(id, { ...prev, balance, updatedAt: new Date() });
    this.ctx.record(() => this.store.accounts.set(id, prev));
  }

  async updateStatus(id: string, status: AccountStatus): Promise<Account | null> {
    const prev = this.store.accounts.get(id);
    if (!prev) return null;
    const next = { ...prev, status, updatedAt: new Date() };
    this.store.accounts.set(id, next);
    this.ctx.record(() => this.store.accounts.set(id, prev));
    return copy(next);
  }
}
