import { Account, User } from "../../types/account.types";
import { Credit, PaymentScheduleEntry } from "../../types/credit.types";
import { Transaction } from "../../types/transaction.types";
import { KeyedMutexes, Release } from "../../utils/keyed-mutex";
import { PersistenceError } from "../../utils/error";

/** Tables of the in-memory store. Shared by every session of one unit of work. */
export class MemoryStore {
  readonly accounts = new Map<string, Account>();
  readonly credits = new Map<string, Credit>();
  readonly schedules = new Map<string, PaymentScheduleEntry>();
  readonly users = new Map<string, User>();
  transactions: Transaction[] = [];
}

export interface WriteContext {
  lock(key: string): Promise<void>;
  record(undo: () => void): void;
}

/** Outside a transaction: no locks held, nothing to undo. */
export const AUTOCOMMIT: WriteContext = {
  lock: async () => undefined,
  record: () => undefined,
};

export class MemoryTransaction implements WriteContext {
  private held = new Map<string, Release>();
  private undoLog: Array<() => void> = [];
  private finished = false;

  constructor(private readonly locks: KeyedMutexes) {}

  async lock(key: string): Promise<void> {
    if (this.finished) {
      throw new PersistenceError("Unit of work already finished", undefined, { key });
    }
    if (this.held.has(key)) return;
    const release = await this.locks.acquire(key);
    this.held.set(key, release);
  }

  record(undo: () => void): void {
    if (!this.finished) this.undoLog.push(undo);
  }

  rollback(): void {
    for (let i = this.undoLog.length - 1; i >= 0; i--) {
      this.undoLog[i]();
    }
    this.undoLog = [];
  }

  release(): void {
    this.finished = true;
    this.undoLog = [];
    const releases = Array.from(this.held.values()).reverse();
    this.held.clear();
    for (const release of releases) release();
  }
}

export const copy = <T extends object>(row: T): T => ({ ...row });

export const lockKey = {
  account: (id: string) => `account:${id}`,
  credit: (id: string) => `credit:${id}`,
  entry: (id: string) => `entry:${id}`,
};
