import { StoreSession, UnitOfWork } from "../interfaces";
import { KeyedMutexes } from "../../utils/keyed-mutex";
import { AUTOCOMMIT, MemoryStore, MemoryTransaction, WriteContext } from "./memory-store";
import { MemoryAccountRepository } from "./account.repository";
import { MemoryTransactionRepository } from "./transaction.repository";
import { MemoryCreditRepository } from "./credit.repository";
import { MemoryPaymentScheduleRepository } from "./payment-schedule.repository";

function createSession(store: MemoryStore, ctx: WriteContext): StoreSession {
  return {
    accounts: new MemoryAccountRepository(store, ctx),
    transactions: new MemoryTransactionRepository(store, ctx),
    credits: new MemoryCreditRepository(store, ctx),
    schedules: new MemoryPaymentScheduleRepository(store, ctx),
  };
}

/**
 * In-process unit of work. Keyed mutexes take the place of row locks and an
 * undo log takes the place of ROLLBACK. Reads outside a lock may observe
 * writes of a unit of work that has not finished yet.
 */
export class MemoryUnitOfWork implements UnitOfWork {
  readonly session: StoreSession;
  private readonly locks = new KeyedMutexes();

  constructor(readonly store: MemoryStore = new MemoryStore()) {
    this.session = createSession(store, AUTOCOMMIT);
  }

  async runAtomic<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const tx = new MemoryTransaction(this.locks);
    try {
      return await fn(createSession(this.store, tx));
    } catch (error) {
      tx.rollback();
      throw error;
    } finally {
      tx.release();
    }
  }

  /** Number of keys currently locked or waited on. */
  get activeLocks(): number {
    return this.locks.size;
  }
}
