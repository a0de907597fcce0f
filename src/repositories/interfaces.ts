import { Account, AccountStatus, User } from "../types/account.types";
import {
  Credit,
  CreditPatch,
  PaymentScheduleEntry,
  PaymentScheduleEntryPatch,
} from "../types/credit.types";
import { NewTransaction, Page, Transaction } from "../types/transaction.types";

export interface AccountRepository {
  create(account: Account): Promise<Account>;
  findById(id: string): Promise<Account | null>;
  findByNumber(number: string): Promise<Account | null>;
  listByUser(userId: string): Promise<Account[]>;
  /**
   * Locks every listed account row until the unit of work ends, in lock order.
   * Missing ids are absent from the returned map.
   */
  lockForUpdate(ids: string[]): Promise<Map<string, Account>>;
  updateBalance(id: string, balance: bigint): Promise<void>;
  updateStatus(id: string, status: AccountStatus): Promise<Account | null>;
}

export interface TransactionRepository {
  create(tx: NewTransaction): Promise<Transaction>;
  /** newest first */
  listByAccount(accountId: string, page: Required<Page>): Promise<Transaction[]>;
}

export interface CreditRepository {
  create(credit: Credit): Promise<Credit>;
  findById(id: string): Promise<Credit | null>;
  listByUser(userId: string): Promise<Credit[]>;
  listByAccount(accountId: string): Promise<Credit[]>;
  lockForUpdate(id: string): Promise<Credit | null>;
  update(id: string, patch: CreditPatch): Promise<Credit>;
}

export interface PaymentScheduleRepository {
  /** all entries of one credit in one statement */
  createBatch(entries: PaymentScheduleEntry[]): Promise<void>;
  findById(id: string): Promise<PaymentScheduleEntry | null>;
  /** ordered by paymentNumber */
  listByCredit(creditId: string): Promise<PaymentScheduleEntry[]>;
  /**
   * Unpaid entries (pending or overdue) due strictly before asOf whose credit
   * is active or overdue, ordered by dueDate then paymentNumber.
   */
  listDue(asOf: Date): Promise<PaymentScheduleEntry[]>;
  /** pending entries of the listed credits, active ones only, due in [from, until] */
  listUpcoming(creditIds: string[], from: Date, until: Date): Promise<PaymentScheduleEntry[]>;
  lockForUpdate(id: string): Promise<PaymentScheduleEntry | null>;
  update(id: string, patch: PaymentScheduleEntryPatch): Promise<PaymentScheduleEntry>;
  countOverdue(creditId: string): Promise<number>;
}

export interface UserDirectory {
  findById(id: string): Promise<User | null>;
}

export interface StoreSession {
  accounts: AccountRepository;
  transactions: TransactionRepository;
  credits: CreditRepository;
  schedules: PaymentScheduleRepository;
}

export interface UnitOfWork {
  /** Repositories outside any transaction; row locks are released immediately. */
  readonly session: StoreSession;
  /** Runs fn in one transaction. Locks are held until it settles; a throw rolls every write back. */
  runAtomic<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
}
