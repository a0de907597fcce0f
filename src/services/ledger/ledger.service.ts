import type { Logger } from "pino";
import { UnitOfWork } from "../../repositories/interfaces";
import {
  ACCOUNT_STATUSES,
  Account,
  AccountStatus,
  SUPPORTED_CURRENCY,
} from "../../types/account.types";
import { NewTransaction, Page, Transaction } from "../../types/transaction.types";
import {
  AccountInactiveError,
  AccountNotFoundError,
  InsufficientFundsError,
  PersistenceError,
  ValidationError,
} from "../../utils/error";
import { Money } from "../../utils/money.util";
import { generateAccountNumber, newId } from "../../utils/id.util";

export type LedgerServiceOptions = {
  /** kopecks */
  maxOperationAmount: bigint;
  generateAccountNumber?: () => string;
};

export type TransferResult = { from: Account; to: Account };

const DEFAULT_PAGE_LIMIT = 50;
const MAX_PAGE_LIMIT = 500;
const ACCOUNT_NUMBER_ATTEMPTS = 5;

export class LedgerService {
  private readonly nextAccountNumber: () => string;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly logger: Logger,
    private readonly options: LedgerServiceOptions
  ) {
    this.nextAccountNumber = options.generateAccountNumber ?? generateAccountNumber;
  }

  // -------------------------
  //     Accounts
  // -------------------------

  async openAccount(userId: string, currency: string = SUPPORTED_CURRENCY): Promise<Account> {
    if (!userId) throw new ValidationError("userId is required");
    if (currency !== SUPPORTED_CURRENCY) {
      throw new ValidationError(`Unsupported currency: ${currency}`, {
        supported: [SUPPORTED_CURRENCY],
      });
    }

    for (let attempt = 1; attempt <= ACCOUNT_NUMBER_ATTEMPTS; attempt++) {
      const number = this.nextAccountNumber();
      if (await this.uow.session.accounts.findByNumber(number)) continue;

      const now = new Date();
      const account = await this.uow.session.accounts.create({
        id: newId(),
        userId,
        number,
        balance: 0n,
        currency: SUPPORTED_CURRENCY,
        status: "active",
        createdAt: now,
        updatedAt: now,
      });
      this.logger.info({ accountId: account.id, userId }, "Account opened");
      return account;
    }

    throw new PersistenceError("Could not allocate a unique account number", undefined, {
      attempts: ACCOUNT_NUMBER_ATTEMPTS,
    });
  }

  async getAccount(accountId: string): Promise<Account> {
    const account = await this.uow.session.accounts.findById(accountId);
    if (!account) throw new AccountNotFoundError(accountId);
    return account;
  }

  async listAccounts(userId: string): Promise<Account[]> {
    return this.uow.session.accounts.listByUser(userId);
  }

  async setAccountStatus(accountId: string, status: AccountStatus): Promise<Account> {
    if (!ACCOUNT_STATUSES.includes(status)) {
      throw new ValidationError(`Unknown account status: ${status}`);
    }
    const account = await this.uow.runAtomic(async (s) => {
      const locked = await s.accounts.lockForUpdate([accountId]);
      if (!locked.has(accountId)) throw new AccountNotFoundError(accountId);
      return s.accounts.updateStatus(accountId, status);
    });
    if (!account) throw new AccountNotFoundError(accountId);
    this.logger.info({ accountId, status }, "Account status changed");
    return account;
  }

  async listTransactions(accountId: string, page: Page = {}): Promise<Transaction[]> {
    await this.getAccount(accountId);
    const limit = Math.min(
      Math.max(Math.trunc(page.limit ?? DEFAULT_PAGE_LIMIT), 1),
      MAX_PAGE_LIMIT
    );
    const offset = Math.max(Math.trunc(page.offset ?? 0), 0);
    return this.uow.session.transactions.listByAccount(accountId, { limit, offset });
  }

  // -------------------------
  //     Money movement
  // -------------------------

  async deposit(accountId: string, amount: string | number): Promise<Account> {
    const minor = this.parseAmount(amount);
    const account = await this.credit(accountId, minor);

    await this.recordTransaction({
      fromAccountId: null,
      toAccountId: accountId,
      amount: minor,
      currency: SUPPORTED_CURRENCY,
      type: "deposit",
      description: "Deposit",
    });
    this.logger.info({ accountId, amount: Money.toMajor(minor) }, "Deposit completed");
    return account;
  }

  async withdraw(accountId: string, amount: string | number): Promise<Account> {
    const minor = this.parseAmount(amount);

    const account = await this.uow.runAtomic(async (s) => {
      const locked = await s.accounts.lockForUpdate([accountId]);
      const acc = this.requireActive(locked, accountId);
      this.requireFunds(acc, minor);

      const balance = acc.balance - minor;
      await s.accounts.updateBalance(accountId, balance);
      return { ...acc, balance };
    });

    await this.recordTransaction({
      fromAccountId: accountId,
      toAccountId: null,
      amount: minor,
      currency: SUPPORTED_CURRENCY,
      type: "withdraw",
      description: "Withdrawal",
    });
    this.logger.info({ accountId, amount: Money.toMajor(minor) }, "Withdrawal completed");
    return account;
  }

  async transfer(fromId: string, toId: string, amount: string | number): Promise<TransferResult> {
    const minor = this.parseAmount(amount);
    if (fromId === toId) {
      throw new ValidationError("Cannot transfer to the same account", { accountId: fromId });
    }

    const result = await this.uow.runAtomic(async (s) => {
      const locked = await s.accounts.lockForUpdate([fromId, toId]);
      const from = this.requireActive(locked, fromId);
      const to = this.requireActive(locked, toId);
      this.requireFunds(from, minor);

      const fromBalance = from.balance - minor;
      const toBalance = to.balance + minor;
      await s.accounts.updateBalance(fromId, fromBalance);
      await s.accounts.updateBalance(toId, toBalance);
      return {
        from: { ...from, balance: fromBalance },
        to: { ...to, balance: toBalance },
      };
    });

    await this.recordTransaction({
      fromAccountId: fromId,
      toAccountId: toId,
      amount: minor,
      currency: SUPPORTED_CURRENCY,
      type: "transfer",
      description: "Transfer between accounts",
    });
    this.logger.info(
      { fromAccountId: fromId, toAccountId: toId, amount: Money.toMajor(minor) },
      "Transfer completed"
    );
    return result;
  }

  /** Credits a loan's principal to its funding account. */
  async disburse(accountId: string, amount: bigint, description: string): Promise<Account> {
    this.assertAmount(amount);
    const account = await this.credit(accountId, amount);

    await this.recordTransaction({
      fromAccountId: null,
      toAccountId: accountId,
      amount,
      currency: SUPPORTED_CURRENCY,
      type: "credit_disbursement",
      description,
    });
    this.logger.info({ accountId, amount: Money.toMajor(amount) }, "Credit disbursed");
    return account;
  }

  /**
   * Appends an audit record after the balance change has committed.
   * A failed write is logged and does not undo the balance change.
   */
  async recordTransaction(tx: NewTransaction): Promise<Transaction | null> {
    try {
      return await this.uow.session.transactions.create(tx);
    } catch (error) {
      this.logger.error(
        {
          error,
          type: tx.type,
          fromAccountId: tx.fromAccountId,
          toAccountId: tx.toAccountId,
          amount: Money.toMajor(tx.amount),
        },
        "Failed to record transaction"
      );
      return null;
    }
  }

  // -------------------------
  //     Helpers
  // -------------------------

  private async credit(accountId: string, minor: bigint): Promise<Account> {
    return this.uow.runAtomic(async (s) => {
      const locked = await s.accounts.lockForUpdate([accountId]);
      const acc = this.requireActive(locked, accountId);

      const balance = acc.balance + minor;
      await s.accounts.updateBalance(accountId, balance);
      return { ...acc, balance };
    });
  }

  private parseAmount(amount: string | number): bigint {
    const minor = Money.toMinor(amount);
    this.assertAmount(minor);
    return minor;
  }

  private assertAmount(minor: bigint): void {
    if (minor <= 0n) {
      throw new ValidationError("Amount must be positive", { amount: Money.toMajor(minor) });
    }
    if (minor > this.options.maxOperationAmount) {
      throw new ValidationError("Amount exceeds the operation limit", {
        amount: Money.toMajor(minor),
        max: Money.toMajor(this.options.maxOperationAmount),
      });
    }
  }

  private requireActive(locked: Map<string, Account>, accountId: string): Account {
    const account = locked.get(accountId);
    if (!account) throw new AccountNotFoundError(accountId);
    if (account.status !== "active") throw new AccountInactiveError(accountId, account.status);
    return account;
  }

  private requireFunds(account: Account, required: bigint): void {
    if (account.balance < required) {
      this.logger.warn(
        {
          accountId: account.id,
          balance: Money.toMajor(account.balance),
          required: Money.toMajor(required),
        },
        "Insufficient funds"
      );
      throw new InsufficientFundsError(account.id, account.balance, required);
    }
  }
}
