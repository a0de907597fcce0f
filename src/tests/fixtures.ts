import pino from "pino";
import { MemoryUnitOfWork } from "../repositories/memory/unit-of-work";
import { Account } from "../types/account.types";
import { Credit, PaymentScheduleEntry } from "../types/credit.types";
import { Money } from "../utils/money.util";
import {
  NotificationArgs,
  NotificationDispatcher,
} from "../services/notification/notification.types";

export const silentLogger = pino({ level: "silent" });

export const USER_ID = "11111111-1111-4111-8111-111111111111";

let counter = 0;
const nextNumber = () => `40817810${String(++counter).padStart(12, "0")}`;

export function seedAccount(
  uow: MemoryUnitOfWork,
  overrides: Partial<Account> & { id: string }
): Account {
  const now = new Date("2024-01-01T00:00:00.000Z");
  const account: Account = {
    userId: USER_ID,
    number: nextNumber(),
    balance: 0n,
    currency: "RUB",
    status: "active",
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
  uow.store.accounts.set(account.id, account);
  return account;
}

export function seedCredit(
  uow: MemoryUnitOfWork,
  overrides: Partial<Credit> & { id: string; accountId: string }
): Credit {
  const start = new Date("2024-01-15T00:00:00.000Z");
  const credit: Credit = {
    userId: USER_ID,
    amount: Money.toMinor("1000.00"),
    interestRate: 21,
    termMonths: 12,
    monthlyPayment: Money.toMinor("100.00"),
    remainingDebt: Money.toMinor("1000.00"),
    status: "active",
    startDate: start,
    endDate: new Date("2025-01-15T00:00:00.000Z"),
    createdAt: start,
    updatedAt: start,
    ...overrides,
  };
  uow.store.credits.set(credit.id, credit);
  return credit;
}

export function seedEntry(
  uow: MemoryUnitOfWork,
  overrides: Partial<PaymentScheduleEntry> & { id: string; creditId: string }
): PaymentScheduleEntry {
  const created = new Date("2024-01-15T00:00:00.000Z");
  const entry: PaymentScheduleEntry = {
    paymentNumber: 1,
    dueDate: new Date("2024-02-15T00:00:00.000Z"),
    paymentAmount: Money.toMinor("100.00"),
    principalAmount: Money.toMinor("80.00"),
    interestAmount: Money.toMinor("20.00"),
    penaltyAmount: 0n,
    paidAmount: 0n,
    remainingBalance: Money.toMinor("920.00"),
    status: "pending",
    paidAt: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
  uow.store.schedules.set(entry.id, entry);
  return entry;
}

/** Keeps every notification it is asked to send. */
export class RecordingNotifier implements NotificationDispatcher {
  readonly sent: NotificationArgs[] = [];

  async send(...args: NotificationArgs): Promise<void> {
    this.sent.push(args);
  }
}
