import type { Logger } from "pino";
import { UnitOfWork } from "../../repositories/interfaces";
import {
  BalancePrediction,
  CreateCreditInput,
  Credit,
  CreditSummary,
  PaymentScheduleEntry,
  UpcomingPayment,
} from "../../types/credit.types";
import { LedgerService } from "../ledger/ledger.service";
import { RateProvider } from "../rate/rate-provider";
import { NotificationDispatcher } from "../notification/notification.types";
import { notifySafely } from "../notification/notify";
import {
  AccountInactiveError,
  AccountNotFoundError,
  CreditNotFoundError,
  ValidationError,
} from "../../utils/error";
import { Money } from "../../utils/money.util";
import { isErr, settle } from "../../utils/result";
import { withAbortableTimeout } from "../../utils/resilience/timeout.util";
import { addDays, addMonths } from "../../utils/date.util";
import { newId } from "../../utils/id.util";
import { buildPaymentSchedule, computeMonthlyPayment } from "./amortization";

export type CreditServiceOptions = {
  /** kopecks */
  maxAmount: bigint;
  maxTermMonths: number;
  /** percentage points added to the base rate */
  bankMargin: number;
  /** percent, used whenever the rate provider fails */
  fallbackBaseRate: number;
  rateTimeoutMs: number;
  now?: () => Date;
};

const MAX_LOOKAHEAD_DAYS = 3650;

const roundRate = (rate: number): number => Math.round(rate * 10000) / 10000;

export class CreditService {
  private readonly now: () => Date;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly ledger: LedgerService,
    private readonly rates: RateProvider,
    private readonly notifier: NotificationDispatcher,
    private readonly logger: Logger,
    private readonly options: CreditServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createCredit(input: CreateCreditInput): Promise<Credit> {
    const amount = this.validateCreateInput(input);

    const account = await this.uow.session.accounts.findById(input.accountId);
    if (!account) throw new AccountNotFoundError(input.accountId);
    if (account.status !== "active") {
      throw new AccountInactiveError(account.id, account.status);
    }

    const baseRate = await this.resolveBaseRate();
    const interestRate = roundRate(baseRate + this.options.bankMargin);
    const monthlyPayment = Money.roundToMinor(
      computeMonthlyPayment(Money.toNumber(amount), interestRate, input.termMonths)
    );

    const startDate = this.now();
    const credit = await this.uow.session.credits.create({
      id: newId(),
      userId: input.userId,
      accountId: account.id,
      amount,
      interestRate,
      termMonths: input.termMonths,
      monthlyPayment,
      remainingDebt: amount,
      status: "active",
      startDate,
      endDate: addMonths(startDate, input.termMonths),
      createdAt: startDate,
      updatedAt: startDate,
    });

    const log = this.logger.child({ creditId: credit.id, accountId: account.id });

    const schedule = buildPaymentSchedule({
      principal: amount,
      annualRatePercent: interestRate,
      termMonths: input.termMonths,
      monthlyPayment,
      startDate,
    });
    try {
      await this.uow.session.schedules.createBatch(
        schedule.map(
          (p): PaymentScheduleEntry => ({
            id: newId(),
            creditId: credit.id,
            ...p,
            penaltyAmount: 0n,
            paidAmount: 0n,
            status: "pending",
            paidAt: null,
            createdAt: startDate,
            updatedAt: startDate,
          })
        )
      );
    } catch (error) {
      // the credit stands without a schedule; the sweep will not see it
      log.error({ error }, "Failed to persist payment schedule");
    }

    await this.ledger.disburse(account.id, amount, `Credit disbursement ${credit.id}`);

    log.info(
      {
        amount: Money.toMajor(amount),
        interestRate,
        termMonths: credit.termMonths,
        monthlyPayment: Money.toMajor(monthlyPayment),
      },
      "Credit issued"
    );

    await notifySafely(this.notifier, log, "credit_issued", { userId: credit.userId }, {
      creditId: credit.id,
      amount: Money.toMajor(amount),
      interestRate,
      termMonths: credit.termMonths,
      monthlyPayment: Money.toMajor(monthlyPayment),
      firstDueDate: addMonths(startDate, 1).toISOString().slice(0, 10),
    });

    return credit;
  }

  async getCredit(creditId: string): Promise<Credit> {
    const credit = await this.uow.session.credits.findById(creditId);
    if (!credit) throw new CreditNotFoundError(creditId);
    return credit;
  }

  async listCredits(userId: string): Promise<Credit[]> {
    return this.uow.session.credits.listByUser(userId);
  }

  async getSchedule(creditId: string): Promise<PaymentScheduleEntry[]> {
    await this.getCredit(creditId);
    return this.uow.session.schedules.listByCredit(creditId);
  }

  async getCreditSummary(userId: string): Promise<CreditSummary> {
    const credits = await this.listCredits(userId);
    const open = credits.filter((c) => c.status === "active" || c.status === "overdue");

    let overduePayments = 0;
    for (const credit of open) {
      overduePayments += await this.uow.session.schedules.countOverdue(credit.id);
    }

    return {
      userId,
      openCredits: open.length,
      totalRemainingDebt: open.reduce((sum, c) => sum + c.remainingDebt, 0n),
      totalMonthlyPayments: open.reduce((sum, c) => sum + c.monthlyPayment, 0n),
      overduePayments,
    };
  }

  async getUpcomingPayments(userId: string, days: number): Promise<UpcomingPayment[]> {
    const from = this.now();
    const until = addDays(from, this.validateDays(days));

    const credits = new Map((await this.listCredits(userId)).map((c) => [c.id, c]));
    const entries = await this.uow.session.schedules.listUpcoming(
      Array.from(credits.keys()),
      from,
      until
    );

    const upcoming: UpcomingPayment[] = [];
    for (const entry of entries) {
      const credit = credits.get(entry.creditId);
      if (credit) upcoming.push({ creditId: credit.id, accountId: credit.accountId, entry });
    }
    return upcoming;
  }

  /** Balance left once every pending payment charged to the account in the window is taken. */
  async predictBalance(accountId: string, days: number): Promise<BalancePrediction> {
    const from = this.now();
    const until = addDays(from, this.validateDays(days));

    const account = await this.ledger.getAccount(accountId);
    const creditIds = (await this.uow.session.credits.listByAccount(accountId)).map((c) => c.id);
    const entries = await this.uow.session.schedules.listUpcoming(creditIds, from, until);

    const scheduledPayments = entries.reduce((sum, e) => sum + e.paymentAmount, 0n);

    return {
      accountId,
      currentBalance: account.balance,
      scheduledPayments,
      predictedBalance: account.balance - scheduledPayments,
      until,
    };
  }

  private validateCreateInput(input: CreateCreditInput): bigint {
    if (!input.userId) throw new ValidationError("userId is required");
    if (!input.accountId) throw new ValidationError("accountId is required");

    const amount = Money.toMinor(input.amount);
    if (amount <= 0n) {
      throw new ValidationError("Credit amount must be positive", { amount: input.amount });
    }
    if (amount > this.options.maxAmount) {
      throw new ValidationError("Credit amount exceeds the limit", {
        amount: Money.toMajor(amount),
        max: Money.toMajor(this.options.maxAmount),
      });
    }

    const { termMonths } = input;
    if (!Number.isInteger(termMonths) || termMonths <= 0 || termMonths > this.options.maxTermMonths) {
      throw new ValidationError(
        `Term must be a whole number of months between 1 and ${this.options.maxTermMonths}`,
        { termMonths }
      );
    }
    return amount;
  }

  private validateDays(days: number): number {
    if (!Number.isInteger(days) || days <= 0 || days > MAX_LOOKAHEAD_DAYS) {
      throw new ValidationError(`days must be a whole number between 1 and ${MAX_LOOKAHEAD_DAYS}`, {
        days,
      });
    }
    return days;
  }

  private async resolveBaseRate(): Promise<number> {
    const result = await settle(
      withAbortableTimeout((signal) => this.rates.getAnnualRate(signal), this.options.rateTimeoutMs, {
        label: "Base rate lookup",
      })
    );

    if (isErr(result)) {
      this.logger.warn(
        { error: result.error, fallbackRate: this.options.fallbackBaseRate },
        "Rate provider unavailable, using fallback base rate"
      );
      return this.options.fallbackBaseRate;
    }
    if (!Number.isFinite(result.value) || result.value < 0) {
      this.logger.warn(
        { rate: result.value, fallbackRate: this.options.fallbackBaseRate },
        "Rate provider returned an invalid rate, using fallback base rate"
      );
      return this.options.fallbackBaseRate;
    }
    return result.value;
  }
}
