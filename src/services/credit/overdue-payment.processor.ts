import type { Logger } from "pino";
import { StoreSession, UnitOfWork } from "../../repositories/interfaces";
import { Account, SUPPORTED_CURRENCY } from "../../types/account.types";
import { Credit, CreditStatus, PaymentScheduleEntry } from "../../types/credit.types";
import { LedgerService } from "../ledger/ledger.service";
import { NotificationDispatcher } from "../notification/notification.types";
import { notifySafely } from "../notification/notify";
import { Ticker } from "../worker/ticker";
import {
  AccountNotFoundError,
  AppError,
  CreditNotFoundError,
  ScheduleEntryNotFoundError,
} from "../../utils/error";
import { Money } from "../../utils/money.util";
import { isErr, settle } from "../../utils/result";

export type ProcessorState = "idle" | "running" | "stopped";

export interface SweepSummary {
  processed: number;
  failed: number;
  settled: number;
  penalized: number;
  skipped: number;
  total: number;
  startedAt: Date;
  finishedAt: Date;
}

export type OverduePaymentProcessorOptions = {
  /** fraction of the payment charged per missed sweep, 0.1 = 10% */
  penaltyRate: number;
  shutdownTimeoutMs: number;
  now?: () => Date;
  onSweep?: (summary: SweepSummary) => void;
};

type EntryOutcome =
  | { kind: "skipped"; entryId: string; reason: string }
  | {
      kind: "settled";
      entry: PaymentScheduleEntry;
      credit: Credit;
      account: Account;
      charged: bigint;
      penalty: bigint;
    }
  | {
      kind: "penalized";
      entry: PaymentScheduleEntry;
      credit: Credit;
      account: Account;
      penalty: bigint;
    };

/**
 * Periodically collects past-due schedule entries from their funding accounts.
 *
 * Each entry is settled in its own unit of work (entry, then credit, then
 * account row locked). When the balance does not cover payment plus penalty
 * nothing is charged: the entry is marked overdue and the penalty accrues,
 * again on every following sweep until the entry is paid.
 */
export class OverduePaymentProcessor {
  private state: ProcessorState = "idle";
  private sweeping = 0;
  private idleWaiters: Array<() => void> = [];
  private stopping: Promise<void> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly ledger: LedgerService,
    private readonly notifier: NotificationDispatcher,
    private readonly ticker: Ticker,
    private readonly logger: Logger,
    private readonly options: OverduePaymentProcessorOptions
  ) {
    if (!(options.penaltyRate >= 0)) {
      throw new RangeError(`Invalid penalty rate: ${options.penaltyRate}`);
    }
    this.now = options.now ?? (() => new Date());
  }

  get status(): ProcessorState {
    return this.state;
  }

  get isSweeping(): boolean {
    return this.sweeping > 0;
  }

  /** Runs one sweep right away, then one per tick. */
  start(signal?: AbortSignal): void {
    if (this.state === "stopped") {
      throw new AppError("Processor has been stopped and cannot be restarted", {
        code: "PROCESSOR_STOPPED",
        status: 409,
      });
    }
    if (this.state === "running") return;

    this.state = "running";
    this.logger.info({ penaltyRate: this.options.penaltyRate }, "Overdue payment processor started");

    if (signal) {
      if (signal.aborted) {
        void this.stop();
        return;
      }
      signal.addEventListener("abort", () => void this.stop(), { once: true });
    }

    this.ticker.start(() => this.tick());
    this.tick();
  }

  /**
   * Halts future ticks. Resolves once the in-flight sweep finishes or the
   * shutdown deadline passes, whichever comes first. Never rejects.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;

    this.state = "stopped";
    this.ticker.stop();
    this.stopping = this.waitForSweep();
    return this.stopping;
  }

  async runSweep(): Promise<SweepSummary> {
    this.sweeping++;
    try {
      return await this.sweep();
    } finally {
      this.sweeping--;
      if (this.sweeping === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }

  private tick(): void {
    if (this.state !== "running") return;
    if (this.sweeping > 0) {
      this.logger.warn("Previous sweep still running, skipping tick");
      return;
    }
    void this.runSweep().catch((error: unknown) => {
      this.logger.error({ error }, "Overdue payment sweep failed");
    });
  }

  private async waitForSweep(): Promise<void> {
    if (this.sweeping === 0) {
      this.logger.info("Overdue payment processor stopped");
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const idle = new Promise<"idle">((resolve) => this.idleWaiters.push(() => resolve("idle")));
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.options.shutdownTimeoutMs);
    });

    const outcome = await Promise.race([idle, deadline]);
    if (timer) clearTimeout(timer);

    if (outcome === "timeout") {
      this.logger.warn(
        { shutdownTimeoutMs: this.options.shutdownTimeoutMs },
        "Shutdown deadline passed with a sweep still running"
      );
    } else {
      this.logger.info("Overdue payment processor stopped");
    }
  }

  private async sweep(): Promise<SweepSummary> {
    const startedAt = this.now();
    const due = await this.uow.session.schedules.listDue(startedAt);

    const summary: SweepSummary = {
      processed: 0,
      failed: 0,
      settled: 0,
      penalized: 0,
      skipped: 0,
      total: due.length,
      startedAt,
      finishedAt: startedAt,
    };

    for (const candidate of due) {
      const result = await settle(this.processEntry(candidate.id));
      if (isErr(result)) {
        summary.failed++;
        this.logger.error(
          { error: result.error, entryId: candidate.id, creditId: candidate.creditId },
          "Failed to process due payment"
        );
        continue;
      }

      summary.processed++;
      const outcome = result.value;
      switch (outcome.kind) {
        case "skipped":
          summary.skipped++;
          break;
        case "settled":
          summary.settled++;
          await this.followUp(this.afterSettlement(outcome), outcome.entry.id);
          break;
        case "penalized":
          summary.penalized++;
          await this.followUp(this.afterPenalty(outcome), outcome.entry.id);
          break;
      }
    }

    summary.finishedAt = this.now();
    this.logger.info(
      {
        processed: summary.processed,
        failed: summary.failed,
        settled: summary.settled,
        penalized: summary.penalized,
        skipped: summary.skipped,
        total: summary.total,
        durationMs: summary.finishedAt.getTime() - startedAt.getTime(),
      },
      "Overdue payment sweep finished"
    );
    this.options.onSweep?.(summary);
    return summary;
  }

  private processEntry(entryId: string): Promise<EntryOutcome> {
    return this.uow.runAtomic<EntryOutcome>(async (s) => {
      const entry = await s.schedules.lockForUpdate(entryId);
      if (!entry) throw new ScheduleEntryNotFoundError(entryId);
      // a concurrent sweep may have settled it since listDue
      if (entry.status !== "pending" && entry.status !== "overdue") {
        return { kind: "skipped", entryId, reason: `entry is ${entry.status}` };
      }

      const credit = await s.credits.lockForUpdate(entry.creditId);
      if (!credit) throw new CreditNotFoundError(entry.creditId);
      if (credit.status !== "active" && credit.status !== "overdue") {
        return { kind: "skipped", entryId, reason: `credit is ${credit.status}` };
      }

      const locked = await s.accounts.lockForUpdate([credit.accountId]);
      const account = locked.get(credit.accountId);
      if (!account) throw new AccountNotFoundError(credit.accountId);

      const penalty = Money.percentOf(entry.paymentAmount, this.options.penaltyRate);
      const charge = entry.paymentAmount + penalty;

      if (account.status === "active" && account.balance >= charge) {
        return this.settle(s, entry, credit, account, charge, penalty);
      }
      return this.penalize(s, entry, credit, account, charge, penalty);
    });
  }

  private async settle(
    s: StoreSession,
    entry: PaymentScheduleEntry,
    credit: Credit,
    account: Account,
    charge: bigint,
    penalty: bigint
  ): Promise<EntryOutcome> {
    const balance = account.balance - charge;
    await s.accounts.updateBalance(account.id, balance);

    const paid = await s.schedules.update(entry.id, {
      status: "paid",
      paidAt: this.now(),
      paidAmount: charge,
      penaltyAmount: entry.penaltyAmount + penalty,
    });

    const remainingDebt = Money.max(credit.remainingDebt - entry.principalAmount, 0n);
    let status: CreditStatus = credit.status;
    if (remainingDebt === 0n) {
      status = "paid_off";
    } else if (credit.status === "overdue" && (await s.schedules.countOverdue(credit.id)) === 0) {
      status = "active";
    }
    const updated = await s.credits.update(credit.id, { remainingDebt, status });

    return {
      kind: "settled",
      entry: paid,
      credit: updated,
      account: { ...account, balance },
      charged: charge,
      penalty,
    };
  }

  private async penalize(
    s: StoreSession,
    entry: PaymentScheduleEntry,
    credit: Credit,
    account: Account,
    charge: bigint,
    penalty: bigint
  ): Promise<EntryOutcome> {
    const overdue = await s.schedules.update(entry.id, {
      status: "overdue",
      penaltyAmount: entry.penaltyAmount + penalty,
    });
    const updated =
      credit.status === "overdue" ? credit : await s.credits.update(credit.id, { status: "overdue" });

    this.logger.warn(
      {
        entryId: entry.id,
        creditId: credit.id,
        accountId: account.id,
        accountStatus: account.status,
        balance: Money.toMajor(account.balance),
        required: Money.toMajor(charge),
        penalty: Money.toMajor(penalty),
      },
      "Insufficient funds for scheduled payment, penalty applied"
    );

    return { kind: "penalized", entry: overdue, credit: updated, account, penalty };
  }

  /** The entry is already committed; a failed record or notice must not end the pass. */
  private async followUp(work: Promise<void>, entryId: string) {
    const result = await settle(work);
    if (isErr(result)) {
      this.logger.error({ error: result.error, entryId }, "Post-processing of due payment failed");
    }
  }

  private async afterSettlement(outcome: Extract<EntryOutcome, { kind: "settled" }>) {
    const { entry, credit, account, charged, penalty } = outcome;

    await this.ledger.recordTransaction({
      fromAccountId: account.id,
      toAccountId: null,
      amount: charged,
      currency: SUPPORTED_CURRENCY,
      type: "credit_payment",
      description: `Payment #${entry.paymentNumber} for credit ${credit.id}`,
    });

    this.logger.info(
      {
        entryId: entry.id,
        creditId: credit.id,
        charged: Money.toMajor(charged),
        remainingDebt: Money.toMajor(credit.remainingDebt),
        creditStatus: credit.status,
      },
      "Scheduled payment settled"
    );

    await notifySafely(this.notifier, this.logger, "payment_settled", { userId: credit.userId }, {
      creditId: credit.id,
      paymentNumber: entry.paymentNumber,
      amountPaid: Money.toMajor(charged),
      penalty: Money.toMajor(penalty),
      remainingDebt: Money.toMajor(credit.remainingDebt),
    });
  }

  private async afterPenalty(outcome: Extract<EntryOutcome, { kind: "penalized" }>) {
    const { entry, credit, penalty } = outcome;

    await notifySafely(this.notifier, this.logger, "payment_overdue", { userId: credit.userId }, {
      creditId: credit.id,
      paymentNumber: entry.paymentNumber,
      dueDate: entry.dueDate.toISOString().slice(0, 10),
      paymentAmount: Money.toMajor(entry.paymentAmount),
      penalty: Money.toMajor(penalty),
      totalPenalty: Money.toMajor(entry.penaltyAmount),
    });
  }
}
