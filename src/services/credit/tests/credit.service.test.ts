import { CreditService, CreditServiceOptions } from "../credit.service";
import { LedgerService } from "../../ledger/ledger.service";
import { FixedRateProvider, RateProvider } from "../../rate/rate-provider";
import { NotificationDispatcher } from "../../notification/notification.types";
import { MemoryUnitOfWork } from "../../../repositories/memory/unit-of-work";
import {
  AccountInactiveError,
  AccountNotFoundError,
  CreditNotFoundError,
  ValidationError,
} from "../../../utils/error";
import { Money } from "../../../utils/money.util";
import {
  RecordingNotifier,
  USER_ID,
  seedAccount,
  seedCredit,
  seedEntry,
  silentLogger,
} from "../../../tests/fixtures";

const ACCOUNT = "00000000-0000-4000-8000-0000000000a1";
const OTHER_USER = "22222222-2222-4222-8222-222222222222";
const NOW = new Date("2024-03-10T09:00:00.000Z");

type SetupOptions = {
  rates?: RateProvider;
  notifier?: NotificationDispatcher;
  now?: Date;
  options?: Partial<CreditServiceOptions>;
};

function setup(opts: SetupOptions = {}) {
  const uow = new MemoryUnitOfWork();
  const ledger = new LedgerService(uow, silentLogger, {
    maxOperationAmount: Money.toMinor("1000000000"),
  });
  const notifier = new RecordingNotifier();
  const now = opts.now ?? NOW;
  const credits = new CreditService(
    uow,
    ledger,
    opts.rates ?? new FixedRateProvider(16),
    opts.notifier ?? notifier,
    silentLogger,
    {
      maxAmount: Money.toMinor("100000000"),
      maxTermMonths: 360,
      bankMargin: 5,
      fallbackBaseRate: 16,
      rateTimeoutMs: 50,
      now: () => now,
      ...opts.options,
    }
  );
  return { uow, ledger, credits, notifier };
}

describe("CreditService.createCredit", () => {
  test("issues a credit, its schedule and the disbursement", async () => {
    const { uow, credits, notifier } = setup();
    seedAccount(uow, { id: ACCOUNT });

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: "10000",
      termMonths: 12,
    });

    expect(credit).toMatchObject({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: 1000000n,
      interestRate: 21,
      termMonths: 12,
      monthlyPayment: 93114n,
      remainingDebt: 1000000n,
      status: "active",
      startDate: NOW,
      endDate: new Date("2025-03-10T09:00:00.000Z"),
    });

    const schedule = await credits.getSchedule(credit.id);
    expect(schedule).toHaveLength(12);
    expect(schedule.map((e) => e.paymentNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(schedule[0]).toMatchObject({
      dueDate: new Date("2024-04-10T09:00:00.000Z"),
      paymentAmount: 93114n,
      interestAmount: 17500n,
      principalAmount: 75614n,
      remainingBalance: 924386n,
      penaltyAmount: 0n,
      paidAmount: 0n,
      status: "pending",
      paidAt: null,
    });
    expect(schedule[11].remainingBalance).toBe(0n);
    expect(schedule.reduce((sum, e) => sum + e.principalAmount, 0n)).toBe(1000000n);

    expect(uow.store.accounts.get(ACCOUNT)?.balance).toBe(1000000n);
    expect(uow.store.transactions).toHaveLength(1);
    expect(uow.store.transactions[0]).toMatchObject({
      toAccountId: ACCOUNT,
      amount: 1000000n,
      type: "credit_disbursement",
      description: `Credit disbursement ${credit.id}`,
    });

    expect(notifier.sent).toEqual([
      [
        "credit_issued",
        { userId: USER_ID },
        {
          creditId: credit.id,
          amount: "10000.00",
          interestRate: 21,
          termMonths: 12,
          monthlyPayment: "931.14",
          firstDueDate: "2024-04-10",
        },
      ],
    ]);
  });

  test("adds the bank margin to the provider rate", async () => {
    const { uow, credits } = setup({ rates: new FixedRateProvider(7.5) });
    seedAccount(uow, { id: ACCOUNT });

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: 1200,
      termMonths: 12,
    });

    expect(credit.interestRate).toBe(12.5);
  });

  test("falls back to the configured base rate when the provider fails", async () => {
    const rates: RateProvider = { getAnnualRate: () => Promise.reject(new Error("offline")) };
    const { uow, credits } = setup({ rates, options: { fallbackBaseRate: 16 } });
    seedAccount(uow, { id: ACCOUNT });

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: "10000",
      termMonths: 12,
    });

    expect(credit.interestRate).toBe(21);
    expect(credit.monthlyPayment).toBe(93114n);
  });

  test("falls back when the provider does not answer in time", async () => {
    const rates: RateProvider = { getAnnualRate: () => new Promise<number>(() => undefined) };
    const { uow, credits } = setup({ rates, options: { rateTimeoutMs: 10, fallbackBaseRate: 10 } });
    seedAccount(uow, { id: ACCOUNT });

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: "500",
      termMonths: 6,
    });

    expect(credit.interestRate).toBe(15);
  });

  test("falls back when the provider returns a negative rate", async () => {
    const { uow, credits } = setup({ rates: new FixedRateProvider(-1) });
    seedAccount(uow, { id: ACCOUNT });

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: "500",
      termMonths: 6,
    });

    expect(credit.interestRate).toBe(21);
  });

  test.each([
    ["zero amount", "0", 12],
    ["negative amount", "-100", 12],
    ["three decimals", "100.001", 12],
    ["amount over the limit", "100000000.01", 12],
    ["zero term", "1000", 0],
    ["fractional term", "1000", 1.5],
    ["term over the limit", "1000", 361],
  ])("rejects %s and persists nothing", async (_name, amount, termMonths) => {
    const { uow, credits, notifier } = setup();
    seedAccount(uow, { id: ACCOUNT });

    await expect(
      credits.createCredit({ userId: USER_ID, accountId: ACCOUNT, amount, termMonths })
    ).rejects.toBeInstanceOf(ValidationError);

    expect(uow.store.credits.size).toBe(0);
    expect(uow.store.schedules.size).toBe(0);
    expect(uow.store.transactions).toHaveLength(0);
    expect(uow.store.accounts.get(ACCOUNT)?.balance).toBe(0n);
    expect(notifier.sent).toHaveLength(0);
  });

  test("requires an existing active account", async () => {
    const { uow, credits } = setup();
    seedAccount(uow, { id: ACCOUNT, status: "blocked" });
    const input = { userId: USER_ID, amount: "1000", termMonths: 12 };

    await expect(
      credits.createCredit({ ...input, accountId: "00000000-0000-4000-8000-000000000404" })
    ).rejects.toBeInstanceOf(AccountNotFoundError);
    await expect(credits.createCredit({ ...input, accountId: ACCOUNT })).rejects.toBeInstanceOf(
      AccountInactiveError
    );
    expect(uow.store.credits.size).toBe(0);
  });

  test("keeps the credit when the schedule cannot be stored", async () => {
    const { uow, credits } = setup();
    seedAccount(uow, { id: ACCOUNT });
    jest
      .spyOn(uow.session.schedules, "createBatch")
      .mockRejectedValueOnce(new Error("connection reset"));

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: "1000",
      termMonths: 12,
    });

    expect(uow.store.credits.has(credit.id)).toBe(true);
    expect(uow.store.schedules.size).toBe(0);
    expect(uow.store.accounts.get(ACCOUNT)?.balance).toBe(100000n);
  });

  test("ignores a failing notification", async () => {
    const notifier: NotificationDispatcher = {
      send: () => Promise.reject(new Error("smtp down")),
    };
    const { uow, credits } = setup({ notifier });
    seedAccount(uow, { id: ACCOUNT });

    const credit = await credits.createCredit({
      userId: USER_ID,
      accountId: ACCOUNT,
      amount: "1000",
      termMonths: 12,
    });

    expect(credit.status).toBe("active");
    expect(uow.store.accounts.get(ACCOUNT)?.balance).toBe(100000n);
  });
});

describe("CreditService queries", () => {
  test("getCredit and getSchedule fail for an unknown credit", async () => {
    const { credits } = setup();
    const id = "00000000-0000-4000-8000-0000000000c9";

    await expect(credits.getCredit(id)).rejects.toBeInstanceOf(CreditNotFoundError);
    await expect(credits.getSchedule(id)).rejects.toBeInstanceOf(CreditNotFoundError);
  });

  test("summarises open credits of one user", async () => {
    const { uow, credits } = setup();
    seedAccount(uow, { id: ACCOUNT });
    seedCredit(uow, { id: "c1", accountId: ACCOUNT, remainingDebt: 92000n });
    seedCredit(uow, {
      id: "c2",
      accountId: ACCOUNT,
      status: "overdue",
      remainingDebt: 50000n,
      monthlyPayment: 6000n,
    });
    seedCredit(uow, { id: "c3", accountId: ACCOUNT, status: "paid_off", remainingDebt: 0n });
    seedCredit(uow, { id: "c4", accountId: ACCOUNT, userId: OTHER_USER });
    seedEntry(uow, { id: "e1", creditId: "c2", status: "overdue" });
    seedEntry(uow, { id: "e2", creditId: "c2", paymentNumber: 2 });

    await expect(credits.getCreditSummary(USER_ID)).resolves.toEqual({
      userId: USER_ID,
      openCredits: 2,
      totalRemainingDebt: 142000n,
      totalMonthlyPayments: 16000n,
      overduePayments: 1,
    });
  });

  test("lists the pending payments of the user's active credits inside the window", async () => {
    const { uow, credits } = setup({ now: new Date("2024-02-10T00:00:00.000Z") });
    seedAccount(uow, { id: ACCOUNT });
    seedCredit(uow, { id: "c1", accountId: ACCOUNT });
    seedCredit(uow, { id: "c2", accountId: ACCOUNT, userId: OTHER_USER });
    seedEntry(uow, { id: "e1", creditId: "c1" });
    seedEntry(uow, {
      id: "e2",
      creditId: "c1",
      paymentNumber: 2,
      dueDate: new Date("2024-03-15T00:00:00.000Z"),
    });
    seedEntry(uow, { id: "e3", creditId: "c2" });
    const listUpcoming = jest.spyOn(uow.session.schedules, "listUpcoming");

    const upcoming = await credits.getUpcomingPayments(USER_ID, 10);

    expect(listUpcoming).toHaveBeenCalledWith(
      ["c1"],
      new Date("2024-02-10T00:00:00.000Z"),
      new Date("2024-02-20T00:00:00.000Z")
    );

    expect(upcoming).toHaveLength(1);
    expect(upcoming[0].creditId).toBe("c1");
    expect(upcoming[0].accountId).toBe(ACCOUNT);
    expect(upcoming[0].entry.id).toBe("e1");
  });

  test("predicts the balance after scheduled payments", async () => {
    const { uow, credits } = setup({ now: new Date("2024-02-10T00:00:00.000Z") });
    seedAccount(uow, { id: ACCOUNT, balance: 5000n });
    seedCredit(uow, { id: "c1", accountId: ACCOUNT });
    seedEntry(uow, { id: "e1", creditId: "c1" });
    seedEntry(uow, {
      id: "e2",
      creditId: "c1",
      paymentNumber: 2,
      dueDate: new Date("2024-03-15T00:00:00.000Z"),
    });

    const other = "00000000-0000-4000-8000-0000000000a2";
    seedAccount(uow, { id: other });
    seedCredit(uow, { id: "c2", accountId: other });
    seedEntry(uow, { id: "e3", creditId: "c2" });

    const prediction = await credits.predictBalance(ACCOUNT, 30);

    expect(prediction).toEqual({
      accountId: ACCOUNT,
      currentBalance: 5000n,
      scheduledPayments: 10000n,
      predictedBalance: -5000n,
      until: new Date("2024-03-11T00:00:00.000Z"),
    });
  });

  test.each([[0], [-1], [2.5], [3651]])("rejects a lookahead of %p days", async (days) => {
    const { uow, credits } = setup();
    seedAccount(uow, { id: ACCOUNT });

    await expect(credits.getUpcomingPayments(USER_ID, days)).rejects.toBeInstanceOf(ValidationError);
    await expect(credits.predictBalance(ACCOUNT, days)).rejects.toBeInstanceOf(ValidationError);
  });
});
