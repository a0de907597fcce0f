import { LedgerService } from "../ledger.service";
import { MemoryUnitOfWork } from "../../../repositories/memory/unit-of-work";
import {
  AccountInactiveError,
  AccountNotFoundError,
  InsufficientFundsError,
  ValidationError,
} from "../../../utils/error";
import { Money } from "../../../utils/money.util";
import { USER_ID, seedAccount, silentLogger } from "../../../tests/fixtures";

const A = "00000000-0000-4000-8000-00000000000a";
const B = "00000000-0000-4000-8000-00000000000b";
const C = "00000000-0000-4000-8000-00000000000c";
const D = "00000000-0000-4000-8000-00000000000d";

function setup() {
  const uow = new MemoryUnitOfWork();
  const ledger = new LedgerService(uow, silentLogger, {
    maxOperationAmount: Money.toMinor("1000000000"),
  });
  return { uow, ledger };
}

const balanceOf = (uow: MemoryUnitOfWork, id: string) => uow.store.accounts.get(id)?.balance;

describe("LedgerService.deposit", () => {
  test("credits the account and records a transaction", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 1000n });

    const account = await ledger.deposit(A, "25.50");

    expect(account.balance).toBe(3550n);
    expect(balanceOf(uow, A)).toBe(3550n);
    expect(uow.store.transactions).toHaveLength(1);
    expect(uow.store.transactions[0]).toMatchObject({
      fromAccountId: null,
      toAccountId: A,
      amount: 2550n,
      currency: "RUB",
      type: "deposit",
      status: "completed",
    });
  });

  test.each([["0"], ["-1"], ["1.001"], ["1000000000.01"], ["ten"]])(
    "rejects amount %s",
    async (amount) => {
      const { uow, ledger } = setup();
      seedAccount(uow, { id: A });

      await expect(ledger.deposit(A, amount)).rejects.toBeInstanceOf(ValidationError);
      expect(balanceOf(uow, A)).toBe(0n);
      expect(uow.store.transactions).toHaveLength(0);
    }
  );

  test("accepts the ceiling itself", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A });
    await ledger.deposit(A, "1000000000");
    expect(balanceOf(uow, A)).toBe(100000000000n);
  });

  test("fails for a missing or inactive account", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: B, status: "blocked" });

    await expect(ledger.deposit(A, 10)).rejects.toBeInstanceOf(AccountNotFoundError);
    await expect(ledger.deposit(B, 10)).rejects.toBeInstanceOf(AccountInactiveError);
    expect(balanceOf(uow, B)).toBe(0n);
  });

  test("keeps the balance change when the transaction record fails", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A });
    jest.spyOn(uow.session.transactions, "create").mockRejectedValueOnce(new Error("disk full"));

    const account = await ledger.deposit(A, 10);

    expect(account.balance).toBe(1000n);
    expect(balanceOf(uow, A)).toBe(1000n);
    expect(uow.store.transactions).toHaveLength(0);
  });
});

describe("LedgerService.withdraw", () => {
  test("debits the account", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });

    await ledger.withdraw(A, "40");

    expect(balanceOf(uow, A)).toBe(6000n);
    expect(uow.store.transactions[0]).toMatchObject({
      fromAccountId: A,
      toAccountId: null,
      amount: 4000n,
      type: "withdraw",
    });
  });

  test("fails with insufficient funds and changes nothing", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });

    const error = await ledger.withdraw(A, "100.01").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InsufficientFundsError);
    expect(error).toMatchObject({ code: "INSUFFICIENT_FUNDS", status: 422, required: 10001n });
    expect(balanceOf(uow, A)).toBe(10000n);
    expect(uow.store.transactions).toHaveLength(0);
  });

  test("concurrent withdrawals never overdraw", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });

    const results = await Promise.allSettled([
      ledger.withdraw(A, 40),
      ledger.withdraw(A, 40),
      ledger.withdraw(A, 40),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(2);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InsufficientFundsError);
    expect(balanceOf(uow, A)).toBe(2000n);
  });
});

describe("LedgerService.transfer", () => {
  test("moves money and conserves the total", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });
    seedAccount(uow, { id: B, balance: 500n });

    const result = await ledger.transfer(A, B, "30.25");

    expect(result.from.balance).toBe(6975n);
    expect(result.to.balance).toBe(3525n);
    expect(balanceOf(uow, A)).toBe(6975n);
    expect(balanceOf(uow, B)).toBe(3525n);
    expect(uow.store.transactions[0]).toMatchObject({
      fromAccountId: A,
      toAccountId: B,
      amount: 3025n,
      type: "transfer",
    });
  });

  test("rejects a transfer to the same account", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });

    await expect(ledger.transfer(A, A, 10)).rejects.toBeInstanceOf(ValidationError);
    expect(balanceOf(uow, A)).toBe(10000n);
  });

  test("rejects when the receiver is closed", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });
    seedAccount(uow, { id: B, status: "closed" });

    await expect(ledger.transfer(A, B, 10)).rejects.toBeInstanceOf(AccountInactiveError);
    expect(balanceOf(uow, A)).toBe(10000n);
  });

  test("rejects when the sender is short and leaves both balances", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 500n });
    seedAccount(uow, { id: B, balance: 0n });

    await expect(ledger.transfer(A, B, 10)).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(balanceOf(uow, A)).toBe(500n);
    expect(balanceOf(uow, B)).toBe(0n);
  });

  test("concurrent transfers on disjoint pairs both succeed", async () => {
    const { uow, ledger } = setup();
    for (const id of [A, B, C, D]) seedAccount(uow, { id, balance: 10000n });

    const [ab, cd] = await Promise.all([ledger.transfer(A, B, 10), ledger.transfer(C, D, 20)]);

    expect([ab.from.balance, ab.to.balance, cd.from.balance, cd.to.balance]).toEqual([
      9000n,
      11000n,
      8000n,
      12000n,
    ]);
    expect([A, B, C, D].map((id) => balanceOf(uow, id))).toEqual([9000n, 11000n, 8000n, 12000n]);
    expect(uow.store.transactions).toHaveLength(2);
    expect(uow.activeLocks).toBe(0);
  });

  test("opposite concurrent transfers settle to a serial result", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 10000n });
    seedAccount(uow, { id: B, balance: 10000n });

    const work: Promise<unknown>[] = [];
    for (let i = 0; i < 10; i++) {
      work.push(ledger.transfer(A, B, 10));
      work.push(ledger.transfer(B, A, 5));
    }
    await Promise.all(work);

    expect(balanceOf(uow, A)).toBe(5000n);
    expect(balanceOf(uow, B)).toBe(15000n);
    expect(uow.store.transactions).toHaveLength(20);
    expect(uow.activeLocks).toBe(0);
  });
});

describe("LedgerService accounts", () => {
  test("opens a RUB account with a 20-digit number", async () => {
    const { ledger } = setup();
    const account = await ledger.openAccount(USER_ID);

    expect(account.number).toMatch(/^40817810\d{12}$/);
    expect(account).toMatchObject({ userId: USER_ID, balance: 0n, currency: "RUB", status: "active" });
    await expect(ledger.getAccount(account.id)).resolves.toEqual(account);
  });

  test("rejects other currencies", async () => {
    const { ledger } = setup();
    await expect(ledger.openAccount(USER_ID, "USD")).rejects.toBeInstanceOf(ValidationError);
  });

  test("retries when an account number is taken", async () => {
    const uow = new MemoryUnitOfWork();
    seedAccount(uow, { id: A, number: "40817810000000000001" });
    const numbers = ["40817810000000000001", "40817810000000000002"];
    const ledger = new LedgerService(uow, silentLogger, {
      maxOperationAmount: 100n,
      generateAccountNumber: () => numbers.shift() ?? "40817810999999999999",
    });

    const account = await ledger.openAccount(USER_ID);
    expect(account.number).toBe("40817810000000000002");
  });

  test("blocks an account and rejects money movement on it", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A, balance: 1000n });

    const blocked = await ledger.setAccountStatus(A, "blocked");

    expect(blocked.status).toBe("blocked");
    await expect(ledger.withdraw(A, 1)).rejects.toBeInstanceOf(AccountInactiveError);
    await expect(ledger.setAccountStatus(B, "active")).rejects.toBeInstanceOf(AccountNotFoundError);
  });

  test("lists transactions newest first", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A });
    await ledger.deposit(A, 1);
    await ledger.deposit(A, 2);
    await ledger.deposit(A, 3);

    const page = await ledger.listTransactions(A, { limit: 2 });
    expect(page.map((t) => t.amount)).toEqual([300n, 200n]);

    const next = await ledger.listTransactions(A, { limit: 2, offset: 2 });
    expect(next.map((t) => t.amount)).toEqual([100n]);
  });

  test("records a disbursement as its own transaction type", async () => {
    const { uow, ledger } = setup();
    seedAccount(uow, { id: A });

    await ledger.disburse(A, 500000n, "Credit disbursement c-1");

    expect(balanceOf(uow, A)).toBe(500000n);
    expect(uow.store.transactions[0]).toMatchObject({
      type: "credit_disbursement",
      description: "Credit disbursement c-1",
    });
  });
});
