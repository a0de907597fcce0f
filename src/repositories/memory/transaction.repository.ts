import { v4 as uuidv4 } from "uuid";
import { TransactionRepository } from "../interfaces";
import { NewTransaction, Page, Transaction } from "../../types/transaction.types";
import { MemoryStore, WriteContext, copy } from "./memory-store";

export class MemoryTransactionRepository implements TransactionRepository {
  constructor(
    private readonly store: MemoryStore,
    private readonly ctx: WriteContext
  ) {}

  async create(input: NewTransaction): Promise<Transaction> {
    const tx: Transaction = {
      ...input,
      id: uuidv4(),
      status: input.status ?? "completed",
      createdAt: new Date(),
    };
    this.store.transactions.push(tx);
    this.ctx.record(() => {
      this.store.transactions = this.store.transactions.filter((t) => t.id !== tx.id);
    });
    return copy(tx);
  }

  async listByAccount(accountId: string, page: Required<Page>): Promise<Transaction[]> {
    return this.store.transactions
      .filter((t) => t.fromAccountId === accountId || t.toAccountId === accountId)
      .reverse()
      .slice(page.offset, page.offset + page.limit)
      .map(copy);
  }
}
