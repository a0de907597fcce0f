import { Currency } from "./account.types";

export type TransactionType =
  | "deposit"
  | "withdraw"
  | "transfer"
  | "credit_disbursement"
  | "credit_payment";

export type TransactionStatus = "completed" | "failed";

export interface Transaction {
  id: string;
  fromAccountId: string | null;
  toAccountId: string | null;
  amount: bigint;
  currency: Currency;
  type: TransactionType;
  status: TransactionStatus;
  description: string;
  createdAt: Date;
}

export type NewTransaction = Omit<Transaction, "id" | "createdAt" | "status"> & {
  status?: TransactionStatus;
};

export interface Page {
  limit?: number;
  offset?: number;
}
