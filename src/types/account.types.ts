export const SUPPORTED_CURRENCY = "RUB";
export type Currency = typeof SUPPORTED_CURRENCY;

export type AccountStatus = "active" | "blocked" | "closed";

export const ACCOUNT_STATUSES: readonly AccountStatus[] = ["active", "blocked", "closed"];

export interface Account {
  id: string;
  userId: string;
  /** 20-digit account number */
  number: string;
  /** kopecks, never negative */
  balance: bigint;
  currency: Currency;
  status: AccountStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface User {
  id: string;
  email: string;
}
