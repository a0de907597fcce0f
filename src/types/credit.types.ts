export type CreditStatus = "active" | "paid_off" | "overdue" | "cancelled";

export type PaymentStatus = "pending" | "paid" | "overdue" | "cancelled";

export interface Credit {
  id: string;
  userId: string;
  accountId: string;
  amount: bigint;
  /** annual percent, bank margin included */
  interestRate: number;
  termMonths: number;
  monthlyPayment: bigint;
  remainingDebt: bigint;
  status: CreditStatus;
  startDate: Date;
  endDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface PaymentScheduleEntry {
  id: string;
  creditId: string;
  paymentNumber: number;
  dueDate: Date;
  paymentAmount: bigint;
  principalAmount: bigint;
  interestAmount: bigint;
  /** accumulated over every missed sweep */
  penaltyAmount: bigint;
  paidAmount: bigint;
  /** principal left once this payment is made */
  remainingBalance: bigint;
  status: PaymentStatus;
  paidAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type PaymentScheduleEntryPatch = Partial<
  Pick<PaymentScheduleEntry, "status" | "penaltyAmount" | "paidAmount" | "paidAt">
>;

export type CreditPatch = Partial<Pick<Credit, "remainingDebt" | "status">>;

export interface CreateCreditInput {
  userId: string;
  accountId: string;
  /** roubles, max 2 decimals */
  amount: string | number;
  termMonths: number;
}

export interface CreditSummary {
  userId: string;
  openCredits: number;
  totalRemainingDebt: bigint;
  totalMonthlyPayments: bigint;
  overduePayments: number;
}

export interface UpcomingPayment {
  creditId: string;
  accountId: string;
  entry: PaymentScheduleEntry;
}

export interface BalancePrediction {
  accountId: string;
  currentBalance: bigint;
  scheduledPayments: bigint;
  predictedBalance: bigint;
  until: Date;
}
