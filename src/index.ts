export { bootstrap, createEngine, type Engine, type EngineDeps } from "./bootstrap";

export * from "./utils/error";
export { Money } from "./utils/money.util";
export { getLockOrder } from "./utils/lock-ordering";

export * from "./types/account.types";
export * from "./types/credit.types";
export * from "./types/transaction.types";

export * from "./repositories/interfaces";
export { MemoryUnitOfWork } from "./repositories/memory/unit-of-work";
export { MemoryStore } from "./repositories/memory/memory-store";
export { MemoryUserDirectory } from "./repositories/memory/user.directory";
export { PgUnitOfWork } from "./repositories/pg/unit-of-work";
export { PgUserDirectory } from "./repositories/pg/user.directory";

export {
  buildPaymentSchedule,
  computeMonthlyPayment,
  splitPayment,
  totalCost,
  totalInterest,
  type ScheduledPayment,
} from "./services/credit/amortization";
export { LedgerService, type LedgerServiceOptions, type TransferResult } from "./services/ledger/ledger.service";
export { CreditService, type CreditServiceOptions } from "./services/credit/credit.service";
export {
  OverduePaymentProcessor,
  type OverduePaymentProcessorOptions,
  type ProcessorState,
  type SweepSummary,
} from "./services/credit/overdue-payment.processor";
export { CronTicker, IntervalTicker, ManualTicker, type Ticker } from "./services/worker/ticker";
export {
  FixedRateProvider,
  HttpRateProvider,
  type RateProvider,
} from "./services/rate/rate-provider";
export * from "./services/notification/notification.types";
export { EmailNotificationDispatcher } from "./services/notification/email-notification.dispatcher";
export { NoopNotificationDispatcher } from "./services/notification/noop-notification.dispatcher";
