import { StoreSession, UnitOfWork } from "../interfaces";
import { IsolationLevel, runAtomic } from "../../infra/postgres/atomic";
import { Executor, clientExecutor, poolExecutor } from "./sql";
import { PgAccountRepository } from "./account.repository";
import { PgTransactionRepository } from "./transaction.repository";
import { PgCreditRepository } from "./credit.repository";
import { PgPaymentScheduleRepository } from "./payment-schedule.repository";

function createSession(exec: Executor): StoreSession {
  return {
    accounts: new PgAccountRepository(exec),
    transactions: new PgTransactionRepository(exec),
    credits: new PgCreditRepository(exec),
    schedules: new PgPaymentScheduleRepository(exec),
  };
}

export class PgUnitOfWork implements UnitOfWork {
  readonly session: StoreSession = createSession(poolExecutor);

  constructor(private readonly isolationLevel: IsolationLevel = "READ COMMITTED") {}

  runAtomic<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    return runAtomic((client) => fn(createSession(clientExecutor(client))), this.isolationLevel);
  }
}
