import type { Logger } from "pino";
import { ENV, type Env } from "./config/env";
import { createLogger, logger } from "./infra/logger-instance";
import { checkConnection, initPool } from "./infra/postgres/connection";
import { runMigrations } from "./infra/postgres/migrate";
import { createEmailProvider } from "./infra/email/provider";
import { UnitOfWork, UserDirectory } from "./repositories/interfaces";
import { PgUnitOfWork } from "./repositories/pg/unit-of-work";
import { PgUserDirectory } from "./repositories/pg/user.directory";
import { poolExecutor } from "./repositories/pg/sql";
import { LedgerService } from "./services/ledger/ledger.service";
import { CreditService } from "./services/credit/credit.service";
import { OverduePaymentProcessor } from "./services/credit/overdue-payment.processor";
import { FixedRateProvider, HttpRateProvider, RateProvider } from "./services/rate/rate-provider";
import { EmailService } from "./services/email.service";
import { NotificationDispatcher } from "./services/notification/notification.types";
import { EmailNotificationDispatcher } from "./services/notification/email-notification.dispatcher";
import { CronTicker, IntervalTicker, Ticker } from "./services/worker/ticker";
import { Money } from "./utils/money.util";

export type Engine = {
  uow: UnitOfWork;
  ledger: LedgerService;
  credits: CreditService;
  processor: OverduePaymentProcessor;
};

export type EngineDeps = {
  uow: UnitOfWork;
  users: UserDirectory;
  env?: Env;
  rates?: RateProvider;
  notifier?: NotificationDispatcher;
  ticker?: Ticker;
  now?: () => Date;
  logger?: Logger;
};

export function createRateProvider(env: Env): RateProvider {
  if (!env.RATE_PROVIDER_URL) {
    return new FixedRateProvider(env.CREDIT_FALLBACK_BASE_RATE);
  }
  return new HttpRateProvider({ url: env.RATE_PROVIDER_URL, timeoutMs: env.RATE_PROVIDER_TIMEOUT_MS });
}

export function createTicker(env: Env): Ticker {
  return env.SCHEDULER_CRON
    ? new CronTicker(env.SCHEDULER_CRON, env.SCHEDULER_TZ)
    : new IntervalTicker(env.SCHEDULER_INTERVAL_MS);
}

/** Wires the services over whichever store the caller hands in. */
export function createEngine(deps: EngineDeps): Engine {
  const env = deps.env ?? ENV;
  const baseLogger = deps.logger ?? logger;

  const notifier =
    deps.notifier ??
    new EmailNotificationDispatcher(
      deps.users,
      new EmailService(
        createEmailProvider(env.MAIL_PROVIDER, {
          apiKey: env.SENDGRID_API_KEY,
          fromEmail: env.MAIL_FROM_EMAIL,
          fromName: env.APP_BRAND_NAME,
        }),
        env.APP_BRAND_NAME
      ),
      baseLogger.child({ component: "notifications" })
    );

  const ledger = new LedgerService(deps.uow, baseLogger.child({ component: "ledger" }), {
    maxOperationAmount: Money.toMinor(env.LEDGER_MAX_OPERATION_AMOUNT),
  });

  const credits = new CreditService(
    deps.uow,
    ledger,
    deps.rates ?? createRateProvider(env),
    notifier,
    baseLogger.child({ component: "credits" }),
    {
      maxAmount: Money.toMinor(env.CREDIT_MAX_AMOUNT),
      maxTermMonths: env.CREDIT_MAX_TERM_MONTHS,
      bankMargin: env.CREDIT_BANK_MARGIN,
      fallbackBaseRate: env.CREDIT_FALLBACK_BASE_RATE,
      rateTimeoutMs: env.RATE_PROVIDER_TIMEOUT_MS,
      now: deps.now,
    }
  );

  const processor = new OverduePaymentProcessor(
    deps.uow,
    ledger,
    notifier,
    deps.ticker ?? createTicker(env),
    baseLogger.child({ component: "overdue-processor" }),
    {
      penaltyRate: env.SCHEDULER_PENALTY_RATE,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
      now: deps.now,
    }
  );

  return { uow: deps.uow, ledger, credits, processor };
}

/** Connects to PostgreSQL, applies migrations and returns an engine backed by it. */
export async function bootstrap(env: Env = ENV): Promise<Engine> {
  const log = createLogger(env.SERVICE_NAME);

  initPool({
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_SIZE,
    statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
    lockTimeoutMs: env.DB_LOCK_TIMEOUT_MS,
  });
  await checkConnection();

  if (env.DB_AUTO_MIGRATE) {
    await runMigrations();
  }

  const engine = createEngine({
    uow: new PgUnitOfWork(),
    users: new PgUserDirectory(poolExecutor),
    env,
    logger: log,
  });

  log.info("Bootstrap initialized");
  return engine;
}
