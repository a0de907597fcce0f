export type ErrorStatus = 400 | 404 | 409 | 422 | 500 | 502;

export class AppError extends Error {
  code: string;
  status: ErrorStatus;
  details?: unknown;
  cause?: unknown;

  constructor(
    message: string,
    opts?: {
      code?: string;
      status?: ErrorStatus;
      details?: unknown;
      cause?: unknown;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "AppError";
    this.code = opts?.code ?? "APP_ERROR";
    this.status = opts?.status ?? 400;
    this.details = opts?.details;
    this.cause = opts?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// -------------------------
//     Domain errors
// -------------------------

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { code: "VALIDATION_ERROR", status: 400, details });
    this.name = "ValidationError";
  }
}

export class AccountNotFoundError extends AppError {
  constructor(accountId: string) {
    super(`Account not found: ${accountId}`, {
      code: "ACCOUNT_NOT_FOUND",
      status: 404,
      details: { accountId },
    });
    this.name = "AccountNotFoundError";
  }
}

export class CreditNotFoundError extends AppError {
  constructor(creditId: string) {
    super(`Credit not found: ${creditId}`, {
      code: "CREDIT_NOT_FOUND",
      status: 404,
      details: { creditId },
    });
    this.name = "CreditNotFoundError";
  }
}

export class ScheduleEntryNotFoundError extends AppError {
  constructor(entryId: string) {
    super(`Payment schedule entry not found: ${entryId}`, {
      code: "SCHEDULE_ENTRY_NOT_FOUND",
      status: 404,
      details: { entryId },
    });
    this.name = "ScheduleEntryNotFoundError";
  }
}

export class AccountInactiveError extends AppError {
  constructor(accountId: string, status: string) {
    super(`Account ${accountId} is ${status}`, {
      code: "ACCOUNT_INACTIVE",
      status: 409,
      details: { accountId, status },
    });
    this.name = "AccountInactiveError";
  }
}

export class InsufficientFundsError extends AppError {
  public accountId: string;
  public balance: bigint;
  public required: bigint;

  constructor(accountId: string, balance: bigint, required: bigint) {
    super(
      `Insufficient funds for account ${accountId}. Balance: ${balance}, Required: ${required}`,
      {
        code: "INSUFFICIENT_FUNDS",
        status: 422,
        details: {
          accountId,
          balance: balance.toString(),
          required: required.toString(),
        },
      }
    );
    this.name = "InsufficientFundsError";
    this.accountId = accountId;
    this.balance = balance;
    this.required = required;
  }
}

export class RateProviderError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "RATE_PROVIDER_ERROR", status: 502, cause });
    this.name = "RateProviderError";
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown, details?: unknown) {
    super(message, { code: "PERSISTENCE_ERROR", status: 500, cause, details });
    this.name = "PersistenceError";
  }
}
