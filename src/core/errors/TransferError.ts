import { TRANSFER_ERROR_CODES, type TransferErrorCode } from "./codes";

export interface TransferErrorOptions {
  message?: string;
  cause?: unknown;
  retryable?: boolean;
  details?: Record<string, unknown>;
}

/**
 * The single error type the transfer core throws.
 *
 * `name` equals `code`, so an engine matching on error names (Step Functions
 * `ErrorEquals`) sees the business code. `retryable` tells the engine whether
 * re-invoking the failed step with identical input can succeed.
 */
export class TransferError extends Error {
  readonly code: TransferErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: TransferErrorCode, options: TransferErrorOptions = {}) {
    const defaults = TRANSFER_ERROR_CODES[code];
    super(options.message ?? defaults.message, { cause: options.cause });
    this.code = code;
    this.name = code;
    this.retryable = options.retryable ?? defaults.retryable;
    this.details = options.details;
  }

  static accountNotFound(accountId: string): TransferError {
    return new TransferError("AccountNotFound", {
      message: `account not found: ${accountId}`,
      details: { accountId },
    });
  }

  static inactiveAccount(accountId: string, status: string): TransferError {
    return new TransferError("InactiveAccount", {
      message: `account is not active: ${accountId} (status ${status})`,
      details: { accountId, status },
    });
  }

  static currencyMismatch(
    sourceAccountId: string,
    sourceCurrency: string,
    destinationAccountId: string,
    destinationCurrency: string
  ): TransferError {
    return new TransferError("CurrencyMismatch", {
      message: `currency mismatch: ${sourceAccountId} holds ${sourceCurrency}, ${destinationAccountId} holds ${destinationCurrency}`,
      details: { sourceAccountId, sourceCurrency, destinationAccountId, destinationCurrency },
    });
  }

  static insufficientBalance(accountId: string, required: number, balance: number): TransferError {
    return new TransferError("InsufficientBalance", {
      message: `insufficient balance on ${accountId}: transfer amount ${required}, account balance ${balance}`,
      details: { accountId, required, balance },
    });
  }

  static invalidParams(reason: string): TransferError {
    return new TransferError("InvalidTransferParams", {
      message: `invalid transfer parameters: ${reason}`,
      details: { reason },
    });
  }

  static cancelled(stage: string, cause?: unknown): TransferError {
    return new TransferError("TransferCancelled", {
      message: `transfer cancelled before ${stage}`,
      cause,
      details: { stage },
    });
  }

  static persistenceFailure(
    operation: string,
    cause: unknown,
    options: { retryable: boolean; details?: Record<string, unknown> }
  ): TransferError {
    return new TransferError("PersistenceFailure", {
      message: `${operation} failed: ${describeCause(cause)}`,
      cause,
      retryable: options.retryable,
      details: { operation, ...options.details },
    });
  }

  static partialCompletion(
    operation: string,
    cause: unknown,
    details: Record<string, unknown>
  ): TransferError {
    return new TransferError("PartialCompletion", {
      message: `${operation} failed after balances moved: ${describeCause(cause)}`,
      cause,
      details: { operation, ...details },
    });
  }
}

export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}

/** Anything that is not already classified is treated as a transient infrastructure fault. */
export function toTransferError(error: unknown, operation = "transfer"): TransferError {
  if (isTransferError(error)) return error;
  return TransferError.persistenceFailure(operation, error, { retryable: true });
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
