export type RawErrorCode = {
  message: string;
  /** Whether the engine should re-invoke the failed step with the same input. */
  retryable: boolean;
};

export const TRANSFER_ERROR_CODES = {
  AccountNotFound: { message: "Account not found", retryable: false },
  InactiveAccount: { message: "Account is not active", retryable: false },
  CurrencyMismatch: { message: "Accounts hold different currencies", retryable: false },
  InsufficientBalance: { message: "Insufficient balance", retryable: false },
  InvalidTransferParams: { message: "Invalid transfer parameters", retryable: false },
  TransferCancelled: { message: "Transfer was cancelled", retryable: false },
  PersistenceFailure: { message: "Persistence call failed", retryable: true },
  PartialCompletion: { message: "Transfer partially completed", retryable: true },
} as const satisfies Record<string, RawErrorCode>;

export type TransferErrorCode = keyof typeof TRANSFER_ERROR_CODES;

