import type { Account } from "../core/entities/Account";
import { none, some } from "../core/entities/Option";
import type { TransferParams } from "../core/entities/Transfer";
import type { ILogger, LogLevel } from "../core/providers/ILogger";
import type { ITimeProvider } from "../core/providers/ITimeProvider";

export const FIXED_NOW = "2026-01-15T10:00:00.000Z";

export class FixedTimeProvider implements ITimeProvider {
  constructor(private readonly instant: string = FIXED_NOW) {}

  now(): Date {
    return new Date(this.instant);
  }
}

export type LogRecord = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
};

export class RecordingLogger implements ILogger {
  readonly records: LogRecord[] = [];

  debug(message: string, data?: Record<string, unknown>): void {
    this.records.push({ level: "debug", message, data });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.records.push({ level: "info", message, data });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.records.push({ level: "warn", message, data });
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.records.push({ level: "error", message, data });
  }

  messages(level: LogLevel): string[] {
    return this.records.filter((record) => record.level === level).map((record) => record.message);
  }
}

export function buildAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: "acc-source",
    userId: "user-1",
    currency: "EUR",
    status: "ACTIVE",
    balance: 1000,
    ...overrides,
  };
}

export function sourceAccount(overrides: Partial<Account> = {}): Account {
  return buildAccount(overrides);
}

export function destinationAccount(overrides: Partial<Account> = {}): Account {
  return buildAccount({ id: "acc-destination", userId: "user-2", balance: 0, ...overrides });
}

export function buildTransferParams(
  overrides: Partial<Omit<TransferParams, "feeAmount">> & { fee?: number } = {}
): TransferParams {
  const { fee, ...rest } = overrides;
  return {
    amount: 300,
    feeAmount: fee === undefined ? none : some(fee),
    metadata: none,
    sourceAccountId: "acc-source",
    destinationAccountId: "acc-destination",
    sourceTransactionReferenceId: "ref-out",
    destinationTransactionReferenceId: "ref-in",
    feeTransactionReferenceId: "ref-fee",
    ...rest,
  };
}
