import { ACCOUNT_STATUSES, type Account, type AccountStatus } from "../../core/entities/Account";
import {
  type OperationType,
  TRANSACTION_STATUSES,
  TRANSACTION_TYPES,
  type Transaction,
  type TransactionMetadata,
  type TransactionStatus,
  type TransactionType,
} from "../../core/entities/Transaction";
import { type ParseResult, parseFailure, parsed } from "../events/parsers/parseResult";

export const accountKey = (id: string) => ({ PK: `ACCOUNT#${id}`, SK: "PROFILE" });
export const transactionKey = (id: string) => ({ PK: `TX#${id}`, SK: "META" });
export const referenceKey = (referenceId: string) => ({ PK: `REF#${referenceId}`, SK: "META" });
export const balanceMarkerKey = (referenceId: string) => ({ PK: `BALANCE#${referenceId}`, SK: "META" });

type Item = Record<string, unknown>;

class ItemError extends Error {}

function readString(item: Item, key: string): string {
  const value = item[key];
  if (typeof value !== "string" || value === "") {
    throw new ItemError(`${key} must be a non-empty string`);
  }
  return value;
}

function readOptionalString(item: Item, key: string): string | undefined {
  const value = item[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ItemError(`${key} must be a string`);
  }
  return value;
}

function readInteger(item: Item, key: string): number {
  const value = item[key];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new ItemError(`${key} must be an integer`);
  }
  return value;
}

function readOneOf<T extends string>(item: Item, key: string, allowed: readonly T[]): T {
  const value = readString(item, key);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ItemError(`${key} has unknown value ${value}`);
  }
  return match;
}

function isItem(value: unknown): value is Item {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseItem<T>(item: unknown, read: (item: Item) => T): ParseResult<T> {
  if (!isItem(item)) {
    return parseFailure("item must be an object");
  }
  try {
    return parsed(read(item));
  } catch (error) {
    if (error instanceof ItemError) {
      return parseFailure(error.message);
    }
    throw error;
  }
}

export function parseAccountItem(item: unknown): ParseResult<Account> {
  return parseItem(item, (data) => ({
    id: readString(data, "id"),
    userId: readString(data, "userId"),
    currency: readString(data, "currency"),
    status: readOneOf<AccountStatus>(data, "status", ACCOUNT_STATUSES),
    balance: readInteger(data, "balance"),
  }));
}

const OPERATION_TYPES: readonly OperationType[] = ["Transfer", "Fee Transfer"];

function readMetadata(data: Item): TransactionMetadata {
  const raw = data.metadata;
  if (!isItem(raw)) {
    throw new ItemError("metadata must be a map");
  }
  if (raw.version !== 1) {
    throw new ItemError(`metadata.version ${String(raw.version)} is not supported`);
  }

  const metadata: TransactionMetadata = {
    version: 1,
    operationType: readOneOf(raw, "operationType", OPERATION_TYPES),
    linkedTransactionId: readString(raw, "linkedTransactionId"),
    linkedAccountId: readString(raw, "linkedAccountId"),
    timestamp: readString(raw, "timestamp"),
  };

  const counterpartAccountId = readOptionalString(raw, "counterpartAccountId");
  if (counterpartAccountId !== undefined) metadata.counterpartAccountId = counterpartAccountId;
  const note = readOptionalString(raw, "note");
  if (note !== undefined) metadata.note = note;
  const externalReference = readOptionalString(raw, "externalReference");
  if (externalReference !== undefined) metadata.externalReference = externalReference;

  return metadata;
}

export function parseTransactionItem(item: unknown): ParseResult<Transaction> {
  return parseItem(item, (data) => ({
    id: readString(data, "id"),
    userId: readString(data, "userId"),
    accountId: readString(data, "accountId"),
    amount: readInteger(data, "amount"),
    currency: readString(data, "currency"),
    referenceId: readString(data, "referenceId"),
    status: readOneOf<TransactionStatus>(data, "status", TRANSACTION_STATUSES),
    type: readOneOf<TransactionType>(data, "type", TRANSACTION_TYPES),
    metadata: readMetadata(data),
    createdAt: readString(data, "createdAt"),
    updatedAt: readString(data, "updatedAt"),
  }));
}

/** Item attributes of a transaction, without its table keys. */
export function toTransactionAttributes(transaction: Transaction): Item {
  return {
    id: transaction.id,
    userId: transaction.userId,
    accountId: transaction.accountId,
    amount: transaction.amount,
    currency: transaction.currency,
    referenceId: transaction.referenceId,
    status: transaction.status,
    type: transaction.type,
    metadata: { ...transaction.metadata },
    createdAt: transaction.createdAt,
    updatedAt: transaction.updatedAt,
  };
}
