export const TRANSACTION_STATUSES = ["PENDING", "SUCCESS", "FAILED"] as const;
export const TRANSACTION_TYPES = ["OUTBOUND", "INBOUND", "OUTGOING_FEE"] as const;

export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export type OperationType = "Transfer" | "Fee Transfer";

export interface TransactionMetadata {
  version: 1;
  operationType: OperationType;
  linkedTransactionId: string;
  linkedAccountId: string;
  counterpartAccountId?: string;
  timestamp: string;
  note?: string;
  externalReference?: string;
}

export interface Transaction {
  id: string;
  userId: string;
  accountId: string;
  amount: number; // minor units
  currency: string;
  referenceId: string;
  status: TransactionStatus;
  type: TransactionType;
  metadata: TransactionMetadata;
  createdAt: string;
  updatedAt: string;
}

export type TransactionDraft = Omit<Transaction, "id" | "createdAt" | "updatedAt">;
