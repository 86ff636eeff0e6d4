export const ACCOUNT_STATUSES = ["ACTIVE", "INACTIVE", "BLOCKED"] as const;

export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];

export interface Account {
  id: string;
  userId: string;
  currency: string;
  status: AccountStatus;
  balance: number; // minor units
}

export type BalanceOperation = "INCREASE" | "DECREASE";

export interface BalanceUpdate {
  accountId: string;
  amount: number;
  operation: BalanceOperation;
  /** Reference ID of the ledger entry this balance change belongs to. */
  referenceId: string;
}

export type BalanceUpdateOutcome = "APPLIED" | "ALREADY_APPLIED";
