import type { Account } from "./Account";
import { type Option, getOrElse } from "./Option";
import type { Transaction } from "./Transaction";

export interface TransferMetadata {
  note?: string;
  externalReference?: string;
}

export interface TransferParams {
  amount: number; // minor units
  feeAmount: Option<number>;
  metadata: Option<TransferMetadata>;
  sourceAccountId: string;
  destinationAccountId: string;
  sourceTransactionReferenceId: string;
  destinationTransactionReferenceId: string;
  feeTransactionReferenceId: string;
}

export interface TransferResult {
  sourceTransactionReferenceId: string;
  destinationTransactionReferenceId: string;
  feeTransactionReferenceId: string;
  sourceTransaction: Transaction;
  destinationTransaction: Transaction;
  feeTransaction: Option<Transaction>;
}

export interface ValidAccounts {
  source: Account;
  destination: Account;
}

export interface PendingTransactions {
  outbound: Transaction;
  inbound: Transaction;
  fee: Option<Transaction>;
}

export type FinalizedTransactions = PendingTransactions;

/** Amount taken from the source account: the transfer plus its fee, if any. */
export function totalDebit(params: Pick<TransferParams, "amount" | "feeAmount">): number {
  return params.amount + getOrElse(params.feeAmount, 0);
}
