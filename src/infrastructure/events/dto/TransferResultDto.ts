import type { Transaction } from "../../../core/entities/Transaction";

export type TransferResultDto = {
  sourceTransactionReferenceId: string;
  destinationTransactionReferenceId: string;
  feeTransactionReferenceId: string;
  sourceTransaction: Transaction;
  destinationTransaction: Transaction;
  feeTransaction: Transaction | null;
};
