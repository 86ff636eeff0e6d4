import type { Transaction, TransactionDraft, TransactionStatus } from "../entities/Transaction";

export interface ITransactionRepository {
  /** Returns the transaction already stored under `draft.referenceId`, or creates it. */
  findOrCreate(draft: TransactionDraft): Promise<Transaction>;
  findByReferenceId(referenceId: string): Promise<Transaction | null>;
  updateStatus(id: string, status: TransactionStatus): Promise<Transaction>;
}
