import { none, some } from "../../entities/Option";
import type { Transaction } from "../../entities/Transaction";
import type { FinalizedTransactions, PendingTransactions } from "../../entities/Transfer";
import { TransferError } from "../../errors/TransferError";
import type { ITransactionRepository } from "../../repositories/ITransactionRepository";

export class TransactionFinalizer {
  constructor(private readonly transactions: ITransactionRepository) {}

  async finalize(pending: PendingTransactions): Promise<FinalizedTransactions> {
    const finalized: string[] = [];

    const outbound = await this.markSucceeded(pending.outbound, finalized);
    const inbound = await this.markSucceeded(pending.inbound, finalized);
    const fee = pending.fee.present ? some(await this.markSucceeded(pending.fee.value, finalized)) : none;

    return { outbound, inbound, fee };
  }

  private async markSucceeded(transaction: Transaction, finalized: string[]): Promise<Transaction> {
    try {
      const updated = await this.transactions.updateStatus(transaction.id, "SUCCESS");
      finalized.push(transaction.referenceId);
      return updated;
    } catch (error) {
      throw TransferError.partialCompletion("transaction finalization", error, {
        failedReferenceId: transaction.referenceId,
        finalizedReferenceIds: [...finalized],
      });
    }
  }
}
