import type { BalanceUpdateOutcome } from "../../entities/Account";
import { type TransferParams, type ValidAccounts, totalDebit } from "../../entities/Transfer";
import { TransferError } from "../../errors/TransferError";
import type { IAccountRepository } from "../../repositories/IAccountRepository";

export interface BalanceUpdateReport {
  debit: BalanceUpdateOutcome;
  credit: BalanceUpdateOutcome;
}

export class BalanceUpdater {
  constructor(private readonly accounts: IAccountRepository) {}

  async apply(params: TransferParams, accounts: ValidAccounts): Promise<BalanceUpdateReport> {
    const { source, destination } = accounts;
    const debitAmount = totalDebit(params);

    let debit: BalanceUpdateOutcome;
    try {
      debit = await this.accounts.updateBalance({
        accountId: source.id,
        amount: debitAmount,
        operation: "DECREASE",
        referenceId: params.sourceTransactionReferenceId,
      });
    } catch (error) {
      throw TransferError.persistenceFailure("source balance decrease", error, {
        retryable: true,
        details: { accountId: source.id, amount: debitAmount },
      });
    }

    let credit: BalanceUpdateOutcome;
    try {
      credit = await this.accounts.updateBalance({
        accountId: destination.id,
        amount: params.amount,
        operation: "INCREASE",
        referenceId: params.destinationTransactionReferenceId,
      });
    } catch (error) {
      // The debit stays recorded under its reference id; re-running this step skips it.
      throw TransferError.partialCompletion("destination balance increase", error, {
        debitedAccountId: source.id,
        debitedAmount: debitAmount,
        debitReferenceId: params.sourceTransactionReferenceId,
        creditAccountId: destination.id,
        creditAmount: params.amount,
      });
    }

    return { debit, credit };
  }
}
