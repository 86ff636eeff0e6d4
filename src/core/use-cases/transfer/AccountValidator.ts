import type { Account } from "../../entities/Account";
import { type TransferParams, type ValidAccounts, totalDebit } from "../../entities/Transfer";
import { TransferError } from "../../errors/TransferError";
import type { IAccountRepository } from "../../repositories/IAccountRepository";

export class AccountValidator {
  constructor(private readonly accounts: IAccountRepository) {}

  // Read-only. The balance check runs against a snapshot, so two concurrent
  // transfers from one account can both pass it.
  async validate(params: TransferParams): Promise<ValidAccounts> {
    const source = await this.loadActive(params.sourceAccountId);
    const destination = await this.loadActive(params.destinationAccountId);

    if (source.currency !== destination.currency) {
      throw TransferError.currencyMismatch(
        source.id,
        source.currency,
        destination.id,
        destination.currency
      );
    }

    const required = totalDebit(params);
    if (required > source.balance) {
      throw TransferError.insufficientBalance(source.id, required, source.balance);
    }

    return { source, destination };
  }

  private async loadActive(accountId: string): Promise<Account> {
    let account: Account | null;
    try {
      account = await this.accounts.getById(accountId);
    } catch (error) {
      throw TransferError.persistenceFailure("account lookup", error, {
        retryable: true,
        details: { accountId },
      });
    }

    if (!account) {
      throw TransferError.accountNotFound(accountId);
    }

    if (account.status !== "ACTIVE") {
      throw TransferError.inactiveAccount(account.id, account.status);
    }

    return account;
  }
}
