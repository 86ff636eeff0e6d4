import type { Account, BalanceUpdate, BalanceUpdateOutcome } from "../entities/Account";

export interface IAccountRepository {
  getById(id: string): Promise<Account | null>;
  /**
   * Applies one balance change atomically. Applying the same `referenceId`
   * twice must not move the balance again and resolves to "ALREADY_APPLIED".
   */
  updateBalance(update: BalanceUpdate): Promise<BalanceUpdateOutcome>;
}
