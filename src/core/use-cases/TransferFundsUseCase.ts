import { TransferStateMachine } from "../entities/TransferState";
import type {
  FinalizedTransactions,
  PendingTransactions,
  TransferParams,
  TransferResult,
  ValidAccounts,
} from "../entities/Transfer";
import { toTransferError } from "../errors/TransferError";
import type { ILogger } from "../providers/ILogger";
import type { ITimeProvider } from "../providers/ITimeProvider";
import type { IAccountRepository } from "../repositories/IAccountRepository";
import type { ITransactionRepository } from "../repositories/ITransactionRepository";
import { AccountValidator } from "./transfer/AccountValidator";
import { type BalanceUpdateReport, BalanceUpdater } from "./transfer/BalanceUpdater";
import { TransactionFinalizer } from "./transfer/TransactionFinalizer";
import { TransactionMaterializer } from "./transfer/TransactionMaterializer";
import { assembleTransferResult } from "./transfer/assembleTransferResult";
import { ensureNotCancelled } from "./transfer/cancellation";
import { validateTransferParams } from "./transfer/validateTransferParams";

export interface TransferFundsDependencies {
  accounts: IAccountRepository;
  transactions: ITransactionRepository;
  timeProvider: ITimeProvider;
  logger: ILogger;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/**
 * Moves funds between two accounts in five re-invocable steps:
 * validate, materialize pending entries, move balances, finalize, assemble.
 *
 * Every step can be run on its own by an engine that persists progress
 * between them; `execute` runs them back to back. Re-running with the same
 * reference ids never duplicates ledger entries or balance changes.
 */
export class TransferFundsUseCase {
  private readonly validator: AccountValidator;
  private readonly materializer: TransactionMaterializer;
  private readonly balanceUpdater: BalanceUpdater;
  private readonly finalizer: TransactionFinalizer;
  private readonly logger: ILogger;

  constructor(deps: TransferFundsDependencies) {
    this.validator = new AccountValidator(deps.accounts);
    this.materializer = new TransactionMaterializer(deps.transactions, deps.timeProvider);
    this.balanceUpdater = new BalanceUpdater(deps.accounts);
    this.finalizer = new TransactionFinalizer(deps.transactions);
    this.logger = deps.logger;
  }

  async execute(params: TransferParams, options: ExecuteOptions = {}): Promise<TransferResult> {
    const { signal } = options;
    const machine = new TransferStateMachine();
    const logContext = { sourceTransactionReferenceId: params.sourceTransactionReferenceId };

    try {
      validateTransferParams(params);
      ensureNotCancelled(signal, machine.state);
      const accounts = await this.validateAccounts(params);

      this.enter(machine, signal, logContext);
      const pending = await this.materializeTransactions(params, accounts);

      this.enter(machine, signal, logContext);
      const report = await this.updateBalances(params, accounts);
      this.logBalanceReport(report, logContext);

      this.enter(machine, signal, logContext);
      const finalized = await this.finalizeTransactions(pending);

      machine.advance();
      const result = this.assembleResult(params, finalized);
      this.logger.info("transfer completed", {
        ...logContext,
        destinationTransactionReferenceId: params.destinationTransactionReferenceId,
        amount: params.amount,
        fee: params.feeAmount.present ? params.feeAmount.value : null,
      });
      return result;
    } catch (error) {
      const failedIn = machine.state;
      machine.fail();
      const transferError = toTransferError(error, `transfer step ${failedIn}`);
      this.logger.debug("transfer state FAILED", { ...logContext, failedIn, code: transferError.code });
      throw transferError;
    }
  }

  validateAccounts(params: TransferParams): Promise<ValidAccounts> {
    return this.validator.validate(params);
  }

  materializeTransactions(params: TransferParams, accounts: ValidAccounts): Promise<PendingTransactions> {
    return this.materializer.materialize(params, accounts);
  }

  updateBalances(params: TransferParams, accounts: ValidAccounts): Promise<BalanceUpdateReport> {
    return this.balanceUpdater.apply(params, accounts);
  }

  finalizeTransactions(pending: PendingTransactions): Promise<FinalizedTransactions> {
    return this.finalizer.finalize(pending);
  }

  assembleResult(params: TransferParams, finalized: FinalizedTransactions): TransferResult {
    return assembleTransferResult(params, finalized);
  }

  private enter(
    machine: TransferStateMachine,
    signal: AbortSignal | undefined,
    logContext: Record<string, unknown>
  ): void {
    const next = machine.advance();
    ensureNotCancelled(signal, next);
    this.logger.debug(`transfer state ${next}`, logContext);
  }

  private logBalanceReport(report: BalanceUpdateReport, logContext: Record<string, unknown>): void {
    if (report.debit === "ALREADY_APPLIED" || report.credit === "ALREADY_APPLIED") {
      this.logger.info("balance change already applied by an earlier attempt", { ...logContext, ...report });
    }
  }
}
