import type { Account } from "../../entities/Account";
import { type Option, none, some } from "../../entities/Option";
import type {
  Transaction,
  TransactionDraft,
  TransactionMetadata,
  TransactionType,
} from "../../entities/Transaction";
import type { PendingTransactions, TransferMetadata, TransferParams, ValidAccounts } from "../../entities/Transfer";
import { TransferError } from "../../errors/TransferError";
import type { ITimeProvider } from "../../providers/ITimeProvider";
import type { ITransactionRepository } from "../../repositories/ITransactionRepository";

type LedgerLeg = {
  label: string;
  account: Account;
  amount: number;
  referenceId: string;
  type: TransactionType;
  metadata: TransactionMetadata;
};

export class TransactionMaterializer {
  constructor(
    private readonly transactions: ITransactionRepository,
    private readonly timeProvider: ITimeProvider
  ) {}

  async materialize(params: TransferParams, accounts: ValidAccounts): Promise<PendingTransactions> {
    const { source, destination } = accounts;
    const timestamp = this.timeProvider.now().toISOString();
    const callerFields = pickCallerFields(params.metadata);

    const outbound = await this.findOrCreate({
      label: "outgoing",
      account: source,
      amount: params.amount,
      referenceId: params.sourceTransactionReferenceId,
      type: "OUTBOUND",
      metadata: {
        version: 1,
        operationType: "Transfer",
        linkedTransactionId: params.sourceTransactionReferenceId,
        linkedAccountId: source.id,
        counterpartAccountId: destination.id,
        timestamp,
        ...callerFields,
      },
    });

    let fee: Option<Transaction> = none;
    if (params.feeAmount.present) {
      fee = some(
        await this.findOrCreate({
          label: "outgoing fee",
          account: source,
          amount: params.feeAmount.value,
          referenceId: params.feeTransactionReferenceId,
          type: "OUTGOING_FEE",
          metadata: {
            version: 1,
            operationType: "Fee Transfer",
            linkedTransactionId: params.feeTransactionReferenceId,
            linkedAccountId: source.id,
            timestamp,
            ...callerFields,
          },
        })
      );
    }

    const inbound = await this.findOrCreate({
      label: "incoming",
      account: destination,
      amount: params.amount,
      referenceId: params.destinationTransactionReferenceId,
      type: "INBOUND",
      metadata: {
        version: 1,
        operationType: "Transfer",
        linkedTransactionId: params.destinationTransactionReferenceId,
        linkedAccountId: destination.id,
        counterpartAccountId: source.id,
        timestamp,
        ...callerFields,
      },
    });

    return { outbound, inbound, fee };
  }

  private async findOrCreate(leg: LedgerLeg): Promise<Transaction> {
    const draft: TransactionDraft = {
      userId: leg.account.userId,
      accountId: leg.account.id,
      amount: leg.amount,
      currency: leg.account.currency,
      referenceId: leg.referenceId,
      status: "PENDING",
      type: leg.type,
      metadata: leg.metadata,
    };

    try {
      return await this.transactions.findOrCreate(draft);
    } catch (error) {
      // A retry cannot repair a bad draft, and would hide a real storage fault.
      throw TransferError.persistenceFailure(`creating pending ${leg.label} transaction`, error, {
        retryable: false,
        details: { referenceId: leg.referenceId, accountId: leg.account.id },
      });
    }
  }
}

function pickCallerFields(metadata: Option<TransferMetadata>): Pick<TransactionMetadata, "note" | "externalReference"> {
  if (!metadata.present) return {};
  const fields: Pick<TransactionMetadata, "note" | "externalReference"> = {};
  if (metadata.value.note !== undefined) fields.note = metadata.value.note;
  if (metadata.value.externalReference !== undefined) {
    fields.externalReference = metadata.value.externalReference;
  }
  return fields;
}
