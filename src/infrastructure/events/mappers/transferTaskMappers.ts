import { fromNullable, none, some, toNullable } from "../../../core/entities/Option";
import type { TransferMetadata, TransferParams, TransferResult } from "../../../core/entities/Transfer";
import type { TransferResultDto } from "../dto/TransferResultDto";
import type { TransferTaskInput } from "../dto/TransferTaskInput";

export function toTransferParams(input: TransferTaskInput): TransferParams {
  let metadata: TransferParams["metadata"] = none;
  if (input.metadata) {
    const value: TransferMetadata = {};
    if (input.metadata.note !== undefined) value.note = input.metadata.note;
    if (input.metadata.external_reference !== undefined) {
      value.externalReference = input.metadata.external_reference;
    }
    metadata = some(value);
  }

  return {
    amount: input.amount,
    feeAmount: fromNullable(input.fee_amount),
    metadata,
    sourceAccountId: input.source_account_id,
    destinationAccountId: input.destination_account_id,
    sourceTransactionReferenceId: input.source_transaction_reference_id,
    destinationTransactionReferenceId: input.destination_transaction_reference_id,
    feeTransactionReferenceId: input.fee_transaction_reference_id,
  };
}

export function toTransferResultDto(result: TransferResult): TransferResultDto {
  return {
    sourceTransactionReferenceId: result.sourceTransactionReferenceId,
    destinationTransactionReferenceId: result.destinationTransactionReferenceId,
    feeTransactionReferenceId: result.feeTransactionReferenceId,
    sourceTransaction: result.sourceTransaction,
    destinationTransaction: result.destinationTransaction,
    feeTransaction: toNullable(result.feeTransaction),
  };
}
