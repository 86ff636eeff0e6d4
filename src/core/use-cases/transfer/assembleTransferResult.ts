import type { FinalizedTransactions, TransferParams, TransferResult } from "../../entities/Transfer";

export function assembleTransferResult(
  params: TransferParams,
  finalized: FinalizedTransactions
): TransferResult {
  return {
    sourceTransactionReferenceId: params.sourceTransactionReferenceId,
    destinationTransactionReferenceId: params.destinationTransactionReferenceId,
    feeTransactionReferenceId: params.feeTransactionReferenceId,
    sourceTransaction: finalized.outbound,
    destinationTransaction: finalized.inbound,
    feeTransaction: finalized.fee,
  };
}
