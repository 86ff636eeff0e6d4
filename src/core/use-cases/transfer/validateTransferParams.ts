import type { TransferParams } from "../../entities/Transfer";
import { TransferError } from "../../errors/TransferError";

export function validateTransferParams(params: TransferParams): void {
  if (!Number.isSafeInteger(params.amount) || params.amount <= 0) {
    throw TransferError.invalidParams(`amount must be a positive integer, got ${params.amount}`);
  }

  if (params.feeAmount.present) {
    const fee = params.feeAmount.value;
    if (!Number.isSafeInteger(fee) || fee < 0) {
      throw TransferError.invalidParams(`feeAmount must be a non-negative integer, got ${fee}`);
    }
    if (!Number.isSafeInteger(params.amount + fee)) {
      throw TransferError.invalidParams("amount plus feeAmount exceeds the safe integer range");
    }
  }

  if (params.sourceAccountId.trim() === "" || params.destinationAccountId.trim() === "") {
    throw TransferError.invalidParams("source and destination account ids are required");
  }

  if (params.sourceAccountId === params.destinationAccountId) {
    throw TransferError.invalidParams("source and destination accounts must differ");
  }

  const references = [
    params.sourceTransactionReferenceId,
    params.destinationTransactionReferenceId,
    params.feeTransactionReferenceId,
  ];
  if (references.some((reference) => reference.trim() === "")) {
    throw TransferError.invalidParams("all three transaction reference ids are required");
  }
  if (new Set(references).size !== references.length) {
    throw TransferError.invalidParams("transaction reference ids must be distinct");
  }
}
