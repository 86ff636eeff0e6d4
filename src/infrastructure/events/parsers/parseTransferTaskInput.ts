import type { TransferTaskInput } from "../dto/TransferTaskInput";
import { type ParseResult, parseFailure, parsed } from "./parseResult";

const REFERENCE_FIELDS = [
  "source_transaction_reference_id",
  "destination_transaction_reference_id",
  "fee_transaction_reference_id",
] as const;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function isMinorUnits(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

export function parseTransferTaskInput(event: unknown): ParseResult<TransferTaskInput> {
  let input: unknown = event;

  if (typeof input === "string") {
    try {
      input = JSON.parse(input);
    } catch {
      return parseFailure("Invalid JSON input");
    }
  }

  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    return parseFailure("Invalid task input format");
  }

  const data: Record<string, unknown> = { ...input };

  if (!isMinorUnits(data.amount) || data.amount <= 0) {
    return parseFailure("amount must be a positive integer");
  }

  let feeAmount: number | null = null;
  if (data.fee_amount !== undefined && data.fee_amount !== null) {
    if (!isMinorUnits(data.fee_amount) || data.fee_amount < 0) {
      return parseFailure("fee_amount must be a non-negative integer");
    }
    feeAmount = data.fee_amount;
  }

  if (!isNonEmptyString(data.source_account_id)) {
    return parseFailure("source_account_id is required");
  }

  if (!isNonEmptyString(data.destination_account_id)) {
    return parseFailure("destination_account_id is required");
  }

  const references: Record<(typeof REFERENCE_FIELDS)[number], string> = {
    source_transaction_reference_id: "",
    destination_transaction_reference_id: "",
    fee_transaction_reference_id: "",
  };
  for (const field of REFERENCE_FIELDS) {
    const value = data[field];
    if (!isNonEmptyString(value)) {
      return parseFailure(`${field} is required`);
    }
    references[field] = value.trim();
  }

  const metadata = parseMetadata(data.metadata);
  if (!metadata.success) {
    return metadata;
  }

  return parsed({
    amount: data.amount,
    fee_amount: feeAmount,
    metadata: metadata.data,
    source_account_id: data.source_account_id.trim(),
    destination_account_id: data.destination_account_id.trim(),
    ...references,
  });
}

function parseMetadata(value: unknown): ParseResult<TransferTaskInput["metadata"]> {
  if (value === undefined || value === null) {
    return parsed(null);
  }

  if (typeof value !== "object" || Array.isArray(value)) {
    return parseFailure("metadata must be an object");
  }

  const raw: Record<string, unknown> = { ...value };
  const metadata: NonNullable<TransferTaskInput["metadata"]> = {};

  if (raw.note !== undefined) {
    if (typeof raw.note !== "string") return parseFailure("metadata.note must be a string");
    metadata.note = raw.note;
  }

  if (raw.external_reference !== undefined) {
    if (typeof raw.external_reference !== "string") {
      return parseFailure("metadata.external_reference must be a string");
    }
    metadata.external_reference = raw.external_reference;
  }

  return parsed(metadata);
}
