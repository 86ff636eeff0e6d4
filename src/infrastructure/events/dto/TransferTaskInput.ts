export type TransferTaskInput = {
  amount: number;
  fee_amount: number | null;
  metadata: {
    note?: string;
    external_reference?: string;
  } | null;
  source_account_id: string;
  destination_account_id: string;
  source_transaction_reference_id: string;
  destination_transaction_reference_id: string;
  fee_transaction_reference_id: string;
};
