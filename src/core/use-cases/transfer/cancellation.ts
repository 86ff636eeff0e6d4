import { TransferError } from "../../errors/TransferError";

export function ensureNotCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw TransferError.cancelled(stage, signal.reason);
  }
}
